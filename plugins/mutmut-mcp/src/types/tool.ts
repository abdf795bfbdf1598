import type { z } from 'zod';
import type { OperationOutcome } from './outcome.js';

export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

/** Metadata declared by every tool at registration time. */
export interface ToolMetadata<S extends z.ZodRawShape = z.ZodRawShape> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodObject<S>;
  readonly annotations?: ToolAnnotations;
}

/** A registered tool; `execute` validates its own arguments. */
export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly inputShape: z.ZodRawShape;
  readonly annotations?: ToolAnnotations;
  readonly execute: (args: Record<string, unknown>) => Promise<OperationOutcome<unknown>>;
}
