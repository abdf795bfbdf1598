import type { z } from 'zod';
import type { ServerContext } from './context.js';
import type { ToolMetadata } from '../types/tool.js';
import { failure, type OperationOutcome } from '../types/outcome.js';
import { MutmutErrorCode } from '../shared/errors.js';

export type ToolTextResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/** Register a tool whose handler receives arguments already parsed by its schema. */
export function registerTool<S extends z.ZodRawShape, T>(
  ctx: ServerContext,
  metadata: ToolMetadata<S>,
  handler: (args: z.infer<z.ZodObject<S>>) => Promise<OperationOutcome<T>>,
): void {
  ctx.registry.register({
    name: metadata.name,
    description: metadata.description,
    inputShape: metadata.inputSchema.shape,
    annotations: metadata.annotations,
    execute: async (args) => {
      const parsed = metadata.inputSchema.safeParse(args);
      if (!parsed.success) {
        const detail = parsed.error.issues.map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`).join('; ');
        return failure(MutmutErrorCode.VALIDATION_ERROR, `Invalid arguments for ${metadata.name}: ${detail}`);
      }
      return handler(parsed.data);
    },
  });
}

/** Serialize an outcome for the MCP client; failures set `isError`. */
export function toToolResult(outcome: OperationOutcome<unknown>): ToolTextResult {
  const text = JSON.stringify(outcome, null, 2);
  return outcome.status === 'failure'
    ? { content: [{ type: 'text', text }], isError: true }
    : { content: [{ type: 'text', text }] };
}
