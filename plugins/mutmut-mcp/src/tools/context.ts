import type { ServerConfig } from '../types/config.js';
import type { MutmutOrchestrator } from '../orchestrator/operations.js';
import type { ToolRegistry } from './registry.js';

/** Created once at startup and passed to every tool module. */
export interface ServerContext {
  readonly config: ServerConfig;
  readonly orchestrator: MutmutOrchestrator;
  readonly registry: ToolRegistry;
}
