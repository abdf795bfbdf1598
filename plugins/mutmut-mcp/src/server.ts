import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { ServerConfig } from './types/config.js';
import { EnvironmentResolver } from './environment/resolver.js';
import { ExecaProcessRunner, type ProcessRunner } from './execution/runner.js';
import { MutmutOrchestrator } from './orchestrator/operations.js';
import { ToolRegistry } from './tools/registry.js';
import type { ServerContext } from './tools/context.js';
import { toToolResult } from './tools/helpers.js';
import { registerMutmutTools } from './tools/mutmut/index.js';
import { failure } from './types/outcome.js';
import { MutmutErrorCode } from './shared/errors.js';
import { logger } from './logger.js';

export const SERVER_NAME = 'mutmut-mcp';
export const SERVER_VERSION = '0.1.0';

export interface ContextOptions {
  /** Project directory every mutmut invocation runs in. Defaults to the server's cwd. */
  workingDirectory?: string;
  runner?: ProcessRunner;
  platform?: NodeJS.Platform;
}

export function createServerContext(config: ServerConfig, options: ContextOptions = {}): ServerContext {
  const resolver = new EnvironmentResolver({
    executable: config.executable,
    workingDirectory: options.workingDirectory ?? process.cwd(),
    env: config.env,
    platform: options.platform,
  });
  const orchestrator = new MutmutOrchestrator({
    resolver,
    runner: options.runner ?? new ExecaProcessRunner(),
    timeouts: config.timeouts,
  });
  const ctx: ServerContext = { config, orchestrator, registry: new ToolRegistry() };
  registerMutmutTools(ctx);
  logger.debug({ toolCount: ctx.registry.size }, 'Tool modules registered');
  return ctx;
}

export function createMcpServer(ctx: ServerContext): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const [name, tool] of ctx.registry.getAll()) {
    server.registerTool(
      name,
      {
        title: name,
        description: tool.description,
        inputSchema: tool.inputShape,
        annotations: {
          readOnlyHint: tool.annotations?.readOnlyHint ?? false,
          destructiveHint: tool.annotations?.destructiveHint ?? false,
          idempotentHint: tool.annotations?.idempotentHint ?? false,
          openWorldHint: tool.annotations?.openWorldHint ?? false,
        },
      },
      async (args: Record<string, unknown>) => {
        try {
          return toToolResult(await tool.execute(args));
        } catch (err) {
          // Operations never throw; this only catches faults in the tool layer itself.
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ tool: name, error: message }, 'Tool execution error');
          return toToolResult(failure(MutmutErrorCode.INTERNAL_ERROR, message));
        }
      },
    );
  }

  return server;
}
