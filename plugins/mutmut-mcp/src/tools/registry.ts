import type { RegisteredTool } from '../types/tool.js';
import { logger } from '../logger.js';

/**
 * Tool Registry: stores all registered tools.
 * The MCP server reads from this to populate tools/list and dispatch tools/call.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  register(tool: RegisteredTool): void {
    if (this.tools.has(tool.name)) {
      logger.warn({ tool: tool.name }, 'Duplicate tool registration, overwriting');
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  getAll(): Map<string, RegisteredTool> {
    return this.tools;
  }

  /** Tool names in registration order. */
  names(): string[] {
    return [...this.tools.keys()];
  }

  get size(): number {
    return this.tools.size;
  }
}
