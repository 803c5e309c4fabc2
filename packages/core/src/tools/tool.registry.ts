import type { AgentTool } from './tool.types.js';

/**
 * Name → tool lookup owned by a single agent. Registering an existing name
 * replaces the previous tool.
 */
export class ToolRegistry {
  private tools: Map<string, AgentTool> = new Map();

  register(name: string, tool: AgentTool): void {
    this.tools.set(name, tool);
  }

  get(name: string): AgentTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** Returns all registered tool names. */
  getAllToolNames(): string[] {
    return Array.from(this.tools.keys());
  }
}
