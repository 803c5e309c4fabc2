/** An asynchronous capability an agent may invoke by name with keyword arguments. */
export type AgentTool = (args: Record<string, unknown>) => Promise<unknown>;

export class ToolNotRegisteredError extends Error {
  constructor(tool: string, agentName: string) {
    super(`Tool "${tool}" is not registered for agent "${agentName}"`);
    this.name = 'ToolNotRegisteredError';
  }
}
