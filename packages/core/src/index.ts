// @warroom/core: entry point
export * from './errors.js';
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export { AGENT_EVENT_KINDS, createAgentEvent, toRecord, describeEvent } from './events/agent.event.js';
// Reasoning providers
export {
  ReasoningClient,
  NVIDIA_BASE_URL,
  DEFAULT_REASONING_MODEL,
  DEFAULT_REASONING_DIRECTIVE,
} from './providers/reasoning/reasoning.client.js';
export type { ReasoningClientOptions } from './providers/reasoning/reasoning.client.js';
export { UnconfiguredProvider } from './providers/unconfigured.provider.js';
export { createReasoningProvider } from './providers/provider.factory.js';
// Tools
export { ToolRegistry } from './tools/tool.registry.js';
export { ToolNotRegisteredError } from './tools/tool.types.js';
export type { AgentTool } from './tools/tool.types.js';
// Agents
export { BaseAgent } from './agents/agent.base.js';
export type { AgentIdentity, ReasonOptions, ConversationEntry } from './agents/agent.base.js';
export {
  IncidentCommander,
  InvestigationPhaseError,
  classifySymptom,
  UNKNOWN_ROOT_CAUSE,
  CONNECTION_POOL_ROOT_CAUSE,
  ERROR_RATE_ROOT_CAUSE,
} from './agents/commander.agent.js';
export type {
  CommanderContext,
  CommanderOptions,
  RootCauseDetermination,
} from './agents/commander.agent.js';
export { createCommander } from './agents/commander.factory.js';
export { assignSpecialist, DEFAULT_SPECIALIST } from './agents/specialists.js';
export { buildRootCausePrompt, COMMANDER_SYSTEM_CONTEXT } from './agents/commander.prompts.js';
// Scenarios & transcripts
export { parseIncident } from './scenarios/incident.parser.js';
export { loadScenario, DEFAULT_SCENARIO_PATH } from './scenarios/scenario.loader.js';
export { RunLogger } from './logs/run.logger.js';
export { recordInvestigation } from './logs/investigation.recorder.js';
export type { RecordOptions } from './logs/investigation.recorder.js';
// Server
export { WarRoomServer } from './server/warroom.server.js';
export type { WarRoomServerOptions } from './server/warroom.server.js';
