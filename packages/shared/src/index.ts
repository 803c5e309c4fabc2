// @warroom/shared: barrel export
export type {
  AgentEventKind,
  AgentEventMetadata,
  AgentEvent,
  AgentEventRecord,
  AgentEventListener,
} from './event.types.js';
export type {
  Incident,
  TimelineEntry,
  InvestigationArea,
  InvestigationPhase,
  DelegatedTask,
  Theory,
  InvestigationContext,
  InvestigationResult,
} from './incident.types.js';
export type {
  ChatMessage,
  ReasoningChunk,
  RespondOptions,
  ReasoningProvider,
} from './provider.types.js';
export type {
  NoneProviderConfig,
  NvidiaProviderConfig,
  ProviderConfig,
  WarRoomConfig,
} from './config.types.js';
export type { ClientMessage, ServerMessage } from './websocket.types.js';
export type { InvestigationRun } from './run.types.js';
