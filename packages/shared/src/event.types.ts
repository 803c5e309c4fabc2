/** Closed set of observable step kinds an agent can emit. */
export type AgentEventKind =
  | 'thinking'
  | 'action'
  | 'observation'
  | 'theory'
  | 'challenge'
  | 'decision';

/**
 * Open key-value bag attached to every event. The well-known keys are listed
 * so consumers get completion; anything else is allowed.
 */
export interface AgentEventMetadata {
  /** For theory / decision events: how sure the agent is, conventionally 0..1 */
  confidence?: number;
  /** For challenge events: id of the theory being challenged */
  theoryId?: string;
  /** For action / observation events emitted by useTool */
  tool?: string;
  args?: Record<string, unknown>;
  resultSummary?: string;
  /** Set on thinking events that carry model-internal reasoning tokens */
  llmReasoning?: boolean;
  [key: string]: unknown;
}

export interface AgentEvent {
  readonly agentName: string;
  readonly kind: AgentEventKind;
  readonly content: string;
  readonly metadata: Readonly<AgentEventMetadata>;
  /** ISO-8601 creation time */
  readonly timestamp: string;
}

/** Transport projection of an AgentEvent (socket frames, log files). */
export interface AgentEventRecord {
  agent: string;
  type: AgentEventKind;
  content: string;
  metadata: AgentEventMetadata;
  timestamp: string;
}

export type AgentEventListener = (event: AgentEvent) => void;
