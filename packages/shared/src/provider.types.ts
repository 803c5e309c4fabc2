export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/** One labeled fragment of a model response. */
export interface ReasoningChunk {
  kind: 'reasoning' | 'content';
  text: string;
  /** Model that produced the fragment */
  model?: string;
}

export interface RespondOptions {
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  stream?: boolean;
  signal?: AbortSignal;
}

/**
 * Capability every agent talks to for LLM reasoning. The "no LLM configured"
 * case is a provider whose `configured` flag is false, not a missing object.
 */
export interface ReasoningProvider {
  readonly configured: boolean;
  /** Model identifier, or null when nothing is configured. */
  readonly model: string | null;
  respond(messages: ChatMessage[], options?: RespondOptions): AsyncGenerator<ReasoningChunk>;
  simpleQuery(prompt: string, systemMessage?: string, options?: RespondOptions): Promise<string>;
}
