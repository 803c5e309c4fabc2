/** A required setting or credential is missing or invalid. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** An agent was asked to reason but has no LLM behind it. */
export class NoLLMConfiguredError extends ConfigurationError {
  constructor(agentName?: string) {
    super(
      agentName
        ? `Agent "${agentName}" has no LLM client configured`
        : 'No LLM client configured',
    );
    this.name = 'NoLLMConfiguredError';
  }
}

/** The LLM backend or the network between us failed mid-call. */
export class TransportError extends Error {
  /** HTTP status returned by the backend, when there was one. */
  readonly status?: number;

  constructor(message: string, options: { cause?: unknown; status?: number } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.status = options.status;
  }
}

/** A reasoning call was cancelled through its AbortSignal before the answer completed. */
export class ReasoningAbortedError extends Error {
  constructor(agentName: string) {
    super(`Agent "${agentName}" stopped reasoning: request aborted`);
    this.name = 'ReasoningAbortedError';
  }
}

export class NotImplementedError extends Error {
  constructor(member: string) {
    super(`${member} must be implemented by a subclass`);
    this.name = 'NotImplementedError';
  }
}
