import { EventEmitter } from 'node:events';
import { inspect } from 'node:util';
import type {
  AgentEvent,
  AgentEventKind,
  AgentEventListener,
  AgentEventMetadata,
  ChatMessage,
  ReasoningProvider,
} from '@warroom/shared';
import { createAgentEvent } from '../events/agent.event.js';
import { NoLLMConfiguredError, NotImplementedError, ReasoningAbortedError } from '../errors.js';
import { ToolRegistry } from '../tools/tool.registry.js';
import { ToolNotRegisteredError, type AgentTool } from '../tools/tool.types.js';
import { UnconfiguredProvider } from '../providers/unconfigured.provider.js';

/** Length of the result preview carried by the observation after a tool call. */
const RESULT_SUMMARY_LENGTH = 100;

export interface AgentIdentity {
  name: string;
  role: string;
}

export interface ReasonOptions {
  /** Optional system turn placed before the prompt. */
  systemContext?: string;
  /** Surface the model's reasoning tokens as thinking events. Defaults to true. */
  emitReasoning?: boolean;
  signal?: AbortSignal;
}

export interface ConversationEntry {
  prompt: string;
  reasoning: string;
  response: string;
}

// ---------------------------------------------------------------------------
// Event declarations (declaration merging gives the EventEmitter typed events)
// ---------------------------------------------------------------------------

// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export interface BaseAgent<
  TContext extends object = Record<string, unknown>,
  TInput = Record<string, unknown>,
  TResult = unknown,
> {
  on(event: 'event', listener: AgentEventListener): this;
}

function stringifyResult(result: unknown): string {
  if (typeof result === 'string') return result;
  try {
    return JSON.stringify(result) ?? String(result);
  } catch {
    // BigInt fields and circular structures
    return inspect(result, { depth: 2, breakLength: Infinity });
  }
}

function summarizeResult(result: unknown): string {
  return stringifyResult(result).slice(0, RESULT_SUMMARY_LENGTH);
}

// ---------------------------------------------------------------------------
// BaseAgent
// ---------------------------------------------------------------------------

/**
 * Shared runtime for every war room participant: narrated events fanned out
 * to listeners, named tools, LLM-backed reasoning and a working context.
 *
 * Listeners run synchronously in registration order, so a listener that sees
 * event N knows the step behind event N+1 has not started. A listener that
 * throws is reported on stderr and the remaining listeners still run, whether
 * it was added with `addEventListener` or directly with `on('event')`.
 *
 * Subclasses supply the workflow by overriding `run`.
 */
// eslint-disable-next-line @typescript-eslint/no-unsafe-declaration-merging
export class BaseAgent<
  TContext extends object = Record<string, unknown>,
  TInput = Record<string, unknown>,
  TResult = unknown,
> extends EventEmitter {
  readonly name: string;
  readonly role: string;
  protected readonly provider: ReasoningProvider;
  protected readonly toolRegistry = new ToolRegistry();

  /** Scratchpad shared by the phases of a single run. */
  protected context: Partial<TContext> = {};

  private readonly history: ConversationEntry[] = [];

  constructor(identity: AgentIdentity, provider: ReasoningProvider = new UnconfiguredProvider()) {
    super();
    // Listener count is unbounded; silence the leak warning past 10.
    this.setMaxListeners(0);
    this.name = identity.name;
    this.role = identity.role;
    this.provider = provider;
  }

  /** True when `reason` can reach an LLM. */
  get hasReasoning(): boolean {
    return this.provider.configured;
  }

  get conversationHistory(): readonly ConversationEntry[] {
    return this.history;
  }

  get workingContext(): Readonly<Partial<TContext>> {
    return this.context;
  }

  get toolNames(): string[] {
    return this.toolRegistry.getAllToolNames();
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  registerTool(name: string, tool: AgentTool): void {
    this.toolRegistry.register(name, tool);
  }

  addEventListener(listener: AgentEventListener): void {
    this.on('event', listener);
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  emitEvent(kind: AgentEventKind, content: string, metadata: AgentEventMetadata = {}): AgentEvent {
    const agentEvent = createAgentEvent(this.name, kind, content, metadata);
    // rawListeners keeps once() wrappers, which unregister themselves when called.
    for (const listener of this.rawListeners('event')) {
      try {
        Reflect.apply(listener, this, [agentEvent]);
      } catch (err: unknown) {
        process.stderr.write(
          `[warroom] agent ${this.name}: event listener failed: ` +
            `${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    }
    return agentEvent;
  }

  think(thought: string, metadata: AgentEventMetadata = {}): AgentEvent {
    return this.emitEvent('thinking', thought, metadata);
  }

  observe(observation: string, metadata: AgentEventMetadata = {}): AgentEvent {
    return this.emitEvent('observation', observation, metadata);
  }

  proposeTheory(theory: string, confidence = 0.5, metadata: AgentEventMetadata = {}): AgentEvent {
    return this.emitEvent('theory', theory, { ...metadata, confidence });
  }

  challengeTheory(theoryId: string, challenge: string, metadata: AgentEventMetadata = {}): AgentEvent {
    return this.emitEvent('challenge', challenge, { ...metadata, theoryId });
  }

  decide(decision: string, metadata: AgentEventMetadata = {}): AgentEvent {
    return this.emitEvent('decision', decision, metadata);
  }

  // ---------------------------------------------------------------------------
  // Tools
  // ---------------------------------------------------------------------------

  /**
   * Invoke a registered tool, bracketed by an action event before the call
   * and an observation event with a truncated result after it.
   */
  async useTool(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const tool = this.toolRegistry.get(name);
    if (!tool) {
      throw new ToolNotRegisteredError(name, this.name);
    }

    this.emitEvent('action', `Using tool: ${name}`, { tool: name, args });
    const result = await tool(args);
    this.observe(`Tool '${name}' returned results`, {
      tool: name,
      resultSummary: summarizeResult(result),
    });
    return result;
  }

  // ---------------------------------------------------------------------------
  // Reasoning
  // ---------------------------------------------------------------------------

  /**
   * Ask the LLM and return its answer. Reasoning fragments become thinking
   * events tagged `llmReasoning` as they stream in; answer fragments are
   * collected silently. The exchange is appended to the conversation history
   * only once the stream completes; an aborted call records nothing and
   * rejects with ReasoningAbortedError.
   */
  async reason(prompt: string, options: ReasonOptions = {}): Promise<string> {
    if (!this.provider.configured) {
      throw new NoLLMConfiguredError(this.name);
    }
    const { systemContext, emitReasoning = true, signal } = options;

    const messages: ChatMessage[] = [];
    if (systemContext) {
      messages.push({ role: 'system', content: systemContext });
    }
    messages.push({ role: 'user', content: prompt });

    let reasoning = '';
    let response = '';
    for await (const chunk of this.provider.respond(messages, { signal })) {
      if (chunk.kind === 'reasoning') {
        reasoning += chunk.text;
        if (emitReasoning) {
          this.think(chunk.text, { llmReasoning: true });
        }
      } else {
        response += chunk.text;
      }
    }

    if (signal?.aborted) {
      throw new ReasoningAbortedError(this.name);
    }
    this.history.push({ prompt, reasoning, response });
    return response;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async run(_input: TInput): Promise<TResult> {
    throw new NotImplementedError(`${this.constructor.name}.run`);
  }

  /** Merge values into the working context. Not part of the observable trace. */
  updateContext(patch: Partial<TContext>): void {
    this.context = { ...this.context, ...patch };
  }
}
