import OpenAI from 'openai';
import type {
  ChatMessage,
  ReasoningChunk,
  ReasoningProvider,
  RespondOptions,
} from '@warroom/shared';
import { ConfigurationError, TransportError } from '../../errors.js';

export const NVIDIA_BASE_URL = 'https://integrate.api.nvidia.com/v1';
export const DEFAULT_REASONING_MODEL = 'nvidia/llama-3.3-nemotron-super-49b-v1.5';
/** Nemotron switches its reasoning mode on when the system turn is exactly this. */
export const DEFAULT_REASONING_DIRECTIVE = '/think';

export interface ReasoningClientOptions {
  model?: string;
  /** OpenAI-compatible endpoint. Defaults to the NVIDIA integrate API. */
  baseURL?: string;
  /** Falls back to NVIDIA_API_KEY, then NGC_API_KEY. */
  apiKey?: string;
  minThinkingTokens?: number;
  maxThinkingTokens?: number;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  stream?: boolean;
  /**
   * System turn prepended to conversations that carry none. Pass null for
   * backends that have no such convention.
   */
  reasoningDirective?: string | null;
}

/** Thinking budget fields the backend accepts on top of the OpenAI schema. */
interface ThinkingBudget {
  min_thinking_tokens: number;
  max_thinking_tokens: number;
}

function resolveApiKey(explicit?: string): string | undefined {
  return explicit || process.env.NVIDIA_API_KEY || process.env.NGC_API_KEY || undefined;
}

/** Reasoning tokens travel in a non-standard `reasoning_content` field. */
function reasoningOf(value: object): string | null {
  if ('reasoning_content' in value && typeof value.reasoning_content === 'string') {
    return value.reasoning_content;
  }
  return null;
}

function toTransportError(err: unknown): TransportError {
  if (err instanceof TransportError) return err;
  if (err instanceof OpenAI.APIError) {
    return new TransportError(`LLM backend request failed: ${err.message}`, {
      cause: err,
      status: err.status,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TransportError(`LLM backend request failed: ${message}`, { cause: err });
}

/**
 * Chat-completion client that keeps the model's reasoning tokens apart from
 * its answer. Every response, streamed or not, comes back as a sequence of
 * chunks labeled `reasoning` or `content`.
 *
 * No retries happen here: a retry after partial output would duplicate it,
 * so retry policy belongs to whoever drives the agent.
 */
export class ReasoningClient implements ReasoningProvider {
  readonly configured = true;
  readonly model: string;

  private readonly client: OpenAI;
  private readonly minThinkingTokens: number;
  private readonly maxThinkingTokens: number;
  private readonly temperature: number;
  private readonly topP: number;
  private readonly maxTokens: number;
  private readonly stream: boolean;
  private readonly reasoningDirective: string | null;

  constructor(options: ReasoningClientOptions = {}) {
    const apiKey = resolveApiKey(options.apiKey);
    if (!apiKey) {
      throw new ConfigurationError(
        'No API key found. Set NVIDIA_API_KEY or NGC_API_KEY environment variable',
      );
    }

    this.model = options.model ?? DEFAULT_REASONING_MODEL;
    this.minThinkingTokens = options.minThinkingTokens ?? 512;
    this.maxThinkingTokens = options.maxThinkingTokens ?? 2048;
    this.temperature = options.temperature ?? 0.6;
    this.topP = options.topP ?? 0.95;
    this.maxTokens = options.maxTokens ?? 2048;
    this.stream = options.stream ?? true;
    this.reasoningDirective =
      options.reasoningDirective === undefined
        ? DEFAULT_REASONING_DIRECTIVE
        : options.reasoningDirective;

    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseURL ?? NVIDIA_BASE_URL,
      maxRetries: 0,
    });
  }

  async *respond(
    messages: ChatMessage[],
    options: RespondOptions = {},
  ): AsyncGenerator<ReasoningChunk> {
    const { signal } = options;
    if (signal?.aborted) {
      return;
    }

    const request = {
      model: this.model,
      messages: this.withReasoningDirective(messages).map((m) => ({
        role: m.role,
        content: m.content,
      })),
      temperature: options.temperature ?? this.temperature,
      top_p: options.topP ?? this.topP,
      max_tokens: options.maxTokens ?? this.maxTokens,
      min_thinking_tokens: this.minThinkingTokens,
      max_thinking_tokens: this.maxThinkingTokens,
    };

    try {
      if (options.stream ?? this.stream) {
        const body: OpenAI.Chat.Completions.ChatCompletionCreateParamsStreaming & ThinkingBudget = {
          ...request,
          stream: true,
        };
        const completion = await this.client.chat.completions.create(body, { signal });

        for await (const chunk of completion) {
          if (signal?.aborted) {
            return;
          }
          const delta = chunk.choices[0]?.delta;
          if (!delta) continue;

          const reasoning = reasoningOf(delta);
          if (reasoning) {
            yield { kind: 'reasoning', text: reasoning, model: this.model };
          }
          if (delta.content) {
            yield { kind: 'content', text: delta.content, model: this.model };
          }
        }
        return;
      }

      const body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming & ThinkingBudget =
        { ...request, stream: false };
      const completion = await this.client.chat.completions.create(body, { signal });
      const message = completion.choices[0]?.message;
      if (!message) return;

      const reasoning = reasoningOf(message);
      if (reasoning) {
        yield { kind: 'reasoning', text: reasoning, model: this.model };
      }
      if (message.content) {
        yield { kind: 'content', text: message.content, model: this.model };
      }
    } catch (err: unknown) {
      // Swallow intentional aborts
      if (signal?.aborted) {
        return;
      }
      throw toTransportError(err);
    }
  }

  async simpleQuery(
    prompt: string,
    systemMessage?: string,
    options: RespondOptions = {},
  ): Promise<string> {
    const messages: ChatMessage[] = [];
    if (systemMessage) {
      messages.push({ role: 'system', content: systemMessage });
    }
    messages.push({ role: 'user', content: prompt });

    let content = '';
    for await (const chunk of this.respond(messages, options)) {
      if (chunk.kind === 'content') {
        content += chunk.text;
      }
    }
    return content;
  }

  private withReasoningDirective(messages: ChatMessage[]): ChatMessage[] {
    if (this.reasoningDirective === null || messages.some((m) => m.role === 'system')) {
      return messages;
    }
    return [{ role: 'system', content: this.reasoningDirective }, ...messages];
  }
}
