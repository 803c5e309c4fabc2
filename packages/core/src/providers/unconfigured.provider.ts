import type { ReasoningChunk, ReasoningProvider } from '@warroom/shared';
import { NoLLMConfiguredError } from '../errors.js';

/** Stand-in for "no LLM configured": reports itself unconfigured and refuses every call. */
export class UnconfiguredProvider implements ReasoningProvider {
  readonly configured = false;
  readonly model = null;

  // eslint-disable-next-line require-yield
  async *respond(): AsyncGenerator<ReasoningChunk> {
    throw new NoLLMConfiguredError();
  }

  async simpleQuery(): Promise<string> {
    throw new NoLLMConfiguredError();
  }
}
