import type { ReasoningProvider, WarRoomConfig } from '@warroom/shared';
import { ReasoningClient } from './reasoning/reasoning.client.js';
import { UnconfiguredProvider } from './unconfigured.provider.js';

/**
 * Build the reasoning backend named by the config. The API key is never read
 * from the config file: pass it explicitly or let the client read the env.
 */
export function createReasoningProvider(config: WarRoomConfig, apiKey?: string): ReasoningProvider {
  const provider = config.provider;
  switch (provider.name) {
    case 'none':
      return new UnconfiguredProvider();
    case 'nvidia':
      return new ReasoningClient({
        apiKey,
        model: provider.model,
        baseURL: provider.base_url,
        minThinkingTokens: provider.min_thinking_tokens,
        maxThinkingTokens: provider.max_thinking_tokens,
        temperature: provider.temperature,
        topP: provider.top_p,
        maxTokens: provider.max_tokens,
        stream: provider.stream,
        reasoningDirective: provider.reasoning_directive,
      });
    default: {
      const unknown: never = provider;
      throw new Error(`Unknown provider: ${JSON.stringify(unknown)}`);
    }
  }
}
