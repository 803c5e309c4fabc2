export interface NoneProviderConfig {
  name: 'none';
}

export interface NvidiaProviderConfig {
  name: 'nvidia';
  model: string;
  base_url: string;
  min_thinking_tokens: number;
  max_thinking_tokens: number;
  temperature: number;
  top_p: number;
  max_tokens: number;
  stream: boolean;
  /** System turn prepended when a conversation has none; null disables it. */
  reasoning_directive: string | null;
}

export type ProviderConfig = NoneProviderConfig | NvidiaProviderConfig;

export interface WarRoomConfig {
  provider: ProviderConfig;
  commander: {
    delegation_delay_ms: number;
    synthesis_delay_ms: number;
  };
  logs: {
    retention: number;
  };
}
