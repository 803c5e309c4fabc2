import type { WarRoomConfig } from '@warroom/shared';

export const DEFAULT_CONFIG: WarRoomConfig = {
  provider: {
    name: 'nvidia',
    model: 'nvidia/llama-3.3-nemotron-super-49b-v1.5',
    base_url: 'https://integrate.api.nvidia.com/v1',
    min_thinking_tokens: 512,
    max_thinking_tokens: 2048,
    temperature: 0.6,
    top_p: 0.95,
    max_tokens: 2048,
    stream: true,
    reasoning_directive: '/think',
  },
  commander: {
    delegation_delay_ms: 500,
    synthesis_delay_ms: 300,
  },
  logs: {
    retention: 50,
  },
};
