import { describe, it, expect, afterEach, vi } from 'vitest';
import type { WarRoomConfig } from '@warroom/shared';
import { createReasoningProvider } from './provider.factory.js';
import { ReasoningClient } from './reasoning/reasoning.client.js';
import { UnconfiguredProvider } from './unconfigured.provider.js';
import { DEFAULT_CONFIG } from '../config/config.defaults.js';
import { ConfigurationError, NoLLMConfiguredError } from '../errors.js';

function withProvider(provider: WarRoomConfig['provider']): WarRoomConfig {
  return { ...DEFAULT_CONFIG, provider };
}

describe('createReasoningProvider', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('returns an unconfigured provider for "none"', () => {
    const provider = createReasoningProvider(withProvider({ name: 'none' }));
    expect(provider).toBeInstanceOf(UnconfiguredProvider);
    expect(provider.configured).toBe(false);
    expect(provider.model).toBeNull();
  });

  it('builds a ReasoningClient for "nvidia" with an explicit key', () => {
    const provider = createReasoningProvider(DEFAULT_CONFIG, 'test-key');
    expect(provider).toBeInstanceOf(ReasoningClient);
    expect(provider.model).toBe('nvidia/llama-3.3-nemotron-super-49b-v1.5');
  });

  it('reads the key from the environment', () => {
    vi.stubEnv('NVIDIA_API_KEY', 'test-env-key');
    expect(createReasoningProvider(DEFAULT_CONFIG).configured).toBe(true);
  });

  it('fails with ConfigurationError for "nvidia" without any key', () => {
    vi.stubEnv('NVIDIA_API_KEY', '');
    vi.stubEnv('NGC_API_KEY', '');
    expect(() => createReasoningProvider(DEFAULT_CONFIG)).toThrow(ConfigurationError);
  });
});

describe('UnconfiguredProvider', () => {
  it('refuses to respond', async () => {
    const stream = new UnconfiguredProvider().respond();
    await expect(stream.next()).rejects.toBeInstanceOf(NoLLMConfiguredError);
  });

  it('refuses simple queries', async () => {
    await expect(new UnconfiguredProvider().simpleQuery()).rejects.toBeInstanceOf(
      NoLLMConfiguredError,
    );
  });
});
