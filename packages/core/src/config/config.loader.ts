import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import yaml from 'js-yaml';
import type { WarRoomConfig } from '@warroom/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { ConfigurationError } from '../errors.js';

const WARROOM_DIR = path.join(os.homedir(), '.warroom');
const CONFIG_PATH = path.join(WARROOM_DIR, 'config.yaml');

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(override)) {
    const overrideVal = override[key];
    const baseVal = base[key];
    if (isPlainObject(overrideVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined) {
      result[key] = overrideVal;
    }
  }
  return result;
}

function fail(message: string): never {
  throw new ConfigurationError(`Config validation failed: ${message}`);
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value >= 0;
}

function validateProvider(provider: unknown): WarRoomConfig['provider'] {
  if (!isPlainObject(provider)) fail('provider must be a mapping');

  switch (provider.name) {
    case 'none':
      return { name: 'none' };
    case 'nvidia': {
      const {
        model,
        base_url,
        min_thinking_tokens,
        max_thinking_tokens,
        temperature,
        top_p,
        max_tokens,
        stream,
        reasoning_directive,
      } = provider;
      if (typeof model !== 'string' || !model) {
        fail('provider.model must be a non-empty string');
      }
      if (typeof base_url !== 'string' || !base_url) {
        fail('provider.base_url must be a non-empty string');
      }
      if (!Number.isInteger(min_thinking_tokens) || !isNonNegativeNumber(min_thinking_tokens)) {
        fail('provider.min_thinking_tokens must be an integer >= 0');
      }
      if (!Number.isInteger(max_thinking_tokens) || !isNonNegativeNumber(max_thinking_tokens)) {
        fail('provider.max_thinking_tokens must be an integer >= 0');
      }
      if (max_thinking_tokens < min_thinking_tokens) {
        fail('provider.max_thinking_tokens must be >= provider.min_thinking_tokens');
      }
      if (!isNonNegativeNumber(temperature) || temperature > 2) {
        fail('provider.temperature must be between 0 and 2');
      }
      if (typeof top_p !== 'number' || !(top_p > 0 && top_p <= 1)) {
        fail('provider.top_p must be in (0, 1]');
      }
      if (!Number.isInteger(max_tokens) || !isNonNegativeNumber(max_tokens) || max_tokens < 1) {
        fail('provider.max_tokens must be an integer >= 1');
      }
      if (typeof stream !== 'boolean') {
        fail('provider.stream must be true or false');
      }
      if (reasoning_directive !== null && typeof reasoning_directive !== 'string') {
        fail('provider.reasoning_directive must be a string or null');
      }
      return {
        name: 'nvidia',
        model,
        base_url,
        min_thinking_tokens,
        max_thinking_tokens,
        temperature,
        top_p,
        max_tokens,
        stream,
        reasoning_directive,
      };
    }
    default:
      return fail(`unknown provider "${String(provider.name)}"`);
  }
}

/** Check a merged, untyped config tree and return it typed. */
export function validateConfig(raw: unknown): WarRoomConfig {
  if (!isPlainObject(raw)) fail('config must be a mapping');
  const { commander, logs } = raw;

  const provider = validateProvider(raw.provider);

  if (!isPlainObject(commander)) fail('commander must be a mapping');
  if (!isNonNegativeNumber(commander.delegation_delay_ms)) {
    fail('commander.delegation_delay_ms must be >= 0');
  }
  if (!isNonNegativeNumber(commander.synthesis_delay_ms)) {
    fail('commander.synthesis_delay_ms must be >= 0');
  }

  if (!isPlainObject(logs)) fail('logs must be a mapping');
  if (!Number.isInteger(logs.retention) || !isNonNegativeNumber(logs.retention) || logs.retention < 1) {
    fail('logs.retention must be >= 1');
  }

  return {
    provider,
    commander: {
      delegation_delay_ms: commander.delegation_delay_ms,
      synthesis_delay_ms: commander.synthesis_delay_ms,
    },
    logs: { retention: logs.retention },
  };
}

export function writeConfig(config: WarRoomConfig): void {
  validateConfig(config);
  if (!fs.existsSync(WARROOM_DIR)) {
    fs.mkdirSync(WARROOM_DIR, { recursive: true });
  }
  fs.writeFileSync(CONFIG_PATH, yaml.dump(config), 'utf8');
}

export async function loadConfig(): Promise<WarRoomConfig> {
  // Ensure ~/.warroom/ exists
  if (!fs.existsSync(WARROOM_DIR)) {
    fs.mkdirSync(WARROOM_DIR, { recursive: true });
  }

  let userConfig: Record<string, unknown> = {};

  if (fs.existsSync(CONFIG_PATH)) {
    const parsed = yaml.load(fs.readFileSync(CONFIG_PATH, 'utf8'));
    if (isPlainObject(parsed)) {
      userConfig = parsed;
    }
  } else {
    fs.writeFileSync(CONFIG_PATH, yaml.dump(DEFAULT_CONFIG), 'utf8');
    process.stderr.write(`[warroom] created default config at ${CONFIG_PATH}\n`);
  }

  // Switching to a provider without the default's fields must not inherit them.
  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };
  if (isPlainObject(userConfig.provider) && userConfig.provider.name === 'none') {
    defaults.provider = { name: 'none' };
  }

  return validateConfig(deepMerge(defaults, userConfig));
}

export { WARROOM_DIR, CONFIG_PATH };
