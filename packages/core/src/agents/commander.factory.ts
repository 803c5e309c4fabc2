import type { ReasoningProvider, WarRoomConfig } from '@warroom/shared';
import { IncidentCommander } from './commander.agent.js';

/** Commander wired with the phase timing from config. */
export function createCommander(config: WarRoomConfig, provider?: ReasoningProvider): IncidentCommander {
  return new IncidentCommander(provider, {
    delegationDelayMs: config.commander.delegation_delay_ms,
    synthesisDelayMs: config.commander.synthesis_delay_ms,
  });
}
