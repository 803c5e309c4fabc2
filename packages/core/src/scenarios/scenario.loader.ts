import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import type { Incident } from '@warroom/shared';
import { parseIncident } from './incident.parser.js';

/** Bundled latency-spike incident used when no scenario file is given. */
export const DEFAULT_SCENARIO_PATH = fileURLToPath(new URL('./latency-spike.json', import.meta.url));

export async function loadScenario(file: string = DEFAULT_SCENARIO_PATH): Promise<Incident> {
  const raw = await fs.readFile(file, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err: unknown) {
    throw new Error(
      `Scenario ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  const incident = parseIncident(parsed);
  if (!incident) {
    throw new Error(`Scenario ${file} does not describe an incident`);
  }
  return incident;
}
