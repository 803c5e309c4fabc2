import type { Incident } from '@warroom/shared';

const STRING_FIELDS = ['id', 'symptom', 'severity', 'service', 'impact', 'startedAt'] as const;

/**
 * Accept an incident coming from outside (JSON file, socket frame). Returns
 * null unless it is a mapping whose well-known fields have the right types.
 * Unknown fields are kept as they are.
 */
export function parseIncident(value: unknown): Incident | null {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return null;
  }
  const incident: Incident = { ...value };

  for (const key of STRING_FIELDS) {
    const field = incident[key];
    if (field !== undefined && typeof field !== 'string') {
      return null;
    }
  }

  const endpoints = incident.affectedEndpoints;
  if (
    endpoints !== undefined &&
    !(Array.isArray(endpoints) && endpoints.every((e) => typeof e === 'string'))
  ) {
    return null;
  }

  return incident;
}
