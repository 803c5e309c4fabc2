import type { InvestigationArea } from '@warroom/shared';

export const DEFAULT_SPECIALIST = 'General Investigator';

const SPECIALISTS = new Map<string, string>([
  ['metrics', 'System Investigator'],
  ['logs', 'System Investigator'],
  ['recent_changes', 'Code Detective'],
  ['git_history', 'Code Detective'],
]);

/** Which specialist owns an investigation area. */
export function assignSpecialist(area: InvestigationArea | string): string {
  return SPECIALISTS.get(area) ?? DEFAULT_SPECIALIST;
}
