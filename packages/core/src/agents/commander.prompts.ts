import type { Incident, InvestigationArea } from '@warroom/shared';

export const COMMANDER_SYSTEM_CONTEXT = `You are a senior SRE and incident commander with deep expertise in:
- Distributed systems debugging
- Performance analysis
- Root cause analysis
- Production incident response

Analyze incidents systematically and provide actionable root cause determinations.`;

function field(incident: Incident, key: 'id' | 'symptom' | 'severity' | 'service' | 'impact'): string {
  return incident[key] ?? 'unknown';
}

/** User turn asking the model for a root cause given what the commander looked at. */
export function buildRootCausePrompt(incident: Incident, areas: InvestigationArea[]): string {
  return [
    'You are an incident commander analyzing a production incident.',
    '',
    'INCIDENT DETAILS:',
    `- ID: ${field(incident, 'id')}`,
    `- Symptom: ${field(incident, 'symptom')}`,
    `- Severity: ${field(incident, 'severity')}`,
    `- Service: ${field(incident, 'service')}`,
    `- Impact: ${field(incident, 'impact')}`,
    '',
    'INVESTIGATION AREAS EXAMINED:',
    areas.join(', '),
    '',
    'Based on the incident symptoms and investigation areas, determine the most likely root cause.',
    'Provide your analysis and the root cause determination.',
  ].join('\n');
}
