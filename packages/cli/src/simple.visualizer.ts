import type { AgentEvent, Incident, InvestigationResult } from '@warroom/shared';
import { formatSimpleLine } from './event.format.js';

type Write = (line: string) => void;

const writeLine: Write = (line) => {
  process.stdout.write(line + '\n');
};

/** Plain one-line-per-event output for terminals without ink, or for piping. */
export class SimpleVisualizer {
  constructor(private readonly write: Write = writeLine) {}

  readonly onEvent = (event: AgentEvent): void => {
    this.write(formatSimpleLine(event));
  };

  printIncident(incident: Incident): void {
    this.write(`INCIDENT ${incident.id ?? '(no id)'}: ${incident.symptom ?? 'unknown symptom'}`);
    if (incident.severity) this.write(`  Severity: ${incident.severity.toUpperCase()}`);
    if (incident.service) this.write(`  Service: ${incident.service}`);
    this.write('');
  }

  printResult(result: InvestigationResult): void {
    this.write('');
    this.write(`Status: ${result.status}`);
    this.write(`Root Cause: ${result.rootCause}`);
    this.write(`Confidence: ${Math.round(result.confidence * 100)}%`);
  }
}
