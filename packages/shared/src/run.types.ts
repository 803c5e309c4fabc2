import type { AgentEventRecord } from './event.types.js';
import type { Incident, InvestigationResult } from './incident.types.js';

/** Persisted transcript of one Commander run. */
export interface InvestigationRun {
  id: string;
  incident: Incident;
  /** Epoch milliseconds */
  startedAt: number;
  finishedAt: number;
  result: InvestigationResult;
  events: AgentEventRecord[];
}
