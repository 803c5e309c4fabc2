/**
 * Incident as reported by the outside world. The core only reads the fields
 * listed here; anything else rides along untouched.
 */
export interface Incident {
  id?: string;
  symptom?: string;
  severity?: string;
  service?: string;
  impact?: string;
  startedAt?: string;
  affectedEndpoints?: string[];
  [key: string]: unknown;
}

export interface TimelineEntry {
  timestamp: string;
  description: string;
}

export type InvestigationArea = 'metrics' | 'logs' | 'recent_changes' | 'git_history';

export type InvestigationPhase = 'initial' | 'delegating' | 'synthesizing' | 'concluding';

export interface DelegatedTask {
  area: InvestigationArea;
  assignedTo: string;
  status: 'pending' | 'completed';
}

/** Finding handed to the commander by another investigator. */
export interface Theory {
  description: string;
  agent?: string;
  confidence?: number;
  [key: string]: unknown;
}

export interface InvestigationContext {
  incident?: Incident;
  timeline?: TimelineEntry[];
}

export interface InvestigationResult {
  status: 'resolved';
  rootCause: string;
  confidence: number;
  timeline: TimelineEntry[];
}
