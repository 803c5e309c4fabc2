import type { AgentEventRecord } from './event.types.js';
import type { Incident, InvestigationResult } from './incident.types.js';

// ---- Client → Server messages ----

export type ClientMessage = { type: 'RUN_INVESTIGATION'; payload: { incident: Incident } };

// ---- Server → Client messages ----

export type ServerMessage =
  | { type: 'CONNECTED'; payload: { model: string | null } }
  | { type: 'AGENT_EVENT'; payload: AgentEventRecord }
  | {
      type: 'INVESTIGATION_COMPLETE';
      payload: { incidentId: string; result: InvestigationResult };
    }
  | { type: 'ERROR'; payload: { message: string } };
