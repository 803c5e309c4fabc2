import type { AgentEvent, AgentEventKind, AgentEventMetadata } from '@warroom/shared';

export interface KindStyle {
  icon: string;
  label: string;
}

/** Icons and labels for the live feed. */
export const KIND_STYLES: Record<AgentEventKind, KindStyle> = {
  thinking: { icon: '🤔', label: 'THINKING' },
  action: { icon: '⚡', label: 'ACTION' },
  observation: { icon: '👁️', label: 'OBSERVE' },
  theory: { icon: '💡', label: 'THEORY' },
  challenge: { icon: '⚔️', label: 'CHALLENGE' },
  decision: { icon: '⚖️', label: 'DECISION' },
};

/** Icons for the one-line `--simple` output. */
export const SIMPLE_ICONS: Record<AgentEventKind, string> = {
  thinking: '💭',
  action: '⚡',
  observation: '👁️',
  theory: '💡',
  challenge: '⚔️',
  decision: '✅',
};

const INTERESTING_METADATA = ['confidence', 'tool', 'priority', 'severity'];

/** Local wall-clock time of an ISO timestamp, as HH:MM:SS. */
export function formatClock(iso: string): string {
  const date = new Date(iso);
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * The metadata worth showing under an event, e.g. `confidence=0.85, tool=get_metrics`.
 * Empty when none of the interesting keys are present.
 */
export function formatMetadata(metadata: AgentEventMetadata): string {
  return Object.entries(metadata)
    .filter(([key, value]) => INTERESTING_METADATA.includes(key) && value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
    .join(', ');
}

export function formatSimpleLine(event: AgentEvent): string {
  return `${formatClock(event.timestamp)} ${SIMPLE_ICONS[event.kind]} [${event.agentName}] ${event.content}`;
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

export interface AgentActivity {
  agentName: string;
  /** Event counts per kind, in order of first appearance. */
  counts: Array<{ kind: AgentEventKind; count: number }>;
}

export interface DecisionEntry {
  time: string;
  agentName: string;
  content: string;
}

export interface WarRoomSummary {
  agents: AgentActivity[];
  decisions: DecisionEntry[];
}

export function summarizeEvents(events: readonly AgentEvent[]): WarRoomSummary {
  const byAgent = new Map<string, Map<AgentEventKind, number>>();
  const decisions: DecisionEntry[] = [];

  for (const event of events) {
    let counts = byAgent.get(event.agentName);
    if (!counts) {
      counts = new Map();
      byAgent.set(event.agentName, counts);
    }
    counts.set(event.kind, (counts.get(event.kind) ?? 0) + 1);

    if (event.kind === 'decision') {
      decisions.push({
        time: formatClock(event.timestamp),
        agentName: event.agentName,
        content: event.content,
      });
    }
  }

  const agents = [...byAgent].map(([agentName, counts]) => ({
    agentName,
    counts: [...counts].map(([kind, count]) => ({ kind, count })),
  }));

  return { agents, decisions };
}
