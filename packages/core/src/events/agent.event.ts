import type {
  AgentEvent,
  AgentEventKind,
  AgentEventMetadata,
  AgentEventRecord,
} from '@warroom/shared';

export const AGENT_EVENT_KINDS: readonly AgentEventKind[] = [
  'thinking',
  'action',
  'observation',
  'theory',
  'challenge',
  'decision',
];

function freezeDeep<T>(value: T): T {
  // Typed arrays with elements cannot be frozen.
  if (
    value !== null &&
    typeof value === 'object' &&
    !ArrayBuffer.isView(value) &&
    !Object.isFrozen(value)
  ) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      freezeDeep(nested);
    }
  }
  return value;
}

// A bag holding something structuredClone rejects (a function, a symbol) is
// copied one level only, and its nested values are left unfrozen since they
// still belong to the caller.
function snapshotMetadata(metadata: AgentEventMetadata): Readonly<AgentEventMetadata> {
  let copy: AgentEventMetadata;
  try {
    copy = structuredClone(metadata);
  } catch {
    return Object.freeze({ ...metadata });
  }
  return freezeDeep(copy);
}

/**
 * Build an event stamped with the current time. The metadata bag is copied
 * deeply and frozen along with the event, so neither the caller nor a
 * listener can change what other listeners see.
 */
export function createAgentEvent(
  agentName: string,
  kind: AgentEventKind,
  content: string,
  metadata: AgentEventMetadata = {},
): AgentEvent {
  return Object.freeze({
    agentName,
    kind,
    content,
    metadata: snapshotMetadata(metadata),
    timestamp: new Date().toISOString(),
  });
}

export function toRecord(event: AgentEvent): AgentEventRecord {
  return {
    agent: event.agentName,
    type: event.kind,
    content: event.content,
    metadata: { ...event.metadata },
    timestamp: event.timestamp,
  };
}

/** One-line rendering, e.g. `[Commander] thinking: Beginning incident assessment...` */
export function describeEvent(event: AgentEvent): string {
  return `[${event.agentName}] ${event.kind}: ${event.content}`;
}
