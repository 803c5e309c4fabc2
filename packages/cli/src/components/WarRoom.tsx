import React, { useEffect, useRef, useState } from 'react';
import { Box, Static, Text, useApp } from 'ink';
import type { AgentEvent, Incident, InvestigationResult } from '@warroom/shared';
import { recordInvestigation } from '@warroom/core';
import type { IncidentCommander, RunLogger } from '@warroom/core';
import { THEME } from '../theme.js';
import { IncidentHeader } from './IncidentHeader.js';
import { EventLine } from './EventLine.js';
import { Summary } from './Summary.js';

// Static output is printed once, above the live area, so the header goes through it too.
type FeedItem = { type: 'header' } | { type: 'event'; event: AgentEvent };

interface WarRoomProps {
  commander: IncidentCommander;
  incident: Incident;
  model: string | null;
  /** Save the transcript here when given. */
  logger?: RunLogger;
  retention?: number;
}

/** Live feed of one investigation; exits the ink app once the verdict is in. */
export const WarRoom: React.FC<WarRoomProps> = ({ commander, incident, model, logger, retention }) => {
  const { exit } = useApp();

  const [events, setEvents] = useState<AgentEvent[]>([]);
  const [result, setResult] = useState<InvestigationResult | null>(null);
  const [failure, setFailure] = useState<Error | null>(null);
  const startedRef = useRef(false);

  const feed: FeedItem[] = [
    { type: 'header' },
    ...events.map((event) => ({ type: 'event' as const, event })),
  ];

  // ── Run the investigation once ─────────────────────────────────────────────
  useEffect(() => {
    if (startedRef.current) return;
    startedRef.current = true;

    commander.addEventListener((event) => {
      setEvents((prev) => [...prev, event]);
    });

    recordInvestigation(commander, { incident }, { logger, retention })
      .then((run) => setResult(run.result))
      .catch((err: unknown) => {
        setFailure(err instanceof Error ? err : new Error(String(err)));
      });
  }, []); // eslint-disable-line react-hooks/exhaustive-deps

  // ── Leave once the final frame is drawn ────────────────────────────────────
  useEffect(() => {
    if (failure) exit(failure);
    else if (result) exit();
  }, [result, failure, exit]);

  return (
    <Box flexDirection="column">
      <Static items={feed}>
        {(item, i) =>
          item.type === 'header' ? (
            <IncidentHeader key="header" incident={incident} model={model} />
          ) : (
            <EventLine key={`${item.event.timestamp}-${i}`} event={item.event} />
          )
        }
      </Static>
      {!result && !failure && (
        <Text color={THEME.dim}>
          Commander phase: {commander.investigationPhase}
        </Text>
      )}
      {failure && <Text color={THEME.error}>Investigation failed: {failure.message}</Text>}
      {result && <Summary events={events} result={result} />}
    </Box>
  );
};
