import React from 'react';
import { Box, Text } from 'ink';
import type { AgentEvent, InvestigationResult } from '@warroom/shared';
import { THEME, agentColor } from '../theme.js';
import { summarizeEvents } from '../event.format.js';

interface SummaryProps {
  events: readonly AgentEvent[];
  result: InvestigationResult;
}

export const Summary: React.FC<SummaryProps> = ({ events, result }) => {
  const summary = summarizeEvents(events);

  return (
    <Box flexDirection="column">
      <Box borderStyle="double" borderColor={THEME.success} flexDirection="column" paddingX={1}>
        <Text bold color={THEME.success}>
          INCIDENT RESPONSE COMPLETE
        </Text>
        <Text>
          <Text color={THEME.textDim}>Status: </Text>
          {result.status}
        </Text>
        <Text>
          <Text color={THEME.textDim}>Root Cause: </Text>
          {result.rootCause}
        </Text>
        <Text>
          <Text color={THEME.textDim}>Confidence: </Text>
          {Math.round(result.confidence * 100)}%
        </Text>
      </Box>

      <Box flexDirection="column" marginTop={1}>
        <Text bold>WAR ROOM SUMMARY</Text>
        {summary.agents.map((agent) => (
          <Box key={agent.agentName} flexDirection="column" marginTop={1}>
            <Text color={agentColor(agent.agentName)}>{agent.agentName}:</Text>
            {agent.counts.map(({ kind, count }) => (
              <Text key={kind} color={THEME.textDim}>
                {'  '}- {kind}: {count}
              </Text>
            ))}
          </Box>
        ))}
      </Box>

      {summary.decisions.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text bold>TIMELINE</Text>
          {summary.decisions.map((d, i) => (
            <Text key={`${d.time}-${i}`}>
              <Text color={THEME.dim}>{'  '}{d.time} | </Text>
              {d.agentName}: {d.content}
            </Text>
          ))}
        </Box>
      )}
    </Box>
  );
};
