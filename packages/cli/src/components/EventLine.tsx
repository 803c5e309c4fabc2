import React from 'react';
import { Box, Text } from 'ink';
import type { AgentEvent } from '@warroom/shared';
import { THEME, agentColor } from '../theme.js';
import { KIND_STYLES, formatClock, formatMetadata } from '../event.format.js';

interface EventLineProps {
  event: AgentEvent;
}

export const EventLine: React.FC<EventLineProps> = ({ event }) => {
  const style = KIND_STYLES[event.kind];
  const metadata = formatMetadata(event.metadata);
  const labelColor =
    event.kind === 'decision'
      ? THEME.success
      : event.kind === 'challenge'
        ? THEME.warning
        : THEME.textDim;

  return (
    <Box flexDirection="column" marginBottom={1}>
      <Box gap={1}>
        <Text color={THEME.dim}>[{formatClock(event.timestamp)}]</Text>
        <Text>{style.icon}</Text>
        <Text bold color={agentColor(event.agentName)}>
          [{event.agentName}]
        </Text>
        <Text color={labelColor}>{style.label}</Text>
      </Box>
      <Box paddingLeft={2}>
        <Text color={THEME.text}>{event.content}</Text>
      </Box>
      {metadata && (
        <Box paddingLeft={2}>
          <Text color={THEME.dim}>({metadata})</Text>
        </Box>
      )}
    </Box>
  );
};
