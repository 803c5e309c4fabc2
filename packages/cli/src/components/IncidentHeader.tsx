import React from 'react';
import { Box, Text } from 'ink';
import type { Incident } from '@warroom/shared';
import { THEME } from '../theme.js';

interface IncidentHeaderProps {
  incident: Incident;
  model: string | null;
}

export const IncidentHeader: React.FC<IncidentHeaderProps> = ({ incident, model }) => {
  return (
    <Box borderStyle="single" borderColor={THEME.alertDark} flexDirection="column" paddingX={1}>
      <Box justifyContent="space-between">
        <Text bold color={THEME.alert}>
          🚨 INCIDENT WAR ROOM
        </Text>
        <Text color={THEME.dim}>{model ? `model: ${model}` : 'rule-based reasoning'}</Text>
      </Box>
      <Field label="ID" value={incident.id} />
      <Field label="Symptom" value={incident.symptom} />
      <Field label="Severity" value={incident.severity?.toUpperCase()} />
      <Field label="Service" value={incident.service} />
      <Field label="Impact" value={incident.impact} />
    </Box>
  );
};

const Field: React.FC<{ label: string; value?: string }> = ({ label, value }) => {
  if (!value) return null;
  return (
    <Text>
      <Text color={THEME.textDim}>{label}: </Text>
      <Text color={THEME.text}>{value}</Text>
    </Text>
  );
};
