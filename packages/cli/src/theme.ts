/** War room color palette: alarm red header, one hue per agent. */
export const THEME = {
  /** Red: incident header, severity */
  alert: '#F87171',
  /** Dark red: borders */
  alertDark: '#B91C1C',
  /** Gray: timestamps, metadata */
  dim: '#6B7280',
  /** Dark gray: inactive borders */
  dimBorder: '#374151',
  /** Green: resolved, decisions */
  success: '#22C55E',
  /** Red: error */
  error: '#EF4444',
  /** Amber: warnings, challenges */
  warning: '#F59E0B',
  /** White: primary text */
  text: 'white',
  /** Light gray: secondary text */
  textDim: '#9CA3AF',
} as const;

const AGENT_COLORS: Record<string, string> = {
  Commander: '#E879F9',
  'System Investigator': '#60A5FA',
  'Code Detective': '#FACC15',
  'Root Cause Synthesizer': '#4ADE80',
};

export function agentColor(agentName: string): string {
  return AGENT_COLORS[agentName] ?? THEME.text;
}
