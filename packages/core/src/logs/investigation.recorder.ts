import { randomUUID } from 'node:crypto';
import type {
  AgentEventRecord,
  InvestigationContext,
  InvestigationRun,
} from '@warroom/shared';
import type { IncidentCommander } from '../agents/commander.agent.js';
import { toRecord } from '../events/agent.event.js';
import type { RunLogger } from './run.logger.js';

export interface RecordOptions {
  /** Where to persist the transcript. Nothing is written when omitted. */
  logger?: RunLogger;
  /** Transcripts to keep after saving. */
  retention?: number;
}

/**
 * Run the commander while capturing every event it emits, and optionally
 * persist the transcript. Attach to a fresh commander: the capture listener
 * stays registered afterwards.
 */
export async function recordInvestigation(
  commander: IncidentCommander,
  context: InvestigationContext,
  options: RecordOptions = {},
): Promise<InvestigationRun> {
  const events: AgentEventRecord[] = [];
  commander.addEventListener((event) => events.push(toRecord(event)));

  const startedAt = Date.now();
  const result = await commander.run(context);

  const run: InvestigationRun = {
    id: randomUUID(),
    incident: context.incident ?? {},
    startedAt,
    finishedAt: Date.now(),
    result,
    events,
  };

  if (options.logger) {
    await options.logger.saveRun(run);
    if (options.retention !== undefined) {
      await options.logger.pruneOldRuns(options.retention);
    }
  }
  return run;
}
