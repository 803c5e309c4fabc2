import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Incident, InvestigationRun } from '@warroom/shared';

const LOGS_DIR = path.join('.warroom', 'logs');
const SLUG_MAX = 40;

interface StoredRun {
  file: string;
  run: InvestigationRun;
}

function toSlug(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, SLUG_MAX)
    .replace(/-+$/, '');
  return slug || 'incident';
}

function incidentLabel(incident: Incident): string {
  return incident.id ?? incident.symptom ?? 'incident';
}

/** `2024-10-29T14:30:00.123Z` becomes `20241029T143000123Z`. */
function compactTimestamp(epochMs: number): string {
  return new Date(epochMs).toISOString().replace(/[-:.]/g, '');
}

function newestFirst(a: StoredRun, b: StoredRun): number {
  return b.run.startedAt - a.run.startedAt || b.file.localeCompare(a.file);
}

/**
 * Investigation transcripts under `<projectRoot>/.warroom/logs`, one JSON
 * file per run. The run id is part of the file name, so repeated runs of the
 * same incident never replace each other.
 */
export class RunLogger {
  constructor(private readonly projectRoot: string) {}

  logsDir(): string {
    return path.join(this.projectRoot, LOGS_DIR);
  }

  /** Write the transcript and return its path. */
  async saveRun(run: InvestigationRun): Promise<string> {
    await fs.mkdir(this.logsDir(), { recursive: true });
    const name = [
      compactTimestamp(run.startedAt),
      toSlug(incidentLabel(run.incident)),
      toSlug(run.id),
    ].join('_');
    const file = path.join(this.logsDir(), `${name}.json`);
    await fs.writeFile(file, JSON.stringify(run, null, 2), 'utf-8');
    return file;
  }

  async listRuns(): Promise<InvestigationRun[]> {
    const stored = await this.loadAll();
    return stored.map(({ run }) => run);
  }

  /** Keep the `keep` most recent transcripts by start time; delete the rest. */
  async pruneOldRuns(keep: number): Promise<void> {
    const stored = await this.loadAll();
    for (const { file } of stored.slice(Math.max(0, keep))) {
      await fs.unlink(path.join(this.logsDir(), file));
    }
  }

  /** Every readable transcript, newest first. Unreadable files are reported and left alone. */
  private async loadAll(): Promise<StoredRun[]> {
    let files: string[];
    try {
      files = await fs.readdir(this.logsDir());
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const stored: StoredRun[] = [];
    for (const file of files.filter((f) => f.endsWith('.json'))) {
      try {
        const content = await fs.readFile(path.join(this.logsDir(), file), 'utf-8');
        stored.push({ file, run: JSON.parse(content) as InvestigationRun });
      } catch (err: unknown) {
        process.stderr.write(
          `[warroom] skipping unreadable transcript ${file}: ` +
            `${err instanceof Error ? err.message : String(err)}\n`,
        );
      }
    }
    return stored.sort(newestFirst);
  }
}
