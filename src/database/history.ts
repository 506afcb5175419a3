import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';
import type { CollectionOutcomes, RunRecord } from '../types/paper.js';

const log = createLogger('history');

interface HistoryData {
  runs: RunRecord[];
}

const outcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('ok') }),
  z.object({ status: z.literal('absent'), reason: z.string() }),
  z.object({ status: z.literal('error'), reason: z.string() }),
]);

const runRecordSchema: z.ZodType<RunRecord> = z.object({
  id: z.string(),
  paperId: z.string(),
  mode: z.string(),
  status: z.enum(['running', 'completed', 'failed']),
  startedAt: z.string(),
  completedAt: z.string().optional(),
  outputPath: z.string().optional(),
  slidesPath: z.string().optional(),
  outcomes: z.object({ metadata: outcomeSchema, summary: outcomeSchema, pdf: outcomeSchema }).optional(),
  errors: z.array(z.string()),
});

const historySchema = z.object({ runs: z.array(runRecordSchema) });

/**
 * Generation runs, newest last, in one JSON file. An unreadable or malformed
 * file is logged and replaced by an empty history on the next write.
 */
export class RunHistory {
  private path: string;
  private db: Low<HistoryData> | null = null;

  constructor(path: string) {
    this.path = path;
  }

  private async open(): Promise<Low<HistoryData>> {
    if (this.db) return this.db;

    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const raw = new Low<unknown>(new JSONFile<unknown>(this.path), null);
    let data: HistoryData = { runs: [] };
    try {
      await raw.read();
      if (raw.data !== null) {
        const parsed = historySchema.safeParse(raw.data);
        if (parsed.success) {
          data = parsed.data;
        } else {
          log.warn(`Malformed run history in ${this.path}, starting fresh`);
        }
      }
    } catch (error) {
      log.warn(`Unreadable run history in ${this.path}, starting fresh`, { error: errorMessage(error) });
    }

    const db = new Low<HistoryData>(new JSONFile<HistoryData>(this.path), data);
    this.db = db;
    return db;
  }

  async startRun(paperId: string, mode: string): Promise<RunRecord> {
    const db = await this.open();
    const run: RunRecord = {
      id: uuidv4(),
      paperId,
      mode,
      status: 'running',
      startedAt: new Date().toISOString(),
      errors: [],
    };
    db.data.runs.push(run);
    await db.write();
    return run;
  }

  async finishRun(
    id: string,
    result: { outputPath?: string; slidesPath?: string; outcomes?: CollectionOutcomes; error?: string }
  ): Promise<RunRecord | undefined> {
    const db = await this.open();
    const run = db.data.runs.find((r) => r.id === id);
    if (!run) return undefined;

    run.status = result.error ? 'failed' : 'completed';
    run.completedAt = new Date().toISOString();
    run.outputPath = result.outputPath;
    run.slidesPath = result.slidesPath;
    run.outcomes = result.outcomes;
    if (result.error) {
      run.errors.push(result.error);
    }
    await db.write();
    return run;
  }

  /** Most recent first. */
  async recentRuns(limit = 10): Promise<RunRecord[]> {
    const db = await this.open();
    return [...db.data.runs].reverse().slice(0, limit);
  }
}
