import { Database } from '../db/schema';
import { ErrorCode, RunStatus, RunSummary } from '../types/snapshot';

export type RunRecord = {
  id: number;
  startedAt: string;
  finishedAt: string | null;
  status: RunStatus;
  snapshotAt: string | null;
  scrapedCount: number | null;
  insertedCount: number | null;
  failedCount: number | null;
  withoutLcodeCount: number | null;
  warningCount: number | null;
  errorCode: ErrorCode | null;
  errorMessage: string | null;
  screenshotPath: string | null;
};

export interface RunFailure {
  code: ErrorCode;
  message: string;
  screenshotPath: string | null;
}

export class RunHistory {
  constructor(private readonly db: Database) {}

  async start(startedAt: Date = new Date()): Promise<number> {
    const result = await this.db.run(
      "INSERT INTO runs (startedAt, status) VALUES (?, 'RUNNING')",
      startedAt.toISOString()
    );
    return result.lastID;
  }

  async succeed(id: number, summary: RunSummary, finishedAt: Date = new Date()): Promise<void> {
    await this.db.run(
      `UPDATE runs
         SET finishedAt = ?, status = ?, snapshotAt = ?, scrapedCount = ?, insertedCount = ?,
             failedCount = ?, withoutLcodeCount = ?, warningCount = ?
       WHERE id = ?`,
      finishedAt.toISOString(),
      summary.status,
      summary.dtSnapshot.toISOString(),
      summary.scrapedCount,
      summary.insertedCount,
      summary.failedCount,
      summary.withoutLcode.length,
      summary.warnings.length,
      id
    );
  }

  async fail(id: number, failure: RunFailure, finishedAt: Date = new Date()): Promise<void> {
    await this.db.run(
      `UPDATE runs
         SET finishedAt = ?, status = 'FAILED', errorCode = ?, errorMessage = ?, screenshotPath = ?
       WHERE id = ?`,
      finishedAt.toISOString(),
      failure.code,
      failure.message,
      failure.screenshotPath,
      id
    );
  }

  async get(id: number): Promise<RunRecord | undefined> {
    return this.db.get<RunRecord>('SELECT * FROM runs WHERE id = ?', id);
  }

  async latest(): Promise<RunRecord | undefined> {
    return this.db.get<RunRecord>('SELECT * FROM runs ORDER BY startedAt DESC, id DESC LIMIT 1');
  }

  async list(limit: number = 20): Promise<RunRecord[]> {
    return this.db.all<RunRecord>(
      'SELECT * FROM runs ORDER BY startedAt DESC, id DESC LIMIT ?',
      limit
    );
  }
}
