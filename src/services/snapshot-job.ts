import { RunSummary } from '../types/snapshot';
import { errorMessage, handleError } from '../utils/error-handler';
import { LockOptions, withLock } from '../utils/lock';
import { logger } from '../utils/logger';
import { RunHistory } from './run-history';

export interface SnapshotRunner {
  run(): Promise<RunSummary>;
}

export interface JobResult {
  runId: number;
  summary: RunSummary;
}

export type SnapshotJob = () => Promise<JobResult>;

/**
 * Runs one snapshot under the run lock and records it in the run history.
 * Failures are logged and recorded, then rethrown as AppError.
 */
export async function runSnapshotJob(
  runner: SnapshotRunner,
  history: RunHistory,
  lockOptions: LockOptions = {}
): Promise<JobResult> {
  return withLock(async () => {
    const runId = await history.start().catch((e: unknown) => {
      throw handleError(e, 'run history');
    });
    logger.info(`Snapshot run ${runId} started`);

    try {
      const summary = await runner.run();
      await history.succeed(runId, summary);
      logger.info(
        `Snapshot run ${runId} ${summary.status}: ${summary.insertedCount}/${summary.scrapedCount} inserted, ` +
        `${summary.failedCount} failed, ${summary.withoutLcode.length} without Lcode`
      );
      return { runId, summary };
    } catch (e) {
      const failure = handleError(e, `run ${runId}`);
      try {
        await history.fail(runId, {
          code: failure.code,
          message: failure.message,
          screenshotPath: failure.screenshotPath
        });
      } catch (recordError) {
        logger.error(`Could not record failure of run ${runId}: ${errorMessage(recordError)}`);
      }
      throw failure;
    }
  }, { overrideStale: true, ...lockOptions });
}

export function createSnapshotJob(
  runner: SnapshotRunner,
  history: RunHistory,
  lockOptions: LockOptions = {}
): SnapshotJob {
  return () => runSnapshotJob(runner, history, lockOptions);
}
