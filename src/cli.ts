#!/usr/bin/env node

import { AppConfig, CONFIG } from './config/constants';
import { MssqlProcedureClient, ProcedureClient } from './db/procedures';
import { Database, initDatabase } from './db/schema';
import { SecretStore, createSecretStore } from './services/credentials';
import { createSnapshotService } from './services/factory';
import { RunHistory } from './services/run-history';
import { SnapshotRunner, runSnapshotJob } from './services/snapshot-job';
import { SnapshotRepository } from './services/snapshot-repository';
import { RunInProgressError, handleError, toAppError } from './utils/error-handler';
import { LockOptions } from './utils/lock';
import { logger } from './utils/logger';

export interface CliDeps {
  config: AppConfig;
  openDatabase: () => Promise<Database>;
  createRunner: () => SnapshotRunner;
  secrets: SecretStore;
  connectProcedures: (password: string) => Promise<ProcedureClient>;
  lockOptions?: LockOptions;
  print?: (line: string) => void;
}

const USAGE = 'Usage: cli <run | history [limit] | delete-test-records <location name>>';

function defaultDeps(): CliDeps {
  return {
    config: CONFIG,
    openDatabase: () => initDatabase(),
    createRunner: () => createSnapshotService(),
    secrets: createSecretStore(),
    connectProcedures: (password) => MssqlProcedureClient.connect(password)
  };
}

async function runDailySnapshot(deps: CliDeps): Promise<number> {
  const db = await deps.openDatabase();
  try {
    const { summary } = await runSnapshotJob(deps.createRunner(), new RunHistory(db), deps.lockOptions);
    if (summary.status === 'PARTIAL') {
      logger.warn(`${summary.failedCount} record(s) failed to insert; see log above`);
    }
    logger.info('Scrape completed successfully!');
    return 0;
  } catch (e) {
    // The job has already logged failures of the run itself
    const failure = e instanceof RunInProgressError ? handleError(e, 'run') : toAppError(e);
    if (failure.screenshotPath) {
      logger.error(`Screenshot saved to ${failure.screenshotPath}`);
    }
    return 1;
  } finally {
    await db.close();
  }
}

async function printHistory(deps: CliDeps, limitArg: string | undefined): Promise<number> {
  const limit = limitArg === undefined ? 10 : Number(limitArg);
  if (!Number.isInteger(limit) || limit < 1) {
    logger.error(`Invalid limit: ${limitArg}`);
    return 1;
  }

  const print = deps.print ?? console.log;
  const db = await deps.openDatabase();
  try {
    const runs = await new RunHistory(db).list(limit);
    if (runs.length === 0) {
      print('No runs recorded');
    }
    for (const run of runs) {
      const counts = run.status === 'FAILED'
        ? `${run.errorCode}: ${run.errorMessage}`
        : `${run.insertedCount ?? 0}/${run.scrapedCount ?? 0} inserted, ${run.failedCount ?? 0} failed`;
      print(`#${run.id} ${run.startedAt} ${run.status} ${counts}`);
    }
    return 0;
  } finally {
    await db.close();
  }
}

async function deleteTestRecords(deps: CliDeps, locationName: string | undefined): Promise<number> {
  if (!locationName) {
    logger.error(USAGE);
    return 1;
  }

  const print = deps.print ?? console.log;
  try {
    const password = await deps.secrets.getSecret(
      deps.config.SECRETS.DATABASE_SERVICE,
      deps.config.DATABASE.USER
    );
    const client = await deps.connectProcedures(password);
    try {
      const deleted = await new SnapshotRepository(client, deps.config).deleteTestRecords(locationName);
      print(`Deleted ${deleted} record(s) for "${locationName}"`);
      return 0;
    } finally {
      await client.close();
    }
  } catch (e) {
    handleError(e, 'delete-test-records');
    return 1;
  }
}

export async function runCli(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const [command, ...args] = argv;

  switch (command) {
    case 'run':
    case 'run-daily-snapshot':
      return runDailySnapshot(deps);
    case 'history':
      return printHistory(deps, args[0]);
    case 'delete-test-records':
      return deleteTestRecords(deps, args.join(' ').trim() || undefined);
    default:
      logger.error(`Unknown command. ${USAGE}`);
      return 1;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => process.exit(code))
    .catch((e: unknown) => {
      logger.error('Unexpected failure:', e);
      process.exit(1);
    });
}
