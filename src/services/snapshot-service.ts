import path from 'path';
import { AppConfig, CONFIG } from '../config/constants';
import { ProcedureClient } from '../db/procedures';
import { DashboardCredentials, DashboardSession } from '../types/session';
import { LocatedTable } from '../types/table';
import { RunSummary } from '../types/snapshot';
import {
  AppError,
  EmptySnapshotError,
  TableNotFoundError,
  TableNotPopulatedError,
  errorMessage,
  toAppError
} from '../utils/error-handler';
import { logger } from '../utils/logger';
import { delay } from '../utils/promise-helpers';
import { fileTimestamp } from '../utils/timestamp';
import { SecretStore, loadRunCredentials } from './credentials';
import { SnapshotRepository } from './snapshot-repository';
import {
  ParsedRows,
  countNonZeroCells,
  createSnapshotBatch,
  isTablePopulated,
  locateFollowUpTable,
  parseFollowUpRows
} from './table-parser';

export interface SnapshotServiceDeps {
  secrets: SecretStore;
  createSession: () => DashboardSession;
  connectProcedures: (password: string) => Promise<ProcedureClient>;
  config?: AppConfig;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * One snapshot run: credentials, database, browser, login, table, truncate, inserts.
 * Browser and connection are released on every exit path.
 */
export class SnapshotService {
  private readonly secrets: SecretStore;
  private readonly createSession: () => DashboardSession;
  private readonly connectProcedures: (password: string) => Promise<ProcedureClient>;
  private readonly config: AppConfig;
  private readonly now: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(deps: SnapshotServiceDeps) {
    this.secrets = deps.secrets;
    this.createSession = deps.createSession;
    this.connectProcedures = deps.connectProcedures;
    this.config = deps.config ?? CONFIG;
    this.now = deps.now ?? (() => new Date());
    this.sleep = deps.sleep ?? delay;
  }

  async run(): Promise<RunSummary> {
    // Credentials first: a missing secret must stop the run before any network activity
    const credentials = await loadRunCredentials(this.secrets, this.config);
    const client = await this.connectProcedures(credentials.databasePassword);
    let session: DashboardSession | null = null;

    try {
      session = this.createSession();
      const parsed = await this.scrape(session, credentials.dashboard);
      const batch = createSnapshotBatch(parsed.records, this.now());

      const repository = new SnapshotRepository(client, this.config);
      const outcome = await repository.persist(batch);

      return {
        status: outcome.failed.length > 0 ? 'PARTIAL' : 'SUCCESS',
        dtSnapshot: batch.dtSnapshot,
        scrapedCount: batch.records.length,
        insertedCount: outcome.inserted.length,
        failedCount: outcome.failed.length,
        withoutLcode: outcome.withoutLcode,
        warnings: parsed.warnings
      };
    } catch (e) {
      const failure = toAppError(e);
      if (session) {
        await this.captureDiagnostics(session, failure);
      }
      throw failure;
    } finally {
      if (session) {
        await this.release('browser', session);
      }
      await this.release('database connection', client);
    }
  }

  private async scrape(session: DashboardSession, credentials: DashboardCredentials): Promise<ParsedRows> {
    await session.open();
    await session.login(credentials);
    await session.openFollowUps();

    const located = await this.waitForFollowUpTable(session);
    const { table, columns } = located;
    logger.info(`Found follow-ups table (frame ${table.frameIndex + 1}, table ${table.tableIndex + 1})`);
    logger.debug(`Headers: ${table.headers.join(' | ')}`);
    logger.debug(`Columns: location=${columns.location}, follow-ups=${columns.followUps}, calls=${columns.calls ?? 'none'}`);
    if (columns.calls === null) {
      logger.warn('No unprocessed calls column found; recording 0 calls for every location');
    }

    const parsed = parseFollowUpRows(located);
    for (const warning of parsed.warnings) {
      logger.warn(
        `Row ${warning.rowIndex + 1} (${warning.locationName}): could not parse ${warning.column} from "${warning.rawText}", using 0`
      );
    }
    logger.info(`Scraped ${parsed.records.length} records (${parsed.skipped} rows skipped)`);

    if (parsed.records.length === 0) {
      throw new EmptySnapshotError('No rows with a location name found in the follow-ups table');
    }
    return parsed;
  }

  private async waitForFollowUpTable(session: DashboardSession): Promise<LocatedTable> {
    const { POLL_ATTEMPTS, POLL_INTERVAL, MIN_NONZERO_CELLS, MIN_NONZERO_RATIO, REQUIRE_POPULATED } = this.config.TABLE;
    const threshold = { minNonZeroCells: MIN_NONZERO_CELLS, minNonZeroRatio: MIN_NONZERO_RATIO };
    let located: LocatedTable | null = null;

    logger.info('Waiting for follow-ups table data to load...');
    for (let attempt = 1; attempt <= POLL_ATTEMPTS; attempt++) {
      located = locateFollowUpTable(await session.readTables());
      if (located && isTablePopulated(located, threshold)) {
        return located;
      }

      const state = located
        ? `table has ${located.table.rows.length} rows but only ${countNonZeroCells(located)} non-zero values`
        : 'no table with Location and Follow-Ups headers yet';
      logger.info(`  Attempt ${attempt}/${POLL_ATTEMPTS}: ${state}`);

      if (attempt < POLL_ATTEMPTS) {
        await this.sleep(POLL_INTERVAL);
      }
    }

    if (!located) {
      throw new TableNotFoundError('Could not find a table with Location and Follow-Ups columns');
    }
    if (REQUIRE_POPULATED) {
      throw new TableNotPopulatedError(
        `Follow-ups table did not load real data after ${POLL_ATTEMPTS} attempts`
      );
    }

    // A quiet day looks the same as placeholder zeros
    logger.warn(
      `Follow-ups table has only ${countNonZeroCells(located)} non-zero values after ${POLL_ATTEMPTS} attempts; using it as shown`
    );
    return located;
  }

  private async captureDiagnostics(session: DashboardSession, failure: AppError): Promise<void> {
    const outputPath = path.join(
      this.config.STORAGE.SCREENSHOT_DIR,
      `error_screenshot_${fileTimestamp(this.now())}.png`
    );

    try {
      if (await session.captureScreenshot(outputPath)) {
        failure.screenshotPath = outputPath;
      }
    } catch (e) {
      // The run's own error is what gets reported
      logger.warn(`Diagnostic screenshot failed: ${errorMessage(e)}`);
    }
  }

  private async release(what: string, resource: { close(): Promise<void> }): Promise<void> {
    try {
      await resource.close();
    } catch (e) {
      logger.warn(`Failed to close ${what}: ${errorMessage(e)}`);
    }
  }
}
