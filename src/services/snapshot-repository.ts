import { z } from 'zod';
import { AppConfig, CONFIG, InsertFailurePolicy } from '../config/constants';
import { ProcedureClient } from '../db/procedures';
import { FollowUpRecord, InsertResult, SnapshotBatch } from '../types/snapshot';
import { PersistenceError, errorMessage } from '../utils/error-handler';
import { logger } from '../utils/logger';
import { timed } from '../utils/promise-helpers';

export const PROCEDURES = {
  TRUNCATE: 'TruncateOutstandingFollowUpSnapshot',
  INSERT: 'GetOutstandingCPFollowUps',
  DELETE_TEST_RECORDS: 'DeleteTestFollowUpRecords'
} as const;

const insertRowSchema = z.object({
  InsertedID: z.union([z.number(), z.string()]).nullable().optional(),
  Lcode: z.string().nullable().optional()
});

const deleteRowSchema = z.object({
  DeletedCount: z.number().int().nonnegative()
});

export interface PersistOutcome {
  inserted: InsertResult[];
  failed: Array<{ locationName: string; error: string }>;
  withoutLcode: string[];
}

export class SnapshotRepository {
  constructor(
    private readonly client: ProcedureClient,
    private readonly config: AppConfig = CONFIG
  ) {}

  private qualified(name: string): string {
    return `${this.config.DATABASE.SCHEMA}.${name}`;
  }

  async truncate(): Promise<void> {
    const name = this.qualified(PROCEDURES.TRUNCATE);
    try {
      await this.client.callProcedure(name);
    } catch (e) {
      throw new PersistenceError(`Truncate failed: ${errorMessage(e)}`, name);
    }
  }

  async insert(dtSnapshot: Date, record: FollowUpRecord): Promise<InsertResult> {
    const name = this.qualified(PROCEDURES.INSERT);
    let row: z.infer<typeof insertRowSchema>;

    try {
      const result = await timed(
        `${PROCEDURES.INSERT}(${record.locationName})`,
        () => this.client.callProcedure(name, [
          { name: 'dtSnapshot', type: 'datetime', value: dtSnapshot },
          { name: 'CallPotential_LocationName', type: 'varchar', value: record.locationName },
          { name: 'UnprocessedFollowUps', type: 'int', value: record.unprocessedFollowUps },
          { name: 'UnprocessedCalls', type: 'int', value: record.unprocessedCalls }
        ]),
        this.config.PERFORMANCE.PROCEDURE_SLOW
      );

      const first = result.recordset[0];
      if (!first) {
        throw new Error('procedure returned no result row');
      }
      row = insertRowSchema.parse(first);
    } catch (e) {
      throw new PersistenceError(
        `Insert failed for "${record.locationName}" at ${dtSnapshot.toISOString()}: ${errorMessage(e)}`,
        name,
        record.locationName,
        dtSnapshot
      );
    }

    const insertedId = row.InsertedID === null || row.InsertedID === undefined
      ? null
      : Number(row.InsertedID);

    return {
      locationName: record.locationName,
      insertedId: Number.isFinite(insertedId) ? insertedId : null,
      lcode: row.Lcode ?? null
    };
  }

  async deleteTestRecords(locationName: string): Promise<number> {
    const name = this.qualified(PROCEDURES.DELETE_TEST_RECORDS);
    try {
      const result = await this.client.callProcedure(name, [
        { name: 'CallPotential_LocationName', type: 'varchar', value: locationName }
      ]);
      const first = result.recordset[0];
      return first ? deleteRowSchema.parse(first).DeletedCount : 0;
    } catch (e) {
      throw new PersistenceError(`Deleting test records failed: ${errorMessage(e)}`, name, locationName);
    }
  }

  /**
   * Truncate once, then one insert per record in batch order.
   */
  async persist(
    batch: SnapshotBatch,
    policy: InsertFailurePolicy = this.config.PERSISTENCE.ON_INSERT_FAILURE
  ): Promise<PersistOutcome> {
    const outcome: PersistOutcome = { inserted: [], failed: [], withoutLcode: [] };
    const total = batch.records.length;

    logger.info('Truncating snapshot table...');
    await this.truncate();

    logger.info(`Inserting ${total} records (on failure: ${policy})...`);
    for (const [index, record] of batch.records.entries()) {
      try {
        const result = await this.insert(batch.dtSnapshot, record);
        outcome.inserted.push(result);
        if (result.lcode === null) {
          outcome.withoutLcode.push(record.locationName);
        }
      } catch (e) {
        if (policy === 'abort') {
          throw e;
        }
        logger.error(errorMessage(e));
        outcome.failed.push({ locationName: record.locationName, error: errorMessage(e) });
      }

      if ((index + 1) % 50 === 0) {
        logger.info(`  Processed ${index + 1}/${total} records...`);
      }
    }

    logger.info(`Insert complete: ${outcome.inserted.length} saved, ${outcome.failed.length} failed`);
    if (outcome.withoutLcode.length > 0) {
      logger.warn(`${outcome.withoutLcode.length} location(s) without Lcode:`);
      for (const location of outcome.withoutLcode.slice(0, 10)) {
        logger.warn(`  - ${location}`);
      }
      if (outcome.withoutLcode.length > 10) {
        logger.warn(`  ... and ${outcome.withoutLcode.length - 10} more`);
      }
    }

    return outcome;
  }
}
