/**
 * Snapshot schema for follow-up data scraped from the dashboard
 */

export type ErrorCode =
  | 'CREDENTIALS_UNAVAILABLE'
  | 'LOGIN_FAILED'
  | 'NAVIGATION_TIMEOUT'
  | 'TABLE_NOT_FOUND'
  | 'TABLE_NOT_POPULATED'
  | 'EMPTY_SNAPSHOT'
  | 'PERSISTENCE_FAILED'
  | 'RUN_IN_PROGRESS'
  | 'UNKNOWN_ERROR';

export interface FollowUpRecord {
  readonly locationName: string;
  readonly unprocessedFollowUps: number;
  readonly unprocessedCalls: number;
}

export interface SnapshotBatch {
  readonly dtSnapshot: Date; // shared by every insert of the batch
  readonly records: readonly FollowUpRecord[];
}

export type NumericColumn = 'unprocessedFollowUps' | 'unprocessedCalls';

export interface RowParseWarning {
  rowIndex: number;
  locationName: string;
  column: NumericColumn;
  rawText: string;
}

export interface InsertResult {
  locationName: string;
  insertedId: number | null;
  lcode: string | null;
}

export type RunStatus = 'RUNNING' | 'SUCCESS' | 'PARTIAL' | 'FAILED';

export interface RunSummary {
  status: Extract<RunStatus, 'SUCCESS' | 'PARTIAL'>;
  dtSnapshot: Date;
  scrapedCount: number;
  insertedCount: number;
  failedCount: number;
  withoutLcode: string[];
  warnings: RowParseWarning[];
}
