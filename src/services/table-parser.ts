import { ColumnMap, LocatedTable, RawTable } from '../types/table';
import { FollowUpRecord, NumericColumn, RowParseWarning, SnapshotBatch } from '../types/snapshot';

export const HEADER_PATTERNS = {
  location: /location/i,
  followUps: /follow[- ]?ups?/i,
  calls: /unprocessed|calls/i
} as const;

export interface PopulationThreshold {
  minNonZeroCells: number;
  minNonZeroRatio: number;
}

export interface ParsedRows {
  records: FollowUpRecord[];
  warnings: RowParseWarning[];
  skipped: number;
}

export function normalizeHeader(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Map header texts to column indices. Selection is by header text only, so a
 * reordered table resolves to the same fields.
 */
export function resolveColumns(headers: string[]): ColumnMap | null {
  const normalized = headers.map(normalizeHeader);
  const location = normalized.findIndex(h => HEADER_PATTERNS.location.test(h));
  const followUps = normalized.findIndex(
    (h, i) => i !== location && HEADER_PATTERNS.followUps.test(h)
  );

  if (location === -1 || followUps === -1) {
    return null;
  }

  // "Unprocessed Follow-Ups" must not be mistaken for the calls column
  const calls = normalized.findIndex(
    (h, i) => i !== location && i !== followUps && HEADER_PATTERNS.calls.test(h)
  );

  return { location, followUps, calls: calls === -1 ? null : calls };
}

export function locateFollowUpTable(tables: RawTable[]): LocatedTable | null {
  const ordered = [...tables].sort(
    (a, b) => a.frameIndex - b.frameIndex || a.tableIndex - b.tableIndex
  );
  for (const table of ordered) {
    const columns = resolveColumns(table.headers);
    if (columns) {
      return { table, columns };
    }
  }
  return null;
}

/**
 * Digits only: "1,234" -> 1234, "N/A" -> null.
 */
export function parseCount(text: string): number | null {
  const digits = text.replace(/\D/g, '');
  if (!digits) {
    return null;
  }
  const value = parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : null;
}

function dataRows(located: LocatedTable) {
  return located.table.rows.filter(row => !row.hidden && !row.groupHeader);
}

export function parseFollowUpRows(located: LocatedTable): ParsedRows {
  const { columns } = located;
  const records: FollowUpRecord[] = [];
  const warnings: RowParseWarning[] = [];
  let skipped = 0;

  located.table.rows.forEach((row, rowIndex) => {
    if (row.hidden || row.groupHeader) {
      skipped++;
      return;
    }

    const locationName = (row.cells[columns.location] ?? '').trim();
    if (!locationName) {
      skipped++;
      return;
    }

    const readCount = (column: NumericColumn, index: number | null): number => {
      if (index === null) {
        return 0;
      }
      const rawText = row.cells[index] ?? '';
      const value = parseCount(rawText);
      if (value === null) {
        warnings.push({ rowIndex, locationName, column, rawText });
        return 0;
      }
      return value;
    };

    records.push(Object.freeze({
      locationName,
      unprocessedFollowUps: readCount('unprocessedFollowUps', columns.followUps),
      unprocessedCalls: readCount('unprocessedCalls', columns.calls)
    }));
  });

  return { records, warnings, skipped };
}

export function countNonZeroCells(located: LocatedTable): number {
  const { columns } = located;
  const numericColumns = [columns.followUps, columns.calls].filter(
    (index): index is number => index !== null
  );

  let count = 0;
  for (const row of dataRows(located)) {
    for (const index of numericColumns) {
      const value = parseCount(row.cells[index] ?? '');
      if (value !== null && value > 0) {
        count++;
      }
    }
  }
  return count;
}

/**
 * The dashboard paints placeholder zeros before its data request completes.
 */
export function isTablePopulated(located: LocatedTable, threshold: PopulationThreshold): boolean {
  const rowCount = dataRows(located).length;
  if (rowCount === 0) {
    return false;
  }
  const required = Math.max(
    threshold.minNonZeroCells,
    Math.floor(rowCount * threshold.minNonZeroRatio)
  );
  return countNonZeroCells(located) >= required;
}

export function createSnapshotBatch(records: FollowUpRecord[], now: Date = new Date()): SnapshotBatch {
  return Object.freeze({
    dtSnapshot: new Date(now.getTime()),
    records: Object.freeze([...records])
  });
}
