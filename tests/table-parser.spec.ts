import { expect, test } from '@playwright/test';
import {
  countNonZeroCells,
  createSnapshotBatch,
  isTablePopulated,
  locateFollowUpTable,
  parseCount,
  parseFollowUpRows,
  resolveColumns
} from '../src/services/table-parser';
import { LocatedTable, RawTable } from '../src/types/table';
import { FOLLOW_UP_HEADERS, followUpTable, groupRow, hiddenRow, rawTable, row } from './helpers/tables';

function locate(table: RawTable): LocatedTable {
  const located = locateFollowUpTable([table]);
  if (!located) {
    throw new Error('table was not recognised');
  }
  return located;
}

test.describe('resolveColumns', () => {
  test('maps the standard header order', () => {
    expect(resolveColumns(FOLLOW_UP_HEADERS)).toEqual({ location: 0, followUps: 1, calls: 2 });
  });

  test('selects columns by header text, not position', () => {
    expect(resolveColumns(['Unprocessed Calls', 'Location', 'Follow Ups'])).toEqual({
      location: 1,
      followUps: 2,
      calls: 0
    });
  });

  test('matches headers case-insensitively and across whitespace', () => {
    expect(resolveColumns(['  LOCATION ', 'unprocessed\n follow-ups', 'CALLS'])).toEqual({
      location: 0,
      followUps: 1,
      calls: 2
    });
  });

  test('does not reuse the follow-ups column as the calls column', () => {
    expect(resolveColumns(['Location', 'Unprocessed Follow-Ups'])).toEqual({
      location: 0,
      followUps: 1,
      calls: null
    });
  });

  test('requires both location and follow-ups headers', () => {
    expect(resolveColumns(['Location', 'Unprocessed Calls'])).toBeNull();
    expect(resolveColumns(['Store', 'Follow-Ups'])).toBeNull();
    expect(resolveColumns([])).toBeNull();
  });
});

test.describe('locateFollowUpTable', () => {
  test('returns the first qualifying table in frame then document order', () => {
    const unrelated = rawTable(['Name', 'Phone'], [row('Front desk', '555-0100')], { frameIndex: 0, tableIndex: 0 });
    const inChildFrame = rawTable(FOLLOW_UP_HEADERS, [row('Store Z', '1', '1')], { frameIndex: 1, tableIndex: 0 });
    const inMainFrame = rawTable(FOLLOW_UP_HEADERS, [row('Store A', '2', '2')], { frameIndex: 0, tableIndex: 3 });

    const located = locateFollowUpTable([inChildFrame, unrelated, inMainFrame]);

    expect(located?.table).toBe(inMainFrame);
    expect(located?.columns).toEqual({ location: 0, followUps: 1, calls: 2 });
  });

  test('returns null when no table has the required headers', () => {
    expect(locateFollowUpTable([rawTable(['Name', 'Phone'], [])])).toBeNull();
    expect(locateFollowUpTable([])).toBeNull();
  });
});

test.describe('parseCount', () => {
  test('keeps digits only', () => {
    expect(parseCount('12')).toBe(12);
    expect(parseCount('1,234')).toBe(1234);
    expect(parseCount(' 7 ')).toBe(7);
  });

  test('returns null when there are no digits', () => {
    expect(parseCount('N/A')).toBeNull();
    expect(parseCount('')).toBeNull();
    expect(parseCount('--')).toBeNull();
  });

  test('returns null for values past the safe integer range', () => {
    expect(parseCount('99999999999999999999')).toBeNull();
  });
});

test.describe('parseFollowUpRows', () => {
  test('parses one record per data row, in table order', () => {
    const parsed = parseFollowUpRows(locate(followUpTable(
      row('Store A', '12', '3'),
      row('Store B', '0', '0')
    )));

    expect(parsed.records).toEqual([
      { locationName: 'Store A', unprocessedFollowUps: 12, unprocessedCalls: 3 },
      { locationName: 'Store B', unprocessedFollowUps: 0, unprocessedCalls: 0 }
    ]);
    expect(parsed.warnings).toEqual([]);
    expect(parsed.skipped).toBe(0);
  });

  test('records 0 and a warning for an unparsable cell', () => {
    const parsed = parseFollowUpRows(locate(followUpTable(row('Store C', 'N/A', '1,234'))));

    expect(parsed.records).toEqual([
      { locationName: 'Store C', unprocessedFollowUps: 0, unprocessedCalls: 1234 }
    ]);
    expect(parsed.warnings).toEqual([
      { rowIndex: 0, locationName: 'Store C', column: 'unprocessedFollowUps', rawText: 'N/A' }
    ]);
  });

  test('skips group, hidden and unnamed rows and trims location names', () => {
    const parsed = parseFollowUpRows(locate(followUpTable(
      groupRow('West Region'),
      row('', '1', '2'),
      hiddenRow('Store H', '5', '5'),
      row('  Store D ', '4', '')
    )));

    expect(parsed.records).toEqual([
      { locationName: 'Store D', unprocessedFollowUps: 4, unprocessedCalls: 0 }
    ]);
    expect(parsed.warnings).toEqual([
      { rowIndex: 3, locationName: 'Store D', column: 'unprocessedCalls', rawText: '' }
    ]);
    expect(parsed.skipped).toBe(3);
  });

  test('keeps duplicate location names as separate records', () => {
    const parsed = parseFollowUpRows(locate(followUpTable(
      row('Store A', '1', '0'),
      row('Store A', '2', '0')
    )));

    expect(parsed.records.map(r => r.unprocessedFollowUps)).toEqual([1, 2]);
  });

  test('reads columns by header when the table is reordered', () => {
    const table = rawTable(['Unprocessed Calls', 'Follow-Ups', 'Location'], [row('9', '4', 'Store E')]);

    expect(parseFollowUpRows(locate(table)).records).toEqual([
      { locationName: 'Store E', unprocessedFollowUps: 4, unprocessedCalls: 9 }
    ]);
  });

  test('uses 0 calls without a warning when there is no calls column', () => {
    const table = rawTable(['Location', 'Follow-Ups'], [row('Store F', '6')]);
    const parsed = parseFollowUpRows(locate(table));

    expect(parsed.records).toEqual([
      { locationName: 'Store F', unprocessedFollowUps: 6, unprocessedCalls: 0 }
    ]);
    expect(parsed.warnings).toEqual([]);
  });

  test('returns frozen records', () => {
    const [record] = parseFollowUpRows(locate(followUpTable(row('Store A', '1', '1')))).records;
    expect(Object.isFrozen(record)).toBe(true);
  });
});

test.describe('isTablePopulated', () => {
  const defaults = { minNonZeroCells: 10, minNonZeroRatio: 0.05 };

  test('counts non-zero numeric cells of visible data rows', () => {
    const located = locate(followUpTable(
      row('Store A', '12', '3'),
      row('Store B', '0', '0'),
      hiddenRow('Store H', '8', '8')
    ));
    expect(countNonZeroCells(located)).toBe(2);
  });

  test('requires the configured minimum of non-zero cells', () => {
    const located = locate(followUpTable(row('Store A', '12', '3'), row('Store B', '0', '0')));

    expect(isTablePopulated(located, defaults)).toBe(false);
    expect(isTablePopulated(located, { minNonZeroCells: 2, minNonZeroRatio: 0.05 })).toBe(true);
  });

  test('scales the requirement with the row count', () => {
    const rows = Array.from({ length: 100 }, (_, i) => row(`Store ${i}`, i < 40 ? '1' : '0', '0'));
    const located = locate(followUpTable(...rows));
    const threshold = { minNonZeroCells: 0, minNonZeroRatio: 0.5 };

    expect(countNonZeroCells(located)).toBe(40);
    expect(isTablePopulated(located, threshold)).toBe(false);
    expect(isTablePopulated(located, { ...threshold, minNonZeroRatio: 0.4 })).toBe(true);
  });

  test('never accepts a table without data rows', () => {
    const located = locate(followUpTable(groupRow('West Region')));
    expect(isTablePopulated(located, { minNonZeroCells: 0, minNonZeroRatio: 0 })).toBe(false);
  });
});

test.describe('createSnapshotBatch', () => {
  test('stamps every record with one capture time and copies the input', () => {
    const now = new Date('2026-03-01T06:00:00.000Z');
    const records = [
      { locationName: 'Store A', unprocessedFollowUps: 1, unprocessedCalls: 2 },
      { locationName: 'Store B', unprocessedFollowUps: 3, unprocessedCalls: 4 }
    ];

    const batch = createSnapshotBatch(records, now);
    records.pop();
    now.setUTCHours(12);

    expect(batch.records).toHaveLength(2);
    expect(batch.dtSnapshot.toISOString()).toBe('2026-03-01T06:00:00.000Z');
    expect(Object.isFrozen(batch.records)).toBe(true);
  });
});
