/**
 * Plain-data view of the tables rendered on the dashboard, as read in the browser
 */

export interface RawRow {
  cells: string[];
  // Not rendered (display:none, hidden attribute, collapsed group)
  hidden: boolean;
  // Single cell spanning the table, or header cells only
  groupHeader: boolean;
}

export interface RawTable {
  frameIndex: number;
  tableIndex: number;
  headers: string[];
  rows: RawRow[];
}

export interface ColumnMap {
  location: number;
  followUps: number;
  calls: number | null;
}

export interface LocatedTable {
  table: RawTable;
  columns: ColumnMap;
}
