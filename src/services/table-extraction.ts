import { RawTable } from '../types/table';

export type DocumentTable = Omit<RawTable, 'frameIndex'>;

/**
 * Runs inside the page (frame.evaluate), so it must not reference anything
 * outside its own body.
 *
 * Assumptions about the dashboard markup: the header row is the last row of
 * <thead> (or the first row made only of <th>), location names sit in
 * <p class="location-name"> when present, collapsed group rows are either
 * not rendered or a single cell spanning the table, and <tfoot> holds totals.
 */
export function extractTablesInDocument(): DocumentTable[] {
  const textOf = (el: Element): string => {
    const preferred = el.querySelector('p.location-name') ?? el;
    const raw = preferred instanceof HTMLElement ? preferred.innerText : preferred.textContent ?? '';
    return raw.replace(/\s+/g, ' ').trim();
  };

  const isRendered = (row: HTMLTableRowElement): boolean => {
    if (row.hidden || row.getAttribute('aria-hidden') === 'true') {
      return false;
    }
    const style = window.getComputedStyle(row);
    if (style.display === 'none' || style.visibility === 'hidden' || style.visibility === 'collapse') {
      return false;
    }
    return row.getClientRects().length > 0;
  };

  const isHeaderOnly = (row: HTMLTableRowElement): boolean =>
    row.cells.length > 0 && Array.from(row.cells).every(cell => cell.tagName === 'TH');

  return Array.from(document.querySelectorAll('table')).map((table, tableIndex) => {
    const allRows = Array.from(table.rows);
    const head = table.tHead;
    const foot = table.tFoot;
    const headerRow = head && head.rows.length > 0
      ? head.rows[head.rows.length - 1]
      : allRows.find(isHeaderOnly);

    const headers = headerRow ? Array.from(headerRow.cells).map(textOf) : [];

    const rows = allRows
      .filter(row => row !== headerRow && !(head && head.contains(row)) && !(foot && foot.contains(row)))
      .map(row => {
        const cells = Array.from(row.cells);
        return {
          cells: cells.map(textOf),
          hidden: !isRendered(row),
          groupHeader: (cells.length === 1 && cells[0].colSpan > 1) || isHeaderOnly(row)
        };
      });

    return { tableIndex, headers, rows };
  });
}
