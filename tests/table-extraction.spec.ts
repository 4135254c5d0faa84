import fs from 'fs';
import { chromium, expect, test } from '@playwright/test';
import { extractTablesInDocument } from '../src/services/table-extraction';
import { locateFollowUpTable, parseFollowUpRows } from '../src/services/table-parser';

// Reads real markup, so these run only where a Chromium build is installed
test.skip(!fs.existsSync(chromium.executablePath()), 'Chromium is not installed (npx playwright install chromium)');

const DASHBOARD_MARKUP = `
  <table id="contacts">
    <tr><th>Name</th><th>Phone</th></tr>
    <tr><td>Front desk</td><td>555-0100</td></tr>
  </table>
  <table id="followups">
    <thead>
      <tr><th colspan="3">Outstanding</th></tr>
      <tr><th>Location</th><th>Unprocessed Follow-Ups</th><th>Unprocessed Calls</th></tr>
    </thead>
    <tbody>
      <tr><td colspan="3">West Region</td></tr>
      <tr><td><p class="location-name">Main St</p><span>Open now</span></td><td>12</td><td>3</td></tr>
      <tr style="display:none"><td>Closed Store</td><td>1</td><td>1</td></tr>
      <tr aria-hidden="true"><td>Ghost Store</td><td>2</td><td>2</td></tr>
      <tr><td>Oak Ave</td><td>0</td><td>0</td></tr>
    </tbody>
    <tfoot>
      <tr><td>Total</td><td>15</td><td>6</td></tr>
    </tfoot>
  </table>
`;

test('extracts headers and row flags from the rendered tables', async ({ page }) => {
  await page.setContent(DASHBOARD_MARKUP);

  const tables = await page.evaluate(extractTablesInDocument);

  expect(tables).toEqual([
    {
      tableIndex: 0,
      headers: ['Name', 'Phone'],
      rows: [{ cells: ['Front desk', '555-0100'], hidden: false, groupHeader: false }]
    },
    {
      tableIndex: 1,
      headers: ['Location', 'Unprocessed Follow-Ups', 'Unprocessed Calls'],
      rows: [
        { cells: ['West Region'], hidden: false, groupHeader: true },
        { cells: ['Main St', '12', '3'], hidden: false, groupHeader: false },
        { cells: ['Closed Store', '1', '1'], hidden: true, groupHeader: false },
        { cells: ['Ghost Store', '2', '2'], hidden: true, groupHeader: false },
        { cells: ['Oak Ave', '0', '0'], hidden: false, groupHeader: false }
      ]
    }
  ]);
});

test('yields only the visible location rows once parsed', async ({ page }) => {
  await page.setContent(DASHBOARD_MARKUP);

  const tables = await page.evaluate(extractTablesInDocument);
  const located = locateFollowUpTable(tables.map(table => ({ ...table, frameIndex: 0 })));
  if (!located) {
    throw new Error('follow-ups table was not recognised');
  }

  expect(parseFollowUpRows(located).records).toEqual([
    { locationName: 'Main St', unprocessedFollowUps: 12, unprocessedCalls: 3 },
    { locationName: 'Oak Ave', unprocessedFollowUps: 0, unprocessedCalls: 0 }
  ]);
});
