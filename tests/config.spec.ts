import path from 'path';
import { expect, test } from '@playwright/test';
import { loadConfig } from '../src/config/constants';

const CWD = path.resolve('/srv/followup-snapshot');

test.describe('loadConfig', () => {
  test('applies defaults', () => {
    const config = loadConfig({}, CWD);

    expect(config.DATABASE.SCHEMA).toBe('Testing');
    expect(config.DATABASE.PORT).toBe(1433);
    expect(config.DATABASE.ENCRYPT).toBe(true);
    expect(config.SECRETS.STORE).toBe('keyring');
    expect(config.DASHBOARD.FOLLOWUPS_SELECTOR).toBeNull();
    expect(config.PERSISTENCE.ON_INSERT_FAILURE).toBe('continue');
    expect(config.TABLE).toEqual({
      POLL_ATTEMPTS: 20,
      POLL_INTERVAL: 3000,
      MIN_NONZERO_CELLS: 10,
      MIN_NONZERO_RATIO: 0.05,
      REQUIRE_POPULATED: false
    });
    expect(config.DATABASE.USE_UTC).toBe(false);
    expect(config.STORAGE.DB_PATH).toBe(path.join(CWD, 'data', 'runs.db'));
    expect(config.STORAGE.SCREENSHOT_DIR).toBe(path.join(CWD, 'data', 'screenshots'));
  });

  test('reads overrides from the environment', () => {
    const config = loadConfig({
      DB_ENCRYPT: 'false',
      DB_USE_UTC: 'true',
      TABLE_REQUIRE_POPULATED: '1',
      DB_PORT: '14330',
      HEADLESS: '0',
      INSERT_FAILURE_POLICY: 'abort',
      DATA_DIR: 'state',
      DASHBOARD_FOLLOWUPS_SELECTOR: 'a[href*="followups"]'
    }, CWD);

    expect(config.DATABASE.ENCRYPT).toBe(false);
    expect(config.DATABASE.USE_UTC).toBe(true);
    expect(config.TABLE.REQUIRE_POPULATED).toBe(true);
    expect(config.DATABASE.PORT).toBe(14330);
    expect(config.BROWSER.HEADLESS).toBe(false);
    expect(config.PERSISTENCE.ON_INSERT_FAILURE).toBe('abort');
    expect(config.STORAGE.LOCK_FILE).toBe(path.join(CWD, 'state', 'run.lock'));
    expect(config.DASHBOARD.FOLLOWUPS_SELECTOR).toBe('a[href*="followups"]');
  });

  test('treats empty values as unset', () => {
    const config = loadConfig({ INSERT_FAILURE_POLICY: '', DB_SCHEMA: '  ' }, CWD);

    expect(config.PERSISTENCE.ON_INSERT_FAILURE).toBe('continue');
    expect(config.DATABASE.SCHEMA).toBe('Testing');
  });

  test('rejects invalid values', () => {
    expect(() => loadConfig({ INSERT_FAILURE_POLICY: 'retry' }, CWD)).toThrow();
    expect(() => loadConfig({ DB_SCHEMA: 'Testing; DROP TABLE x' }, CWD)).toThrow();
    expect(() => loadConfig({ TABLE_POLL_ATTEMPTS: '0' }, CWD)).toThrow();
    expect(() => loadConfig({ DASHBOARD_URL: 'not a url' }, CWD)).toThrow();
  });
});
