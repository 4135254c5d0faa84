import { expect, test } from '@playwright/test';
import { poolConfig } from '../src/db/procedures';
import { testConfig } from './helpers/fakes';

test.describe('poolConfig', () => {
  test('sends datetime parameters as local time by default', () => {
    const config = poolConfig('test-db-secret', testConfig());

    expect(config.options?.useUTC).toBe(false);
  });

  test('opens a single connection with the configured server settings', () => {
    const config = poolConfig('test-db-secret', testConfig({
      DB_SERVER: 'sql.internal',
      DB_PORT: '14330',
      DB_NAME: 'Reporting',
      DB_USER: 'etl_user',
      DB_ENCRYPT: 'false',
      DB_USE_UTC: 'true'
    }));

    expect(config).toMatchObject({
      server: 'sql.internal',
      port: 14330,
      database: 'Reporting',
      user: 'etl_user',
      password: 'test-db-secret',
      pool: { min: 0, max: 1 },
      options: { encrypt: false, trustServerCertificate: true, useUTC: true }
    });
  });
});
