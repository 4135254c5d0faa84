import { defineConfig } from '@playwright/test';

// Keep test output to the reporter; LOG_LEVEL=debug brings the app logs back.
process.env.LOG_LEVEL ??= 'silent';

// Unit and service tests only: nothing here launches a browser.
export default defineConfig({
  testDir: './tests',
  testMatch: '**/*.spec.ts',
  timeout: 30_000
});
