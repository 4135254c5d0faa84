import path from 'path';
import { z } from 'zod';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),

  DASHBOARD_URL: z.string().url().default('https://sys.callpotential.com/ui/v2/dashboard'),
  DASHBOARD_USERNAME_SELECTOR: z.string().default('input[name="username"]'),
  DASHBOARD_PASSWORD_SELECTOR: z.string().default('input[type="password"]'),
  DASHBOARD_SUBMIT_SELECTOR: z.string().default('button[type="submit"]'),
  // Empty means the follow-ups table is on the landing page.
  DASHBOARD_FOLLOWUPS_SELECTOR: z.string().optional(),

  SECRET_STORE: z.enum(['keyring', 'env']).default('keyring'),
  DASHBOARD_SECRET_SERVICE: z.string().default('CallPotential'),
  DASHBOARD_USERNAME_ACCOUNT: z.string().default('Username'),
  DASHBOARD_PASSWORD_ACCOUNT: z.string().default('Password'),
  DB_SECRET_SERVICE: z.string().default('FollowUpSnapshotDatabase'),

  DB_SERVER: z.string().default('localhost'),
  DB_PORT: z.coerce.number().int().min(1).max(65535).default(1433),
  DB_NAME: z.string().default('Operations'),
  DB_USER: z.string().default('followup_snapshot'),
  DB_SCHEMA: z.string().regex(/^\w+$/, 'schema must be a plain identifier').default('Testing'),
  DB_ENCRYPT: booleanFromEnv.default('true'),
  DB_TRUST_SERVER_CERTIFICATE: booleanFromEnv.default('true'),
  DB_CONNECTION_TIMEOUT_MS: z.coerce.number().int().min(1).default(15000),
  DB_REQUEST_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  // DATETIME parameters are sent as local wall-clock time unless this is set.
  DB_USE_UTC: booleanFromEnv.default('false'),

  INSERT_FAILURE_POLICY: z.enum(['continue', 'abort']).default('continue'),

  HEADLESS: booleanFromEnv.default('true'),
  PAGE_LOAD_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  SELECTOR_TIMEOUT_MS: z.coerce.number().int().min(1).default(10000),
  TABLE_POLL_ATTEMPTS: z.coerce.number().int().min(1).default(20),
  TABLE_POLL_INTERVAL_MS: z.coerce.number().int().min(0).default(3000),
  TABLE_MIN_NONZERO_CELLS: z.coerce.number().int().min(0).default(10),
  TABLE_MIN_NONZERO_RATIO: z.coerce.number().min(0).max(1).default(0.05),
  // When false, a table still short of real data after polling is parsed as it stands.
  TABLE_REQUIRE_POPULATED: booleanFromEnv.default('false'),

  DATA_DIR: z.string().optional(),
  SCREENSHOT_DIR: z.string().optional(),
});

export type InsertFailurePolicy = 'continue' | 'abort';

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()) {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.parse(present);
  const dataDir = parsed.DATA_DIR ? path.resolve(cwd, parsed.DATA_DIR) : path.join(cwd, 'data');

  return {
    ENV: parsed.NODE_ENV,
    SERVER: {
      PORT: parsed.PORT,
    },
    DASHBOARD: {
      URL: parsed.DASHBOARD_URL,
      USERNAME_SELECTOR: parsed.DASHBOARD_USERNAME_SELECTOR,
      PASSWORD_SELECTOR: parsed.DASHBOARD_PASSWORD_SELECTOR,
      SUBMIT_SELECTOR: parsed.DASHBOARD_SUBMIT_SELECTOR,
      FOLLOWUPS_SELECTOR: parsed.DASHBOARD_FOLLOWUPS_SELECTOR ?? null,
    },
    SECRETS: {
      STORE: parsed.SECRET_STORE,
      DASHBOARD_SERVICE: parsed.DASHBOARD_SECRET_SERVICE,
      USERNAME_ACCOUNT: parsed.DASHBOARD_USERNAME_ACCOUNT,
      PASSWORD_ACCOUNT: parsed.DASHBOARD_PASSWORD_ACCOUNT,
      DATABASE_SERVICE: parsed.DB_SECRET_SERVICE,
    },
    DATABASE: {
      SERVER: parsed.DB_SERVER,
      PORT: parsed.DB_PORT,
      NAME: parsed.DB_NAME,
      USER: parsed.DB_USER,
      SCHEMA: parsed.DB_SCHEMA,
      ENCRYPT: parsed.DB_ENCRYPT,
      TRUST_SERVER_CERTIFICATE: parsed.DB_TRUST_SERVER_CERTIFICATE,
      CONNECTION_TIMEOUT: parsed.DB_CONNECTION_TIMEOUT_MS,
      REQUEST_TIMEOUT: parsed.DB_REQUEST_TIMEOUT_MS,
      USE_UTC: parsed.DB_USE_UTC,
    },
    PERSISTENCE: {
      ON_INSERT_FAILURE: parsed.INSERT_FAILURE_POLICY satisfies InsertFailurePolicy,
    },
    TIMEOUTS: {
      PAGE_LOAD: parsed.PAGE_LOAD_TIMEOUT_MS,
      SELECTOR_WAIT: parsed.SELECTOR_TIMEOUT_MS,
    },
    TABLE: {
      POLL_ATTEMPTS: parsed.TABLE_POLL_ATTEMPTS,
      POLL_INTERVAL: parsed.TABLE_POLL_INTERVAL_MS,
      MIN_NONZERO_CELLS: parsed.TABLE_MIN_NONZERO_CELLS,
      MIN_NONZERO_RATIO: parsed.TABLE_MIN_NONZERO_RATIO,
      REQUIRE_POPULATED: parsed.TABLE_REQUIRE_POPULATED,
    },
    BROWSER: {
      HEADLESS: parsed.HEADLESS,
      VIEWPORT: { width: 1920, height: 1080 },
      LOCALE: 'en-US',
      USER_AGENT: 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    },
    STORAGE: {
      DATA_DIR: dataDir,
      DB_PATH: path.join(dataDir, 'runs.db'),
      LOCK_FILE: path.join(dataDir, 'run.lock'),
      LOCK_STALE_AFTER: 60 * 60 * 1000, // 1 hour
      SCREENSHOT_DIR: parsed.SCREENSHOT_DIR
        ? path.resolve(cwd, parsed.SCREENSHOT_DIR)
        : path.join(dataDir, 'screenshots'),
    },
    PERFORMANCE: {
      PAGE_GOTO_SLOW: 5000,
      PROCEDURE_SLOW: 2000,
    },
  } as const;
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const CONFIG: AppConfig = loadConfig();
