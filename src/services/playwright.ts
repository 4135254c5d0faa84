import { chromium, errors, Browser, BrowserContext, Page } from 'playwright';
import fs from 'fs';
import path from 'path';
import { AppConfig, CONFIG } from '../config/constants';
import { DashboardCredentials, DashboardSession } from '../types/session';
import { RawTable } from '../types/table';
import { contextOptions, launchOptions } from '../utils/browser-config';
import { LoginFailedError, NavigationTimeoutError, errorMessage } from '../utils/error-handler';
import { logger } from '../utils/logger';
import { safePageOperation, timed } from '../utils/promise-helpers';
import { DocumentTable, extractTablesInDocument } from './table-extraction';

export class PlaywrightService implements DashboardSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private page: Page | null = null;

  constructor(private readonly config: AppConfig = CONFIG) {}

  async open(): Promise<void> {
    if (this.page) {
      return;
    }

    logger.info('Launching browser...');
    this.browser = await chromium.launch(launchOptions(this.config));
    this.context = await this.browser.newContext(contextOptions(this.config));
    this.page = await this.context.newPage();
    this.page.setDefaultTimeout(this.config.TIMEOUTS.SELECTOR_WAIT);
  }

  private requirePage(): Page {
    if (!this.page) {
      throw new Error('Browser session is not open');
    }
    return this.page;
  }

  async login(credentials: DashboardCredentials): Promise<void> {
    const page = this.requirePage();
    const { DASHBOARD, TIMEOUTS, PERFORMANCE } = this.config;

    logger.info(`Navigating to ${DASHBOARD.URL}...`);
    try {
      await timed(
        'page.goto',
        () => page.goto(DASHBOARD.URL, { waitUntil: 'networkidle', timeout: TIMEOUTS.PAGE_LOAD }),
        PERFORMANCE.PAGE_GOTO_SLOW
      );
    } catch (e) {
      if (e instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(`Login page did not load within ${TIMEOUTS.PAGE_LOAD}ms`);
      }
      throw new LoginFailedError(`Could not open login page: ${errorMessage(e)}`);
    }

    try {
      logger.debug('Waiting for login form...');
      await page.waitForSelector(DASHBOARD.USERNAME_SELECTOR, { timeout: TIMEOUTS.SELECTOR_WAIT });
      await page.fill(DASHBOARD.USERNAME_SELECTOR, credentials.username);
      await page.fill(DASHBOARD.PASSWORD_SELECTOR, credentials.password);
      logger.debug('Submitting login...');
      await page.click(DASHBOARD.SUBMIT_SELECTOR);
    } catch (e) {
      throw new LoginFailedError(`Login form interaction failed: ${errorMessage(e)}`);
    }

    await this.waitForNetworkIdle('dashboard after login');

    const formStillShown = await safePageOperation(
      () => page.locator(DASHBOARD.PASSWORD_SELECTOR).first().isVisible(),
      false,
      'login-check'
    );
    if (formStillShown) {
      throw new LoginFailedError('Login form is still shown after submitting; credentials were rejected');
    }

    logger.info('Login successful');
  }

  async openFollowUps(): Promise<void> {
    const page = this.requirePage();
    const selector = this.config.DASHBOARD.FOLLOWUPS_SELECTOR;
    if (!selector) {
      return;
    }

    logger.info(`Opening follow-ups view (${selector})...`);
    try {
      await page.click(selector, { timeout: this.config.TIMEOUTS.SELECTOR_WAIT });
    } catch (e) {
      if (e instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(`Follow-ups link ${selector} did not appear`);
      }
      throw e;
    }
    await this.waitForNetworkIdle('follow-ups view');
  }

  private async waitForNetworkIdle(what: string): Promise<void> {
    const page = this.requirePage();
    const timeout = this.config.TIMEOUTS.PAGE_LOAD;
    try {
      await page.waitForLoadState('networkidle', { timeout });
    } catch (e) {
      if (e instanceof errors.TimeoutError) {
        throw new NavigationTimeoutError(`Timed out after ${timeout}ms waiting for ${what}`);
      }
      throw e;
    }
  }

  async readTables(): Promise<RawTable[]> {
    const page = this.requirePage();
    const tables: RawTable[] = [];
    const frames = page.frames();

    // The table may be rendered inside an iframe
    for (const [frameIndex, frame] of frames.entries()) {
      const found = await safePageOperation<DocumentTable[]>(
        () => frame.evaluate(extractTablesInDocument),
        [],
        `frame ${frameIndex + 1}/${frames.length}`
      );
      tables.push(...found.map(table => ({ ...table, frameIndex })));
    }

    logger.debug(`Found ${tables.length} table(s) across ${frames.length} frame(s)`);
    return tables;
  }

  async captureScreenshot(outputPath: string): Promise<boolean> {
    if (!this.page || this.page.isClosed()) {
      logger.warn('[Screenshot] No page available for screenshot');
      return false;
    }

    try {
      fs.mkdirSync(path.dirname(outputPath), { recursive: true });
      await this.page.screenshot({ path: outputPath, type: 'png', fullPage: true });

      if (fs.existsSync(outputPath)) {
        const stats = fs.statSync(outputPath);
        logger.info(`[Screenshot] Saved to ${outputPath} (${stats.size} bytes)`);
        return true;
      }
      logger.error(`[Screenshot] File was not created at ${outputPath}`);
      return false;
    } catch (e) {
      logger.error('[Screenshot] Error capturing screenshot:', errorMessage(e));
      return false;
    }
  }

  async close(): Promise<void> {
    const { context, browser } = this;
    this.page = null;
    this.context = null;
    this.browser = null;

    if (context) {
      await context.close().catch((e: unknown) => logger.warn('Failed to close browser context:', errorMessage(e)));
    }
    if (browser) {
      await browser.close();
      logger.debug('Browser closed');
    }
  }
}
