import { BrowserContextOptions, LaunchOptions } from 'playwright';
import { AppConfig } from '../config/constants';

export const BROWSER_ARGS: string[] = [
  '--disable-blink-features=AutomationControlled',
  '--disable-dev-shm-usage',
  '--no-sandbox',
  '--disable-setuid-sandbox'
];

export function launchOptions(config: AppConfig): LaunchOptions {
  return {
    headless: config.BROWSER.HEADLESS,
    args: BROWSER_ARGS
  };
}

export function contextOptions(config: AppConfig): BrowserContextOptions {
  return {
    viewport: { ...config.BROWSER.VIEWPORT },
    locale: config.BROWSER.LOCALE,
    userAgent: config.BROWSER.USER_AGENT
  };
}
