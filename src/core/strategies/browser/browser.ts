// src/core/strategies/browser/browser.ts
import { chromium, type BrowserContext } from 'playwright';
import * as fs from 'fs/promises';
import { DumpError, ErrorCode } from '../../errors.js';
import { BROWSER_CONFIGS } from '../../config/browser-config.js';
import { LOGIN_POLL_INTERVAL } from '../../config/constants.js';
import { BrowserSelector } from './browser-selector.js';
import { PlaywrightTimelinePage, type BrowserSession, type TimelinePage } from './page.js';
import type { BrowserType } from '../../types/index.js';

export interface BrowserOptions {
  browserType?: BrowserType;
  headless?: boolean;
  proxy?: string;
  selector?: BrowserSelector;
}

function isSessionCookie(cookie: { name: string; domain: string }): boolean {
  return cookie.name === 'auth_token'
    && (cookie.domain.includes('x.com') || cookie.domain.includes('twitter.com'));
}

/**
 * Lazily launches one persistent context per process. Login state lives
 * in the profile directory and survives across runs.
 */
export class BrowserManager implements BrowserSession {
  private context?: BrowserContext;

  constructor(
    private profileDir: string,
    private options: BrowserOptions = {}
  ) {}

  async launch(): Promise<BrowserContext> {
    if (this.context) {
      return this.context;
    }

    const selector = this.options.selector ?? new BrowserSelector();
    const resolved = await selector.select(this.options.browserType);
    const browserConfig = BROWSER_CONFIGS[resolved];

    try {
      await fs.mkdir(this.profileDir, { recursive: true });
    } catch (error) {
      throw new DumpError(
        ErrorCode.CONFIG_INVALID,
        `Failed to create profile directory: ${this.profileDir}`,
        false,
        `Check permissions for directory: ${this.profileDir}`,
        { cause: error instanceof Error ? error.message : String(error) }
      );
    }

    try {
      console.error(`[INFO] Launching ${browserConfig.name} with profile: ${this.profileDir}`);
      this.context = await chromium.launchPersistentContext(this.profileDir, {
        channel: browserConfig.channel,
        headless: this.options.headless ?? false,
        proxy: this.options.proxy ? { server: this.options.proxy } : undefined,
        viewport: null,
        args: [
          '--disable-blink-features=AutomationControlled',
          '--no-first-run',
          '--no-default-browser-check',
        ],
      });
    } catch (error) {
      throw new DumpError(
        ErrorCode.BROWSER_NOT_FOUND,
        `Failed to launch browser: ${error instanceof Error ? error.message : 'Unknown error'}`,
        false,
        `Ensure ${browserConfig.name} is installed on your system`
      );
    }

    return this.context;
  }

  async newPage(): Promise<TimelinePage> {
    const context = await this.launch();
    return new PlaywrightTimelinePage(await context.newPage());
  }

  /**
   * Open `url` and poll until the session cookie appears. Returns whether
   * a login was detected before the timeout.
   */
  async waitForLogin(url: string, timeoutMs: number): Promise<boolean> {
    const context = await this.launch();
    const page = context.pages()[0] ?? await context.newPage();
    await page.goto(url);

    const deadline = Date.now() + timeoutMs;
    while (Date.now() < deadline) {
      const cookies = await context.cookies();
      if (cookies.some(isSessionCookie)) {
        return true;
      }
      await page.waitForTimeout(LOGIN_POLL_INTERVAL);
    }
    return false;
  }

  async close(): Promise<void> {
    if (this.context) {
      await this.context.close();
      this.context = undefined;
    }
  }
}
