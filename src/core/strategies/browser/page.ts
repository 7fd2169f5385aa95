// src/core/strategies/browser/page.ts
import { errors, type Page, type Response } from 'playwright';
import { DEFAULT_TIMEOUT } from '../../config/constants.js';

/** What the strategy reads from an intercepted network response. */
export interface InterceptedResponse {
  url(): string;
  ok(): boolean;
  status(): number;
  json(): Promise<unknown>;
}

export type ResponseListener = (response: InterceptedResponse) => void;

/**
 * The page operations the browser strategy drives. Kept narrow so tests
 * can replay recorded responses without a browser.
 */
export interface TimelinePage {
  onResponse(listener: ResponseListener): void;
  goto(url: string): Promise<void>;
  /** Resolves with the first matching response, or null on timeout. */
  waitForResponse(
    predicate: (response: InterceptedResponse) => boolean,
    timeoutMs: number
  ): Promise<InterceptedResponse | null>;
  scrollToBottom(): Promise<void>;
  hasSelector(selector: string): Promise<boolean>;
  close(): Promise<void>;
}

/** Owns the browser; pages opened from it share the persistent profile. */
export interface BrowserSession {
  newPage(): Promise<TimelinePage>;
  close(): Promise<void>;
}

export class PlaywrightTimelinePage implements TimelinePage {
  constructor(private page: Page) {}

  onResponse(listener: ResponseListener): void {
    this.page.on('response', (response: Response) => listener(response));
  }

  async goto(url: string): Promise<void> {
    // The SPA keeps long-polling, so 'load' never settles into networkidle
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: DEFAULT_TIMEOUT });
  }

  async waitForResponse(
    predicate: (response: InterceptedResponse) => boolean,
    timeoutMs: number
  ): Promise<InterceptedResponse | null> {
    try {
      return await this.page.waitForResponse((response) => predicate(response), { timeout: timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return null;
      }
      throw error;
    }
  }

  async scrollToBottom(): Promise<void> {
    await this.page.evaluate(() => {
      window.scrollTo(0, document.body.scrollHeight);
    });
  }

  async hasSelector(selector: string): Promise<boolean> {
    return (await this.page.locator(selector).count()) > 0;
  }

  async close(): Promise<void> {
    if (!this.page.isClosed()) {
      await this.page.close();
    }
  }
}
