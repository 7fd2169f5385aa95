// src/core/strategies/browser/browser-selector.ts
import { chromium } from 'playwright';
import { DumpError, ErrorCode } from '../../errors.js';
import { BROWSER_CONFIGS } from '../../config/browser-config.js';
import type { BrowserType, ConfigurableBrowser } from '../../types/index.js';

export class BrowserSelector {
  /**
   * An explicit browser must be available; 'auto' takes the first
   * available one in priority order.
   */
  async select(browserType: BrowserType = 'auto'): Promise<ConfigurableBrowser> {
    if (browserType !== 'auto') {
      if (!(await this.isAvailable(browserType))) {
        throw new DumpError(
          ErrorCode.BROWSER_NOT_FOUND,
          `Browser '${browserType}' is not available on this system`,
          false,
          browserType === 'chromium'
            ? 'Run: tldump install-browsers'
            : `Install ${BROWSER_CONFIGS[browserType].name} or set TLDUMP_BROWSER=auto`
        );
      }
      return browserType;
    }

    for (const type of this.getAutoPriority()) {
      if (await this.isAvailable(type)) {
        return type;
      }
    }

    throw new DumpError(
      ErrorCode.BROWSER_NOT_FOUND,
      'No supported browser found',
      false,
      'Install Google Chrome or Microsoft Edge, or run: tldump install-browsers'
    );
  }

  getAutoPriority(): ConfigurableBrowser[] {
    return ['chrome', 'edge', 'chromium'];
  }

  /**
   * Probe by launching headless and closing immediately.
   */
  async isAvailable(browserType: ConfigurableBrowser): Promise<boolean> {
    try {
      const browser = await chromium.launch({
        channel: BROWSER_CONFIGS[browserType].channel,
        headless: true,
      });
      await browser.close();
      return true;
    } catch {
      return false;
    }
  }
}
