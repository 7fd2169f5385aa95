// src/core/strategies/browser/__tests__/browser-selector.test.ts
import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { BrowserSelector } from '../browser-selector.js';
import { ErrorCode } from '../../../errors.js';
import type { ConfigurableBrowser } from '../../../types/index.js';

describe('BrowserSelector', () => {
  let selector: BrowserSelector;

  beforeEach(() => {
    selector = new BrowserSelector();
  });

  describe('select() with an explicit browser', () => {
    it('returns it when available', async () => {
      jest.spyOn(selector, 'isAvailable').mockResolvedValue(true);
      expect(await selector.select('edge')).toBe('edge');
    });

    it('throws BROWSER_NOT_FOUND when missing', async () => {
      jest.spyOn(selector, 'isAvailable').mockResolvedValue(false);
      await expect(selector.select('chrome')).rejects.toMatchObject({
        code: ErrorCode.BROWSER_NOT_FOUND,
        suggestion: 'Install Google Chrome or set TLDUMP_BROWSER=auto',
      });
    });

    it('suggests install-browsers for the bundled Chromium', async () => {
      jest.spyOn(selector, 'isAvailable').mockResolvedValue(false);
      await expect(selector.select('chromium')).rejects.toMatchObject({
        suggestion: 'Run: tldump install-browsers',
      });
    });
  });

  describe('select() in auto mode', () => {
    it('prefers chrome, then edge, then chromium', async () => {
      expect(selector.getAutoPriority()).toEqual(['chrome', 'edge', 'chromium']);

      jest.spyOn(selector, 'isAvailable').mockResolvedValue(true);
      expect(await selector.select('auto')).toBe('chrome');
    });

    it('falls through to the first available browser', async () => {
      const probed: ConfigurableBrowser[] = [];
      jest.spyOn(selector, 'isAvailable').mockImplementation(async (type: ConfigurableBrowser) => {
        probed.push(type);
        return type === 'chromium';
      });

      expect(await selector.select()).toBe('chromium');
      expect(probed).toEqual(['chrome', 'edge', 'chromium']);
    });

    it('throws when nothing is available', async () => {
      jest.spyOn(selector, 'isAvailable').mockResolvedValue(false);
      await expect(selector.select('auto')).rejects.toThrow('No supported browser found');
    });
  });
});
