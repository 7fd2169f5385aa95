import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { chromium } from 'playwright';
import * as fs from 'fs/promises';
import { BrowserManager } from '../browser.js';
import { BrowserSelector } from '../browser-selector.js';
import { PlaywrightTimelinePage } from '../page.js';
import { LOGIN_POLL_INTERVAL } from '../../../config/constants.js';
import { ErrorCode } from '../../../errors.js';
import type { ConfigurableBrowser } from '../../../types/index.js';

jest.mock('playwright', () => ({
  chromium: {
    launchPersistentContext: jest.fn(),
  },
  errors: {
    TimeoutError: class TimeoutError extends Error {},
  },
}));

jest.mock('fs/promises');

describe('BrowserManager', () => {
  const launchMock = chromium.launchPersistentContext as unknown as jest.Mock;
  const mkdirMock = fs.mkdir as unknown as jest.Mock;

  const mockResolved = <T>(value: T) => {
    return jest.fn(() => Promise.resolve(value)) as jest.Mock;
  };

  const selectorFor = (browser: ConfigurableBrowser): BrowserSelector => {
    const selector = new BrowserSelector();
    jest.spyOn(selector, 'select').mockResolvedValue(browser);
    return selector;
  };

  let consoleSpy: jest.SpiedFunction<typeof console.error>;

  beforeEach(() => {
    jest.clearAllMocks();
    consoleSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mkdirMock.mockImplementation(() => Promise.resolve());
  });

  afterEach(() => {
    consoleSpy.mockRestore();
  });

  it('launches a persistent context once with the selected channel', async () => {
    const context = { close: mockResolved(undefined) };
    launchMock.mockImplementation(() => Promise.resolve(context));

    const manager = new BrowserManager('/tmp/profile-edge', {
      selector: selectorFor('edge'),
      headless: true,
      proxy: 'http://127.0.0.1:8080',
    });
    const first = await manager.launch();
    const second = await manager.launch();

    expect(first).toBe(context);
    expect(second).toBe(context);
    expect(launchMock).toHaveBeenCalledTimes(1);
    expect(launchMock).toHaveBeenCalledWith('/tmp/profile-edge', expect.objectContaining({
      channel: 'msedge',
      headless: true,
      proxy: { server: 'http://127.0.0.1:8080' },
      viewport: null,
    }));
  });

  it('uses the bundled Chromium without a channel', async () => {
    launchMock.mockImplementation(() => Promise.resolve({ close: mockResolved(undefined) }));

    await new BrowserManager('/tmp/profile', { selector: selectorFor('chromium') }).launch();

    expect(launchMock).toHaveBeenCalledWith('/tmp/profile', expect.objectContaining({
      channel: undefined,
      headless: false,
      proxy: undefined,
    }));
  });

  it('throws CONFIG_INVALID when the profile dir cannot be created', async () => {
    mkdirMock.mockImplementation(() => Promise.reject(new Error('nope')));

    const manager = new BrowserManager('/bad/profile', { selector: selectorFor('chrome') });
    await expect(manager.launch()).rejects.toMatchObject({ code: ErrorCode.CONFIG_INVALID });
    expect(launchMock).not.toHaveBeenCalled();
  });

  it('throws BROWSER_NOT_FOUND when the launch fails', async () => {
    launchMock.mockImplementation(() => Promise.reject(new Error('channel missing')));

    const manager = new BrowserManager('/tmp/profile', { selector: selectorFor('chrome') });
    await expect(manager.launch()).rejects.toMatchObject({
      code: ErrorCode.BROWSER_NOT_FOUND,
      message: 'Failed to launch browser: channel missing',
    });
  });

  it('wraps new pages for the strategy', async () => {
    const page = { on: jest.fn() };
    launchMock.mockImplementation(() => Promise.resolve({
      newPage: mockResolved(page),
      close: mockResolved(undefined),
    }));

    const manager = new BrowserManager('/tmp/profile', { selector: selectorFor('chrome') });
    expect(await manager.newPage()).toBeInstanceOf(PlaywrightTimelinePage);
  });

  it('polls for the session cookie until login is detected', async () => {
    const cookiesMock = jest.fn() as jest.Mock;
    cookiesMock.mockImplementationOnce(() => Promise.resolve([]));
    cookiesMock.mockImplementationOnce(() => Promise.resolve([{ name: 'auth_token', domain: '.x.com' }]));

    const page = {
      goto: mockResolved(undefined),
      waitForTimeout: mockResolved(undefined),
    };
    launchMock.mockImplementation(() => Promise.resolve({
      cookies: cookiesMock,
      pages: jest.fn(() => [page]),
      close: mockResolved(undefined),
    }));

    const manager = new BrowserManager('/tmp/profile', { selector: selectorFor('chrome') });

    expect(await manager.waitForLogin('https://x.com', 60_000)).toBe(true);
    expect(page.goto).toHaveBeenCalledWith('https://x.com');
    expect(page.waitForTimeout).toHaveBeenCalledTimes(1);
    expect(page.waitForTimeout).toHaveBeenCalledWith(LOGIN_POLL_INTERVAL);
  });

  it('ignores cookies from other sites and gives up at the deadline', async () => {
    const page = {
      goto: mockResolved(undefined),
      waitForTimeout: mockResolved(undefined),
    };
    const context = {
      cookies: mockResolved([{ name: 'auth_token', domain: 'example.com' }]),
      pages: jest.fn(() => []),
      newPage: mockResolved(page),
      close: mockResolved(undefined),
    };
    launchMock.mockImplementation(() => Promise.resolve(context));

    const manager = new BrowserManager('/tmp/profile', { selector: selectorFor('chrome') });

    expect(await manager.waitForLogin('https://x.com', 0)).toBe(false);
    expect(context.newPage).toHaveBeenCalledTimes(1);
  });

  it('closes the context and relaunches on demand', async () => {
    const context = { close: mockResolved(undefined) };
    launchMock.mockImplementation(() => Promise.resolve(context));

    const manager = new BrowserManager('/tmp/profile', { selector: selectorFor('chrome') });
    await manager.launch();
    await manager.close();
    await manager.launch();

    expect(context.close).toHaveBeenCalledTimes(1);
    expect(launchMock).toHaveBeenCalledTimes(2);
  });
});
