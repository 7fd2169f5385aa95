// src/core/config/__tests__/settings.test.ts
import { describe, it, expect } from '@jest/globals';
import * as path from 'path';
import { loadSettings } from '../settings.js';
import { ErrorCode } from '../../errors.js';

describe('loadSettings', () => {
  it('derives paths from the home directory', () => {
    const settings = loadSettings({ TLDUMP_HOME: '/data/tldump' });

    expect(settings).toEqual({
      home: '/data/tldump',
      storePath: path.join('/data/tldump', 'tweets.db'),
      accountsPath: path.join('/data/tldump', 'accounts.json'),
      backend: 'api',
      browser: 'auto',
      profileDir: path.join('/data/tldump', 'profile'),
      headless: false,
      proxy: undefined,
      debug: false,
    });
  });

  it('uses a per-browser profile when a browser is pinned', () => {
    const settings = loadSettings({ TLDUMP_HOME: '/data/tldump', TLDUMP_BROWSER: 'edge' });
    expect(settings.profileDir).toBe(path.join('/data/tldump', 'profile-edge'));
  });

  it('honours explicit overrides', () => {
    const settings = loadSettings({
      TLDUMP_HOME: '/data/tldump',
      TLDUMP_STORE: '/tmp/other.db',
      TLDUMP_ACCOUNTS: '/tmp/accounts.json',
      TLDUMP_PROFILE: '/tmp/profile',
      TLDUMP_BACKEND: 'browser',
      TLDUMP_HEADLESS: 'yes',
      TLDUMP_DEBUG: '1',
      TLDUMP_PROXY: 'http://127.0.0.1:8080',
    });

    expect(settings).toMatchObject({
      storePath: '/tmp/other.db',
      accountsPath: '/tmp/accounts.json',
      profileDir: '/tmp/profile',
      backend: 'browser',
      headless: true,
      debug: true,
      proxy: 'http://127.0.0.1:8080',
    });
  });

  it('falls back to XDG_DATA_HOME on Linux', () => {
    if (process.platform !== 'linux') return;
    expect(loadSettings({ XDG_DATA_HOME: '/xdg' }).home).toBe(path.join('/xdg', 'tldump'));
  });

  it('rejects invalid values with CONFIG_INVALID', () => {
    expect(() => loadSettings({ TLDUMP_BACKEND: 'carrier-pigeon' })).toThrow(
      expect.objectContaining({ code: ErrorCode.CONFIG_INVALID })
    );
    expect(() => loadSettings({ TLDUMP_HEADLESS: 'maybe' })).toThrow(/^Invalid configuration: TLDUMP_HEADLESS: /);
  });
});
