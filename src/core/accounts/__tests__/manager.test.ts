// src/core/accounts/__tests__/manager.test.ts
import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AccountManager, apiKeyFromCookies } from '../manager.js';
import { ErrorCode } from '../../errors.js';

describe('apiKeyFromCookies', () => {
  it('encodes auth_token and ct0 as a cookie header', () => {
    const key = apiKeyFromCookies('{"auth_token":"test-token","ct0":"test-csrf","other":"x"}');
    expect(Buffer.from(key, 'base64').toString()).toBe('auth_token=test-token;ct0=test-csrf;');
  });

  it('rejects invalid JSON and missing cookies', () => {
    expect(() => apiKeyFromCookies('not json')).toThrow('Cookies must be a JSON object');
    expect(() => apiKeyFromCookies('{"auth_token":"test-token"}')).toThrow('Cookies must include auth_token and ct0');
  });
});

describe('AccountManager', () => {
  let dir: string;
  let accountsPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tldump-accounts-'));
    accountsPath = path.join(dir, 'nested', 'accounts.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('persists accounts and reloads them', async () => {
    const manager = new AccountManager(accountsPath);
    await manager.add('@alice', 'test-secret', new Date('2024-01-01T00:00:00Z'));

    const reloaded = new AccountManager(accountsPath);
    expect(await reloaded.list()).toEqual([
      { username: 'alice', apiKey: 'test-secret', addedAt: '2024-01-01T00:00:00.000Z', active: true },
    ]);
    expect(await reloaded.activeApiKey()).toBe('test-secret');
  });

  it('returns the first active account key', async () => {
    const manager = new AccountManager(accountsPath);
    await manager.add('alice', 'test-secret-a');
    await manager.add('bob', 'test-secret-b');

    expect(await manager.setActive('alice', false)).toBe(true);
    expect(await manager.activeApiKey()).toBe('test-secret-b');
    expect(await manager.setActive('carol', true)).toBe(false);
  });

  it('requires an active account', async () => {
    const manager = new AccountManager(accountsPath);
    await expect(manager.activeApiKey()).rejects.toMatchObject({ code: ErrorCode.LOGIN_REQUIRED });
  });

  it('rejects empty usernames', async () => {
    const manager = new AccountManager(accountsPath);
    await expect(manager.add('@', 'test-secret')).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
  });

  it('backs up a corrupt file and starts fresh', async () => {
    fs.mkdirSync(path.dirname(accountsPath), { recursive: true });
    fs.writeFileSync(accountsPath, '{ broken');
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});

    const manager = new AccountManager(accountsPath);
    expect(await manager.list()).toEqual([]);
    expect(fs.readFileSync(accountsPath + '.bak', 'utf-8')).toBe('{ broken');
    expect(fs.existsSync(accountsPath)).toBe(false);
    expect(errorSpy).toHaveBeenCalledTimes(1);

    errorSpy.mockRestore();
  });
});
