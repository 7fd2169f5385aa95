// src/cli/runtime.ts
import { loadSettings, type BackendKind, type Settings } from '../core/config/settings.js';
import { AccountManager } from '../core/accounts/manager.js';
import { BrowserManager } from '../core/strategies/browser/browser.js';
import { registry } from '../core/strategies/registry.js';
import { SqliteTweetStore } from '../core/store/sqlite-store.js';
import { DumpError, ErrorCode, describeError, exitCodeFor } from '../core/errors.js';
import type { FetchStrategy } from '../core/strategies/types.js';
import type { TweetStore } from '../core/store/types.js';

export interface LoginBrowser {
  waitForLogin(url: string, timeoutMs: number): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Everything a command touches outside its own arguments. Commands take
 * one of these so tests can swap in fakes.
 */
export interface CliRuntime {
  loadSettings(): Settings;
  createStrategy(settings: Settings): Promise<FetchStrategy>;
  openStore(settings: Settings): TweetStore;
  openAccounts(settings: Settings): AccountManager;
  openBrowser(settings: Settings): LoginBrowser;
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export const defaultRuntime: CliRuntime = {
  loadSettings: () => loadSettings(),
  createStrategy: (settings) => registry.create(settings),
  openStore: (settings) => new SqliteTweetStore(settings.storePath),
  openAccounts: (settings) => new AccountManager(settings.accountsPath),
  openBrowser: (settings) => new BrowserManager(settings.profileDir, {
    browserType: settings.browser,
    headless: false,
    proxy: settings.proxy,
  }),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

export function parseBackend(value: string | undefined, fallback: BackendKind): BackendKind {
  if (value === undefined) return fallback;
  if (value === 'api' || value === 'browser') return value;
  throw new DumpError(ErrorCode.INVALID_ARGUMENT, `Invalid backend: ${value}. Use api or browser`);
}

export function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new DumpError(ErrorCode.INVALID_ARGUMENT, `Invalid limit: ${value}. Use a positive whole number`);
  }
  return limit;
}

/**
 * Run a command body, turning failures into a message on stderr and an
 * exit code.
 */
export async function runAction(runtime: CliRuntime, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    runtime.err(`Error: ${describeError(error)}`);
    runtime.setExitCode(exitCodeFor(error));
  }
}
