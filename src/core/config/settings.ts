// src/core/config/settings.ts
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { APP_NAME } from './constants.js';
import { AUTO_PROFILE_DIR, BROWSER_CONFIGS, DEFAULT_BROWSER } from './browser-config.js';
import { DumpError, ErrorCode } from '../errors.js';
import type { BrowserType } from '../types/index.js';

export type BackendKind = 'api' | 'browser';

export interface Settings {
  home: string;
  storePath: string;
  accountsPath: string;
  backend: BackendKind;
  browser: BrowserType;
  profileDir: string;
  headless: boolean;
  proxy?: string;
  debug: boolean;
}

const flag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  TLDUMP_HOME: z.string().min(1).optional(),
  TLDUMP_STORE: z.string().min(1).optional(),
  TLDUMP_ACCOUNTS: z.string().min(1).optional(),
  TLDUMP_BACKEND: z.enum(['api', 'browser']).default('api'),
  TLDUMP_BROWSER: z.enum(['chrome', 'edge', 'chromium', 'auto']).default(DEFAULT_BROWSER),
  TLDUMP_PROFILE: z.string().min(1).optional(),
  TLDUMP_HEADLESS: flag.default('false'),
  TLDUMP_PROXY: z.string().url().optional(),
  TLDUMP_DEBUG: flag.default('false'),
});

export function getAppDataDir(appName: string, env: NodeJS.ProcessEnv = process.env): string {
  if (process.platform === 'win32') {
    const base = env.LOCALAPPDATA || env.APPDATA;
    if (base) {
      return path.join(base, appName);
    }
  }

  if (process.platform === 'darwin') {
    return path.join(os.homedir(), 'Library', 'Application Support', appName);
  }

  if (env.XDG_DATA_HOME) {
    return path.join(env.XDG_DATA_HOME, appName);
  }

  return path.join(os.homedir(), '.local', 'share', appName);
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new DumpError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: ${issues}`,
      false,
      'Check the TLDUMP_* environment variables'
    );
  }

  const values = parsed.data;
  const home = values.TLDUMP_HOME ?? getAppDataDir(APP_NAME, env);
  const profileName = values.TLDUMP_BROWSER === 'auto'
    ? AUTO_PROFILE_DIR
    : BROWSER_CONFIGS[values.TLDUMP_BROWSER].profileDir;

  return {
    home,
    storePath: values.TLDUMP_STORE ?? path.join(home, 'tweets.db'),
    accountsPath: values.TLDUMP_ACCOUNTS ?? path.join(home, 'accounts.json'),
    backend: values.TLDUMP_BACKEND,
    browser: values.TLDUMP_BROWSER,
    profileDir: values.TLDUMP_PROFILE ?? path.join(home, profileName),
    headless: values.TLDUMP_HEADLESS,
    proxy: values.TLDUMP_PROXY,
    debug: values.TLDUMP_DEBUG,
  };
}
