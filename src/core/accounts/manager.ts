// src/core/accounts/manager.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import { DumpError, ErrorCode } from '../errors.js';

export interface AccountRecord {
  apiKey: string;
  addedAt: string;
  active: boolean;
}

const AccountRecordSchema = z.object({
  apiKey: z.string().min(1),
  addedAt: z.string(),
  active: z.boolean(),
});

const AccountDatabaseSchema = z.object({
  version: z.literal(1),
  accounts: z.record(AccountRecordSchema),
});

export type AccountDatabase = z.infer<typeof AccountDatabaseSchema>;

const CookiesSchema = z.object({
  auth_token: z.string().min(1),
  ct0: z.string().min(1),
}).passthrough();

/**
 * Build the client library's api key: base64 of a cookie header string.
 */
export function apiKeyFromCookies(json: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new DumpError(
      ErrorCode.INVALID_ARGUMENT,
      'Cookies must be a JSON object',
      false,
      `Example: --cookies '{"auth_token":"...","ct0":"..."}'`
    );
  }

  const cookies = CookiesSchema.safeParse(parsed);
  if (!cookies.success) {
    throw new DumpError(
      ErrorCode.INVALID_ARGUMENT,
      'Cookies must include auth_token and ct0',
      false,
      'Copy both cookies from a signed-in browser session'
    );
  }

  const header = `auth_token=${cookies.data.auth_token};ct0=${cookies.data.ct0};`;
  return Buffer.from(header).toString('base64');
}

export class AccountManager {
  private database: AccountDatabase = { version: 1, accounts: {} };
  private loaded = false;

  constructor(private accountsPath: string) {}

  async load(): Promise<void> {
    if (this.loaded) return;

    if (!existsSync(this.accountsPath)) {
      this.loaded = true;
      return;
    }

    try {
      const content = await fs.readFile(this.accountsPath, 'utf-8');
      this.database = AccountDatabaseSchema.parse(JSON.parse(content));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[WARN] Account file unreadable (${reason}), starting fresh`);
      await this.backupAndRecover();
    }
    this.loaded = true;
  }

  async save(): Promise<void> {
    await fs.mkdir(path.dirname(this.accountsPath), { recursive: true });
    await fs.writeFile(this.accountsPath, JSON.stringify(this.database, null, 2), { mode: 0o600 });
  }

  async add(username: string, apiKey: string, now: Date = new Date()): Promise<void> {
    await this.load();
    const name = username.replace(/^@/, '');
    if (!name) {
      throw new DumpError(ErrorCode.INVALID_ARGUMENT, 'Username must not be empty');
    }
    this.database.accounts[name] = {
      apiKey,
      addedAt: now.toISOString(),
      active: true,
    };
    await this.save();
  }

  async setActive(username: string, active: boolean): Promise<boolean> {
    await this.load();
    const record = this.database.accounts[username];
    if (!record) {
      return false;
    }
    record.active = active;
    await this.save();
    return true;
  }

  async list(): Promise<Array<{ username: string } & AccountRecord>> {
    await this.load();
    return Object.entries(this.database.accounts).map(([username, record]) => ({ username, ...record }));
  }

  /** First active account's key, in insertion order. */
  async activeApiKey(): Promise<string> {
    const active = (await this.list()).find((account) => account.active);
    if (!active) {
      throw new DumpError(
        ErrorCode.LOGIN_REQUIRED,
        'No active account registered for the api backend',
        false,
        "Run: tldump add-account <username> --cookies '{\"auth_token\":\"...\",\"ct0\":\"...\"}'"
      );
    }
    return active.apiKey;
  }

  private async backupAndRecover(): Promise<void> {
    try {
      await fs.rename(this.accountsPath, this.accountsPath + '.bak');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[WARN] Could not back up account file: ${reason}`);
    }
    this.database = { version: 1, accounts: {} };
  }
}
