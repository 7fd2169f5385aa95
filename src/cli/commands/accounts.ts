// src/cli/commands/accounts.ts
import { Command } from 'commander';
import { apiKeyFromCookies } from '../../core/accounts/manager.js';
import { DumpError, ErrorCode } from '../../core/errors.js';
import { defaultRuntime, runAction, type CliRuntime } from '../runtime.js';

interface AddAccountOptions {
  apiKey?: string;
  cookies?: string;
}

interface AccountsOptions {
  enable?: string;
  disable?: string;
}

export function registerAccountCommands(program: Command, runtime: CliRuntime = defaultRuntime): void {
  program
    .command('add-account')
    .description('Register credentials for the api backend')
    .argument('<username>', 'Account name to store the credentials under')
    .option('--api-key <key>', 'Ready-made api key')
    .option('--cookies <json>', 'Browser cookies as JSON with auth_token and ct0')
    .action(async (username: string, options: AddAccountOptions) => {
      await runAction(runtime, async () => {
        if (Boolean(options.apiKey) === Boolean(options.cookies)) {
          throw new DumpError(
            ErrorCode.INVALID_ARGUMENT,
            'Pass exactly one of --api-key or --cookies',
            false,
            `Example: tldump add-account me --cookies '{"auth_token":"...","ct0":"..."}'`
          );
        }

        const apiKey = options.apiKey ?? apiKeyFromCookies(options.cookies ?? '');
        const accounts = runtime.openAccounts(runtime.loadSettings());
        await accounts.add(username, apiKey);
        runtime.err(`✓ Account ${username.replace(/^@/, '')} added`);
      });
    });

  program
    .command('accounts')
    .description('List registered api accounts')
    .option('--enable <username>', 'Mark an account active')
    .option('--disable <username>', 'Mark an account inactive so the api backend skips it')
    .action(async (options: AccountsOptions) => {
      await runAction(runtime, async () => {
        const manager = runtime.openAccounts(runtime.loadSettings());
        const toggle = options.enable ?? options.disable;
        if (toggle !== undefined) {
          if (options.enable !== undefined && options.disable !== undefined) {
            throw new DumpError(ErrorCode.INVALID_ARGUMENT, 'Pass only one of --enable or --disable');
          }
          const name = toggle.replace(/^@/, '');
          if (!(await manager.setActive(name, options.enable !== undefined))) {
            throw new DumpError(ErrorCode.INVALID_ARGUMENT, `Unknown account: ${name}`, false, 'Run: tldump accounts');
          }
          runtime.err(`✓ Account ${name} ${options.enable !== undefined ? 'enabled' : 'disabled'}`);
          return;
        }

        const accounts = await manager.list();
        if (accounts.length === 0) {
          runtime.err('No accounts registered. Add one with: tldump add-account <username> --cookies <json>');
          return;
        }
        for (const account of accounts) {
          runtime.out(`${account.username}\t${account.active ? 'active' : 'inactive'}\t${account.addedAt}`);
        }
      });
    });
}
