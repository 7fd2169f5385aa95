// src/cli/commands/login.ts
import { Command } from 'commander';
import { BASE_URL, DEFAULT_LOGIN_TIMEOUT_MINUTES } from '../../core/config/constants.js';
import { DumpError, ErrorCode } from '../../core/errors.js';
import { defaultRuntime, runAction, type CliRuntime } from '../runtime.js';

interface LoginCommandOptions {
  url: string;
  timeout: string;
}

export function registerLoginCommand(program: Command, runtime: CliRuntime = defaultRuntime): void {
  program
    .command('login')
    .description('Open the browser profile and wait for you to sign in')
    .option('-u, --url <url>', 'Page to open for login', BASE_URL)
    .option('--timeout <minutes>', 'How long to wait for the login', String(DEFAULT_LOGIN_TIMEOUT_MINUTES))
    .action(async (options: LoginCommandOptions) => {
      await runAction(runtime, async () => {
        const minutes = Number(options.timeout);
        if (!Number.isFinite(minutes) || minutes <= 0) {
          throw new DumpError(ErrorCode.INVALID_ARGUMENT, `Invalid timeout: ${options.timeout}`);
        }

        const settings = runtime.loadSettings();
        const browser = runtime.openBrowser(settings);
        try {
          runtime.err(`[INFO] Sign in to X in the browser window (waiting up to ${minutes} min)...`);
          const loggedIn = await browser.waitForLogin(options.url, minutes * 60 * 1000);
          if (!loggedIn) {
            throw new DumpError(
              ErrorCode.LOGIN_REQUIRED,
              'Login not detected before the timeout',
              false,
              'Run `tldump login` again and finish signing in'
            );
          }
          runtime.err(`[INFO] Login detected, session saved in ${settings.profileDir}`);
        } finally {
          await browser.close();
        }
      });
    });
}
