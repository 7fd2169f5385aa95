// src/cli/commands/install-browsers.ts
import { Command } from 'commander';
import { execFileSync } from 'child_process';
import { defaultRuntime, type CliRuntime } from '../runtime.js';

interface InstallOptions {
  withDeps?: boolean;
}

export function installArgs(options: InstallOptions): string[] {
  return ['install', ...(options.withDeps ? ['--with-deps'] : []), 'chromium'];
}

export function registerInstallBrowsersCommand(program: Command, runtime: CliRuntime = defaultRuntime): void {
  program
    .command('install-browsers')
    .description("Install Playwright's bundled Chromium (used when Chrome and Edge are missing)")
    .option('--with-deps', 'Also install system libraries (Linux, needs root)', false)
    .action((options: InstallOptions) => {
      try {
        execFileSync(process.execPath, [require.resolve('playwright/cli'), ...installArgs(options)], {
          stdio: 'inherit',
        });
        runtime.err('✓ Chromium installed');
      } catch (error) {
        runtime.err(`✗ Failed to install Chromium: ${error instanceof Error ? error.message : String(error)}`);
        runtime.err('Note: Chrome or Edge, when installed, are used without this step.');
        runtime.setExitCode(1);
      }
    });
}
