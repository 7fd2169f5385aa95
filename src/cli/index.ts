#!/usr/bin/env node

import { Command } from 'commander';
import { registerScrapeCommand } from './commands/scrape.js';
import { registerThreadCommand } from './commands/thread.js';
import { registerViewCommand } from './commands/view.js';
import { registerLoginCommand } from './commands/login.js';
import { registerAccountCommands } from './commands/accounts.js';
import { registerInstallBrowsersCommand } from './commands/install-browsers.js';
import { defaultRuntime, type CliRuntime } from './runtime.js';

export function buildProgram(runtime: CliRuntime = defaultRuntime): Command {
  const program = new Command();

  program
    .name('tldump')
    .description('Dump X/Twitter lists, profiles and threads to JSON with a local cache')
    .version('0.1.0');

  registerScrapeCommand(program, runtime);
  registerThreadCommand(program, runtime);
  registerViewCommand(program, runtime);
  registerLoginCommand(program, runtime);
  registerAccountCommands(program, runtime);
  registerInstallBrowsersCommand(program, runtime);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
}
