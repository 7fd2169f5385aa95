// src/cli/commands/thread.ts
import { Command } from 'commander';
import { threadTarget } from '../../core/target/resolver.js';
import { defaultRuntime, parseBackend, runAction, type CliRuntime } from '../runtime.js';
import { runScrape, withOutputOptions, type ScrapeCommandOptions } from './scrape.js';

export function registerThreadCommand(program: Command, runtime: CliRuntime = defaultRuntime): void {
  const command = program
    .command('thread')
    .description("Scrape one tweet's self-thread, oldest first")
    .argument('<tweetId>', 'Id of any tweet in the thread');

  withOutputOptions(command).action(async (tweetId: string, options: ScrapeCommandOptions) => {
    await runAction(runtime, async () => {
      const base = runtime.loadSettings();
      const settings = { ...base, backend: parseBackend(options.backend, base.backend) };
      await runScrape(runtime, settings, threadTarget(tweetId), { ...options, expandThreads: false });
    });
  });
}
