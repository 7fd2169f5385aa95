// src/cli/commands/scrape.ts
import { Command } from 'commander';
import { ScrapeOrchestrator } from '../../core/orchestrator.js';
import { parseTimelineUrl } from '../../core/target/resolver.js';
import { cutoffFrom } from '../../core/tweet/dates.js';
import { formatTweetJson } from '../../core/export/json.js';
import { formatProgressLine, formatScrapeSummary } from '../../core/export/summary.js';
import { defaultRuntime, parseBackend, parseLimit, runAction, type CliRuntime } from '../runtime.js';
import type { Settings } from '../../core/config/settings.js';
import type { TimelineTarget } from '../../core/types/index.js';

export interface ScrapeCommandOptions {
  limit?: string;
  old?: string;
  expandThreads?: boolean;
  pretty?: boolean;
  store: boolean;
  quiet?: boolean;
  verbose?: boolean;
  backend?: string;
}

const PROGRESS_EVERY = 20;

export async function runScrape(
  runtime: CliRuntime,
  settings: Settings,
  target: TimelineTarget,
  options: ScrapeCommandOptions
): Promise<void> {
  const limit = parseLimit(options.limit);
  const cutoff = options.old ? cutoffFrom(options.old) : undefined;

  if (options.verbose) {
    runtime.err(`Target: ${target.key}`);
    runtime.err(`Store: ${options.store ? settings.storePath : 'disabled'}`);
    runtime.err(`Backend: ${settings.backend}`);
    if (cutoff) runtime.err(`Fetching tweets until: ${cutoff.toISOString()}`);
  }

  const store = options.store ? runtime.openStore(settings) : undefined;
  try {
    const strategy = await runtime.createStrategy(settings);
    try {
      const orchestrator = new ScrapeOrchestrator(strategy, store);
      let index = 0;

      for await (const tweet of orchestrator.scrape(target, {
        limit,
        cutoff,
        cutoffLabel: options.old,
        expandThreads: options.expandThreads,
        verbose: options.verbose,
        quiet: options.quiet,
      })) {
        index++;
        runtime.out(formatTweetJson(tweet, options.pretty));
        if (options.verbose) {
          runtime.err(formatProgressLine(index, tweet));
        } else if (!options.quiet && index % PROGRESS_EVERY === 0) {
          runtime.err(`Fetched ${index} tweets...`);
        }
      }

      const summary = orchestrator.lastSummary;
      if (summary && !options.quiet) {
        runtime.err(formatScrapeSummary(summary));
      }
    } finally {
      await strategy.close();
    }
  } finally {
    store?.close();
  }
}

export function withOutputOptions(command: Command): Command {
  return command
    .option('-n, --limit <n>', 'Maximum number of tweets to fetch')
    .option('--old <duration>', 'Scan back this far past cached tweets (e.g. 7d, 12h, 30m)')
    .option('-p, --pretty', 'Pretty-print JSON output', false)
    .option('--no-store', 'Do not read or write the local tweet store')
    .option('-q, --quiet', 'Suppress progress output', false)
    .option('-v, --verbose', 'Print each tweet as it is fetched', false)
    .option('--backend <backend>', 'Fetch backend (api|browser)');
}

export function registerScrapeCommand(program: Command, runtime: CliRuntime = defaultRuntime): void {
  const command = program
    .command('scrape')
    .description('Scrape a list or profile timeline and print new tweets as JSON lines')
    .argument('<url>', 'List (https://x.com/i/lists/<id>) or profile (https://x.com/<handle>) URL')
    .option('-e, --expand-threads', 'Fetch full self-threads found in the timeline', false);

  withOutputOptions(command).action(async (url: string, options: ScrapeCommandOptions) => {
    await runAction(runtime, async () => {
      const base = runtime.loadSettings();
      const settings = { ...base, backend: parseBackend(options.backend, base.backend) };
      await runScrape(runtime, settings, parseTimelineUrl(url), options);
    });
  });
}
