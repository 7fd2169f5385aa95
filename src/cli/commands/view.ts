// src/cli/commands/view.ts
import { Command } from 'commander';
import { parseTimelineUrl } from '../../core/target/resolver.js';
import { formatTweetJson } from '../../core/export/json.js';
import { formatSummary } from '../../core/export/summary.js';
import { DumpError, ErrorCode } from '../../core/errors.js';
import { defaultRuntime, parseLimit, runAction, type CliRuntime } from '../runtime.js';
import type { TweetStore } from '../../core/store/types.js';
import type { Tweet } from '../../core/types/index.js';

export interface ViewCommandOptions {
  limit?: string;
  pretty?: boolean;
  summary?: boolean;
  oldestFirst?: boolean;
  retweets: boolean;
  thread?: string;
}

function printTweets(runtime: CliRuntime, tweets: Tweet[], options: ViewCommandOptions): void {
  const visible = options.retweets ? tweets : tweets.filter((tweet) => !tweet.isRepost);
  if (options.summary) {
    if (visible.length > 0) runtime.out(formatSummary(visible));
    return;
  }
  for (const tweet of visible) {
    runtime.out(formatTweetJson(tweet, options.pretty));
  }
}

function viewStored(runtime: CliRuntime, store: TweetStore, url: string | undefined, options: ViewCommandOptions): void {
  if (options.thread) {
    const tweets = store.getThread(options.thread);
    if (tweets.length === 0) {
      runtime.err(`No tweets found for thread ${options.thread}`);
      runtime.setExitCode(1);
      return;
    }
    printTweets(runtime, tweets, options);
    return;
  }

  if (!url) {
    throw new DumpError(ErrorCode.INVALID_ARGUMENT, 'A timeline URL or --thread <conversationId> is required');
  }

  const target = parseTimelineUrl(url);
  if (!store.getTimelineRecord(target.key)) {
    runtime.err(`No stored data for ${url}. Run 'tldump scrape' first.`);
    runtime.setExitCode(1);
    return;
  }

  const tweets = store.getTweetsForTimeline(target.key, {
    limit: parseLimit(options.limit),
    order: options.oldestFirst ? 'oldest' : 'newest',
  });
  if (tweets.length === 0) {
    runtime.err(`No tweets stored for ${url}`);
    return;
  }
  printTweets(runtime, tweets, options);
}

export function registerViewCommand(program: Command, runtime: CliRuntime = defaultRuntime): void {
  program
    .command('view')
    .description('Print tweets already in the local store (no fetching)')
    .argument('[url]', 'Timeline URL used when scraping')
    .option('-n, --limit <n>', 'Maximum number of tweets to print')
    .option('-p, --pretty', 'Pretty-print JSON output', false)
    .option('-s, --summary', 'Plain-text digest instead of JSON', false)
    .option('--oldest-first', 'Oldest tweets first', false)
    .option('--no-retweets', 'Leave out reposts')
    .option('-t, --thread <conversationId>', 'Print one stored thread')
    .action(async (url: string | undefined, options: ViewCommandOptions) => {
      await runAction(runtime, async () => {
        const store = runtime.openStore(runtime.loadSettings());
        try {
          viewStored(runtime, store, url, options);
        } finally {
          store.close();
        }
      });
    });
}
