// src/core/orchestrator.ts
import type { FetchStrategy } from './strategies/types.js';
import type { TweetStore } from './store/types.js';
import type { TimelineTarget, Tweet } from './types/index.js';
import { DumpError, ErrorCode, isDumpError } from './errors.js';
import { THREAD_PACING_DELAY } from './config/constants.js';
import { rekeyThreadTarget } from './target/resolver.js';
import { newerId, olderId } from './tweet/ids.js';

export type StopReason = 'end' | 'cache' | 'cutoff';

export interface ScrapeOptions {
  limit?: number;
  cutoff?: Date;
  /** Label for the cutoff in log lines, e.g. "7d". */
  cutoffLabel?: string;
  expandThreads?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface ScrapeSummary {
  timelineKey: string;
  fetched: number;
  emitted: number;
  cached: number;
  fromThreads: number;
  stopReason: StopReason;
  stopTweetId?: string;
  oldestCreatedAt?: Date;
}

export interface OrchestratorOptions {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/** Mutable bookkeeping for one scrape invocation. */
class ScrapeRun {
  seen = new Set<string>();
  conversations = new Set<string>();
  newestId?: string;
  oldestId?: string;
  summary: ScrapeSummary;

  constructor(public target: TimelineTarget) {
    this.summary = {
      timelineKey: target.key,
      fetched: 0,
      emitted: 0,
      cached: 0,
      fromThreads: 0,
      stopReason: 'end',
    };
  }

  get key(): string {
    return this.summary.timelineKey;
  }

  /** First sighting in this run? */
  claim(tweet: Tweet): boolean {
    if (this.seen.has(tweet.id)) {
      return false;
    }
    this.seen.add(tweet.id);
    return true;
  }

  recordEmitted(tweet: Tweet): void {
    this.summary.emitted++;
    const oldest = this.summary.oldestCreatedAt;
    if (!oldest || tweet.createdAt < oldest) {
      this.summary.oldestCreatedAt = tweet.createdAt;
    }
  }

  /** Only the primary stream moves the timeline's id bounds. */
  widenBounds(tweet: Tweet): void {
    this.newestId = newerId(this.newestId, tweet.id);
    this.oldestId = olderId(this.oldestId, tweet.id);
  }

  stop(reason: StopReason, tweet: Tweet): void {
    this.summary.stopReason = reason;
    this.summary.stopTweetId = tweet.id;
  }
}

/**
 * Drives one strategy stream, applies the cache/cutoff stop rules,
 * persists what it emits and expands self-threads afterwards.
 */
export class ScrapeOrchestrator {
  private summary?: ScrapeSummary;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;

  constructor(
    private strategy: FetchStrategy,
    private store?: TweetStore,
    options: OrchestratorOptions = {}
  ) {
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  get lastSummary(): ScrapeSummary | undefined {
    return this.summary;
  }

  async *scrape(target: TimelineTarget, options: ScrapeOptions = {}): AsyncGenerator<Tweet> {
    const run = new ScrapeRun(target);
    this.summary = run.summary;
    let completed = false;

    try {
      if (target.type === 'thread') {
        yield* this.scrapeThreadTarget(run, options);
      } else {
        yield* this.scrapeTimeline(run, options);
        if (options.expandThreads && run.conversations.size > 0) {
          yield* this.expandThreads(run, options);
        }
      }
      completed = true;
    } finally {
      // Cancelled runs still record what they emitted
      if (this.store && (completed || run.summary.emitted > 0)) {
        this.store.updateTimelineRecord(run.key, target.sourceUrl, target.type, run.newestId, run.oldestId);
      }
    }
  }

  private openStream(target: TimelineTarget, limit?: number): AsyncIterable<Tweet> {
    switch (target.type) {
      case 'list':
        if (!target.listId) break;
        return this.strategy.streamListTimeline(target.listId, limit);
      case 'user':
        if (!target.handle) break;
        return this.strategy.streamUserTimeline(target.handle, limit);
      case 'thread':
        if (!target.tweetId) break;
        return this.strategy.streamThread(target.tweetId, limit);
    }
    throw new DumpError(ErrorCode.INVALID_ARGUMENT, `Incomplete ${target.type} target: ${target.key}`);
  }

  private async *scrapeTimeline(run: ScrapeRun, options: ScrapeOptions): AsyncGenerator<Tweet> {
    const { cutoff } = options;

    for await (const tweet of this.openStream(run.target, options.limit)) {
      run.summary.fetched++;
      if (!run.claim(tweet)) {
        continue;
      }

      if (cutoff && tweet.createdAt < cutoff) {
        run.stop('cutoff', tweet);
        this.log(options, `Reached tweets older than ${options.cutoffLabel ?? cutoff.toISOString()}, stopping.`);
        return;
      }

      if (this.store?.hasTweet(tweet.id)) {
        run.summary.cached++;
        if (!cutoff) {
          run.stop('cache', tweet);
          this.log(options, `Found cached tweet ${tweet.id}, stopping.`);
          return;
        }
        if (options.verbose) {
          this.log(options, `${tweet.id} cached, skipping`);
        }
        continue;
      }

      this.store?.storeTweet(tweet, run.key);
      run.recordEmitted(tweet);
      run.widenBounds(tweet);
      yield tweet;

      if (
        options.expandThreads
        && tweet.conversationId
        && (tweet.isSelfThreadContinuation || tweet.isThreadStarter)
      ) {
        run.conversations.add(tweet.conversationId);
      }
    }
  }

  // Oldest-first: an old or cached tweet says nothing about the ones after it
  private async *scrapeThreadTarget(run: ScrapeRun, options: ScrapeOptions): AsyncGenerator<Tweet> {
    const { cutoff } = options;
    let rekeyed = false;

    for await (const tweet of this.openStream(run.target, options.limit)) {
      run.summary.fetched++;
      if (!run.claim(tweet)) {
        continue;
      }

      if (!rekeyed && tweet.conversationId) {
        run.target = rekeyThreadTarget(run.target, tweet.conversationId);
        run.summary.timelineKey = run.target.key;
        rekeyed = true;
      }

      if (cutoff && tweet.createdAt < cutoff) {
        continue;
      }
      if (this.store?.hasTweet(tweet.id)) {
        run.summary.cached++;
        continue;
      }

      this.store?.storeTweet(tweet, run.key);
      run.recordEmitted(tweet);
      run.widenBounds(tweet);
      yield tweet;
    }
  }

  private async *expandThreads(run: ScrapeRun, options: ScrapeOptions): AsyncGenerator<Tweet> {
    const [min, max] = THREAD_PACING_DELAY;
    this.log(options, `Expanding ${run.conversations.size} threads...`);

    let index = 0;
    for (const conversationId of run.conversations) {
      if (index++ > 0) {
        await this.sleep(Math.round(min + this.random() * (max - min)));
      }
      if (options.verbose) {
        this.log(options, `Expanding thread ${conversationId}...`);
      }

      try {
        for await (const tweet of this.strategy.streamThread(conversationId)) {
          if (!run.claim(tweet)) {
            continue;
          }
          this.store?.storeTweet(tweet, run.key);
          run.recordEmitted(tweet);
          run.summary.fromThreads++;
          yield tweet;
        }
      } catch (error) {
        if (!isDumpError(error, ErrorCode.TIMEOUT)) {
          throw error;
        }
        console.error(`[WARN] Thread ${conversationId} timed out, skipping: ${error.message}`);
      }
    }
  }

  private log(options: ScrapeOptions, message: string): void {
    if (!options.quiet) {
      console.error(`[Scrape] ${message}`);
    }
  }
}
