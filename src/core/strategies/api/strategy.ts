// src/core/strategies/api/strategy.ts
import type { Tweet } from '../../types/index.js';
import type { FetchStrategy } from '../types.js';
import { DumpError, ErrorCode } from '../../errors.js';
import { MAX_REPLY_PAGES } from '../../config/constants.js';
import { parseTwitterDate } from '../../tweet/dates.js';
import { compareTweetIds } from '../../tweet/ids.js';
import { AuthorLedger, mapApiTweet } from './mapper.js';
import type { ApiTweet, TimelineClient } from './client.js';

export interface ApiStrategyOptions {
  debug?: boolean;
}

function byCreatedThenId(a: ApiTweet, b: ApiTweet): number {
  const diff = parseTwitterDate(a.createdAt).getTime() - parseTwitterDate(b.createdAt).getTime();
  return diff !== 0 ? diff : compareTweetIds(a.id, b.id);
}

export class ApiReplayStrategy implements FetchStrategy {
  readonly kind = 'api' as const;
  private userIds = new Map<string, string>();

  constructor(
    private client: TimelineClient,
    private options: ApiStrategyOptions = {}
  ) {}

  async resolveUserId(handle: string): Promise<string> {
    const key = handle.replace(/^@/, '').toLowerCase();
    const cached = this.userIds.get(key);
    if (cached) {
      return cached;
    }

    const user = await this.client.userByHandle(key);
    if (!user) {
      throw new DumpError(
        ErrorCode.USER_NOT_FOUND,
        `User not found: @${key}`,
        false,
        'Check the handle in the profile URL',
        { handle: key }
      );
    }

    this.userIds.set(key, user.id);
    return user.id;
  }

  streamListTimeline(listId: string, limit?: number): AsyncIterable<Tweet> {
    return this.mapStream(this.client.listTimeline(listId), limit);
  }

  async *streamUserTimeline(handle: string, limit?: number): AsyncGenerator<Tweet> {
    const userId = await this.resolveUserId(handle);
    yield* this.mapStream(this.client.userTimeline(userId), limit);
  }

  /**
   * Rebuilds a self-thread from single lookups plus the root author's
   * replies timeline; the API has no conversation endpoint we can page.
   */
  async *streamThread(tweetId: string, limit?: number): AsyncGenerator<Tweet> {
    const requested = await this.client.tweet(tweetId);
    if (!requested) {
      console.error(`[WARN] Tweet ${tweetId} not found, thread is empty`);
      return;
    }

    const rootId = requested.conversationId || requested.id;
    const root = rootId === requested.id ? requested : await this.client.tweet(rootId);
    const authorId = (root ?? requested).tweetBy.id;

    const collected = new Map<string, ApiTweet>();
    const keep = (tweet: ApiTweet): void => {
      if (tweet.tweetBy.id === authorId) {
        collected.set(tweet.id, tweet);
      }
    };

    if (root) keep(root);
    keep(requested);

    // Walk up the reply chain while it stays with the root author
    let current = requested;
    while (current.replyTo && current.tweetBy.id === authorId && !collected.has(current.replyTo)) {
      const parent = await this.client.tweet(current.replyTo);
      if (!parent || parent.tweetBy.id !== authorId) {
        break;
      }
      keep(parent);
      current = parent;
    }

    // Continuations after the requested tweet only show up in the replies timeline
    const rootCreated = root ? parseTwitterDate(root.createdAt).getTime() : undefined;
    for await (const tweet of this.client.userReplies(authorId, { maxPages: MAX_REPLY_PAGES })) {
      if (rootCreated !== undefined && parseTwitterDate(tweet.createdAt).getTime() < rootCreated) {
        break;
      }
      if (tweet.conversationId === rootId) {
        keep(tweet);
      }
    }

    if (this.options.debug) {
      console.error(`[DEBUG] Thread ${rootId}: ${collected.size} tweets by ${authorId}`);
    }

    const ledger = new AuthorLedger();
    const ordered = [...collected.values()].sort(byCreatedThenId);
    let count = 0;
    for (const tweet of ordered) {
      if (limit !== undefined && count >= limit) {
        return;
      }
      yield mapApiTweet(tweet, ledger);
      count++;
    }
  }

  async close(): Promise<void> {
    this.userIds.clear();
  }

  private async *mapStream(source: AsyncIterable<ApiTweet>, limit?: number): AsyncGenerator<Tweet> {
    if (limit !== undefined && limit <= 0) {
      return;
    }
    const ledger = new AuthorLedger();
    const seen = new Set<string>();
    let count = 0;

    for await (const item of source) {
      if (seen.has(item.id)) {
        continue;
      }
      seen.add(item.id);

      yield mapApiTweet(item, ledger);
      count++;
      if (limit !== undefined && count >= limit) {
        return;
      }
    }
  }
}
