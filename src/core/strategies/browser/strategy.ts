// src/core/strategies/browser/strategy.ts
import type { Tweet } from '../../types/index.js';
import type { FetchStrategy } from '../types.js';
import { DumpError, ErrorCode } from '../../errors.js';
import {
  BASE_URL,
  DEFAULT_TIMEOUT,
  GRAPHQL_PATH_PREFIX,
  LIST_ENDPOINTS,
  LOGGED_IN_SELECTORS,
  LOGIN_WALL_SELECTOR,
  MAX_IDLE_CYCLES,
  SCROLL_DELAY,
  SETTLE_DELAY,
  THREAD_ENDPOINTS,
  THREAD_SETTLE_DELAY,
  USER_ENDPOINTS,
  USER_LOOKUP_ENDPOINT,
} from '../../config/constants.js';
import { compareTweetIds } from '../../tweet/ids.js';
import { TweetChannel } from './channel.js';
import { endpointOf, extractThreadTweets, extractTimelineTweets, extractUserId } from './graphql.js';
import type { BrowserSession, InterceptedResponse, TimelinePage } from './page.js';

export interface BrowserStrategyOptions {
  timeoutMs?: number;
  maxIdleCycles?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  debug?: boolean;
}

type LoginState = 'logged-in' | 'login-wall' | 'unknown';

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

function loginRequired(url: string): DumpError {
  return new DumpError(
    ErrorCode.LOGIN_REQUIRED,
    'Login required: the browser profile is not signed in',
    false,
    'Run `tldump login` and sign in, then retry',
    { url }
  );
}

/**
 * Tracks response handlers still parsing so the driver can wait for them
 * before draining.
 */
class InflightTasks {
  private tasks = new Set<Promise<void>>();

  track(work: Promise<void>): void {
    const task: Promise<void> = work.finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
  }

  async settle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }
}

export class BrowserInterceptionStrategy implements FetchStrategy {
  readonly kind = 'browser' as const;
  private userIds = new Map<string, string>();
  private timeoutMs: number;
  private maxIdleCycles: number;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;
  private debug: boolean;

  constructor(
    private session: BrowserSession,
    options: BrowserStrategyOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.maxIdleCycles = options.maxIdleCycles ?? MAX_IDLE_CYCLES;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
    this.debug = options.debug ?? false;
  }

  async resolveUserId(handle: string): Promise<string> {
    const key = handle.replace(/^@/, '').toLowerCase();
    const cached = this.userIds.get(key);
    if (cached) {
      return cached;
    }

    const url = `${BASE_URL}/${key}`;
    const page = await this.session.newPage();
    try {
      const response = await this.navigate(page, url, (r) => this.endpoint(r) === USER_LOOKUP_ENDPOINT);
      if (!response) {
        await this.settle();
        if ((await this.probeLogin(page)) === 'login-wall') {
          throw loginRequired(url);
        }
        throw new DumpError(
          ErrorCode.TIMEOUT,
          `No profile data for @${key} within ${this.timeoutMs}ms`,
          true,
          undefined,
          { handle: key }
        );
      }
      return await this.captureUserId(response, key);
    } finally {
      await page.close();
    }
  }

  streamListTimeline(listId: string, limit?: number): AsyncIterable<Tweet> {
    return this.scrapeTimeline(`${BASE_URL}/i/lists/${listId}`, LIST_ENDPOINTS, limit);
  }

  streamUserTimeline(handle: string, limit?: number): AsyncIterable<Tweet> {
    const key = handle.replace(/^@/, '').toLowerCase();
    return this.scrapeTimeline(`${BASE_URL}/${key}`, USER_ENDPOINTS, limit, key);
  }

  async *streamThread(tweetId: string, limit?: number): AsyncGenerator<Tweet> {
    const url = `${BASE_URL}/i/status/${tweetId}`;
    const page = await this.session.newPage();
    const inflight = new InflightTasks();
    const collected = new Map<string, Tweet>();

    page.onResponse((response) => {
      const endpoint = this.endpoint(response);
      if (endpoint && THREAD_ENDPOINTS.some((name) => name === endpoint)) {
        inflight.track(this.ingest(response, endpoint, extractThreadTweets, (tweets) => {
          for (const tweet of tweets) {
            if (!collected.has(tweet.id)) collected.set(tweet.id, tweet);
          }
        }));
      }
    });

    try {
      const first = await this.navigate(page, url, (r) => {
        const endpoint = this.endpoint(r);
        return endpoint !== undefined && THREAD_ENDPOINTS.some((name) => name === endpoint);
      });
      if (!first) {
        if ((await this.probeLogin(page)) === 'login-wall') {
          throw loginRequired(url);
        }
        console.error(`[WARN] No thread data for ${tweetId} within ${this.timeoutMs}ms`);
        return;
      }
      await this.sleep(this.delay(THREAD_SETTLE_DELAY));
      await inflight.settle();
    } finally {
      await page.close();
    }

    const tweets = [...collected.values()];
    const requested = collected.get(tweetId);
    const rootId = requested?.conversationId ?? tweets[0]?.conversationId;
    const root = rootId ? collected.get(rootId) : undefined;
    const authorId = root?.authorId ?? requested?.authorId ?? tweets[0]?.authorId;

    const ordered = tweets
      .filter((tweet) => tweet.authorId === authorId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || compareTweetIds(a.id, b.id));

    if (this.debug) {
      console.error(`[DEBUG] Thread ${tweetId}: ${ordered.length}/${tweets.length} tweets by root author`);
    }

    yield* limit === undefined ? ordered : ordered.slice(0, Math.max(limit, 0));
  }

  async close(): Promise<void> {
    await this.session.close();
  }

  private async *scrapeTimeline(
    url: string,
    endpoints: readonly string[],
    limit?: number,
    handle?: string
  ): AsyncGenerator<Tweet> {
    if (limit !== undefined && limit <= 0) {
      return;
    }

    const page = await this.session.newPage();
    const channel = new TweetChannel();
    const inflight = new InflightTasks();
    let failure: unknown;

    // Observer side: parse and enqueue as responses arrive
    page.onResponse((response) => {
      const endpoint = this.endpoint(response);
      if (!endpoint) return;

      if (handle && endpoint === USER_LOOKUP_ENDPOINT) {
        inflight.track(this.captureUserId(response, handle).then(
          () => undefined,
          (error: unknown) => {
            failure = error;
          }
        ));
        return;
      }

      if (endpoints.includes(endpoint)) {
        inflight.track(this.ingest(response, endpoint, extractTimelineTweets, (tweets) => {
          if (tweets.length === 0) {
            channel.end();
            return;
          }
          const fresh = tweets.filter((tweet) => channel.push(tweet)).length;
          if (this.debug) {
            console.error(`[DEBUG] ${endpoint}: ${tweets.length} tweets, ${fresh} new`);
          }
        }));
      }
    });

    try {
      const first = await this.navigate(page, url, (r) => {
        const endpoint = this.endpoint(r);
        return endpoint !== undefined && endpoints.includes(endpoint);
      });
      if (!first && this.debug) {
        console.error(`[DEBUG] No timeline response within ${this.timeoutMs}ms, probing login state`);
      }
      await this.settle();
      if ((await this.probeLogin(page)) === 'login-wall') {
        throw loginRequired(url);
      }

      // Driver side: drain, then scroll for the next page
      let yielded = 0;
      let idleCycles = 0;
      while (true) {
        await inflight.settle();
        if (failure !== undefined) {
          throw failure;
        }

        const { tweets, ended } = channel.drain();
        for (const tweet of tweets) {
          yield tweet;
          yielded++;
          if (limit !== undefined && yielded >= limit) {
            return;
          }
        }

        if (ended) {
          if (this.debug) console.error('[DEBUG] End of timeline reached');
          return;
        }

        idleCycles = tweets.length === 0 ? idleCycles + 1 : 0;
        if (idleCycles >= this.maxIdleCycles) {
          if (this.debug) console.error(`[DEBUG] No new tweets after ${idleCycles} scrolls, stopping`);
          return;
        }

        await page.scrollToBottom();
        await this.sleep(this.delay(SCROLL_DELAY));
      }
    } finally {
      await page.close();
    }
  }

  private async ingest(
    response: InterceptedResponse,
    endpoint: string,
    extract: (data: unknown) => Tweet[] | undefined,
    accept: (tweets: Tweet[]) => void
  ): Promise<void> {
    try {
      if (!response.ok()) {
        console.error(`[WARN] ${ErrorCode.MALFORMED_RESPONSE}: ${endpoint} returned HTTP ${response.status()}`);
        return;
      }
      const tweets = extract(await response.json());
      if (tweets === undefined) {
        console.error(`[WARN] ${ErrorCode.MALFORMED_RESPONSE}: unrecognised ${endpoint} payload`);
        return;
      }
      accept(tweets);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[WARN] ${ErrorCode.MALFORMED_RESPONSE}: ${endpoint} body unreadable: ${message}`);
    }
  }

  private async captureUserId(response: InterceptedResponse, handle: string): Promise<string> {
    let userId: string | undefined;
    try {
      userId = response.ok() ? extractUserId(await response.json()) : undefined;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[WARN] ${ErrorCode.MALFORMED_RESPONSE}: ${USER_LOOKUP_ENDPOINT} body unreadable: ${message}`);
    }

    if (!userId) {
      throw new DumpError(
        ErrorCode.USER_NOT_FOUND,
        `User not found: @${handle}`,
        false,
        'Check the handle in the profile URL',
        { handle }
      );
    }

    this.userIds.set(handle, userId);
    return userId;
  }

  private async navigate(
    page: TimelinePage,
    url: string,
    predicate: (response: InterceptedResponse) => boolean
  ): Promise<InterceptedResponse | null> {
    try {
      const [first] = await Promise.all([
        page.waitForResponse(predicate, this.timeoutMs),
        page.goto(url),
      ]);
      return first;
    } catch (error) {
      if (error instanceof DumpError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new DumpError(ErrorCode.NETWORK_ERROR, `Navigation to ${url} failed: ${message}`, true, undefined, { url });
    }
  }

  private async probeLogin(page: TimelinePage): Promise<LoginState> {
    for (const selector of LOGGED_IN_SELECTORS) {
      if (await page.hasSelector(selector)) {
        return 'logged-in';
      }
    }
    if (await page.hasSelector(LOGIN_WALL_SELECTOR)) {
      return 'login-wall';
    }
    return 'unknown';
  }

  private async settle(): Promise<void> {
    await this.sleep(this.delay(SETTLE_DELAY));
  }

  private delay([min, max]: readonly [number, number]): number {
    return Math.round(min + this.random() * (max - min));
  }

  private endpoint(response: InterceptedResponse): string | undefined {
    return endpointOf(response.url(), GRAPHQL_PATH_PREFIX);
  }
}
