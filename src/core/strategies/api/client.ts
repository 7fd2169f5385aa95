// src/core/strategies/api/client.ts
import { Rettiwt } from 'rettiwt-api';
import { DumpError, ErrorCode } from '../../errors.js';
import { isRecord } from '../../utils/tree.js';

/**
 * The subset of the client library's tweet object the mapper reads.
 * Declared structurally so tests can build tweets without the library.
 */
export interface ApiTweet {
  id: string;
  conversationId?: string;
  createdAt: string;
  fullText?: string;
  tweetBy: ApiUser;
  replyTo?: string;
  quoted?: unknown;
  retweetedTweet?: unknown;
  media?: readonly unknown[];
}

export interface ApiUser {
  id: string;
  userName: string;
}

export interface PageOptions {
  pageSize?: number;
  maxPages?: number;
}

export interface TimelineClient {
  userByHandle(handle: string): Promise<ApiUser | undefined>;
  tweet(id: string): Promise<ApiTweet | undefined>;
  listTimeline(listId: string, options?: PageOptions): AsyncIterable<ApiTweet>;
  userTimeline(userId: string, options?: PageOptions): AsyncIterable<ApiTweet>;
  userReplies(userId: string, options?: PageOptions): AsyncIterable<ApiTweet>;
}

interface CursoredPage {
  list: ApiTweet[];
  next?: { value?: string };
}

type PageFetcher = (cursor?: string) => Promise<CursoredPage>;

const DEFAULT_PAGE_SIZE = 20;

export function isAuthFailure(error: unknown): boolean {
  if (!isRecord(error)) {
    return false;
  }
  const status = error.status ?? error.code;
  return status === 401 || status === 403;
}

function wrapClientError(error: unknown, action: string): DumpError {
  if (error instanceof DumpError) {
    return error;
  }
  if (isAuthFailure(error)) {
    return new DumpError(
      ErrorCode.LOGIN_REQUIRED,
      `Session rejected while trying to ${action}`,
      false,
      'Re-register the account with: tldump add-account',
      { action }
    );
  }
  const message = error instanceof Error ? error.message : String(error);
  return new DumpError(
    ErrorCode.NETWORK_ERROR,
    `Failed to ${action}: ${message}`,
    true,
    undefined,
    { action }
  );
}

/**
 * Follow a cursor until a page comes back empty or the cursor stops moving.
 */
export async function* paginate(
  fetchPage: PageFetcher,
  action: string,
  maxPages: number = Number.POSITIVE_INFINITY
): AsyncGenerator<ApiTweet> {
  let cursor: string | undefined;
  let pages = 0;

  while (pages < maxPages) {
    let page: CursoredPage;
    try {
      page = await fetchPage(cursor);
    } catch (error) {
      throw wrapClientError(error, action);
    }
    pages++;

    if (page.list.length === 0) {
      return;
    }
    yield* page.list;

    const next = page.next?.value;
    if (!next || next === cursor) {
      return;
    }
    cursor = next;
  }
}

export class RettiwtTimelineClient implements TimelineClient {
  private client: Rettiwt;

  constructor(apiKey: string) {
    this.client = new Rettiwt({ apiKey });
  }

  async userByHandle(handle: string): Promise<ApiUser | undefined> {
    try {
      const user = await this.client.user.details(handle);
      return user ? { id: user.id, userName: user.userName } : undefined;
    } catch (error) {
      throw wrapClientError(error, `look up @${handle}`);
    }
  }

  async tweet(id: string): Promise<ApiTweet | undefined> {
    try {
      return await this.client.tweet.details(id);
    } catch (error) {
      throw wrapClientError(error, `fetch tweet ${id}`);
    }
  }

  listTimeline(listId: string, options: PageOptions = {}): AsyncIterable<ApiTweet> {
    const size = options.pageSize ?? DEFAULT_PAGE_SIZE;
    return paginate(
      (cursor) => this.client.list.tweets(listId, size, cursor),
      `fetch list ${listId}`,
      options.maxPages
    );
  }

  userTimeline(userId: string, options: PageOptions = {}): AsyncIterable<ApiTweet> {
    const size = options.pageSize ?? DEFAULT_PAGE_SIZE;
    return paginate(
      (cursor) => this.client.user.timeline(userId, size, cursor),
      `fetch timeline of user ${userId}`,
      options.maxPages
    );
  }

  userReplies(userId: string, options: PageOptions = {}): AsyncIterable<ApiTweet> {
    const size = options.pageSize ?? DEFAULT_PAGE_SIZE;
    return paginate(
      (cursor) => this.client.user.replies(userId, size, cursor),
      `fetch replies of user ${userId}`,
      options.maxPages
    );
  }
}
