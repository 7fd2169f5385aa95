// src/core/strategies/api/mapper.ts
import type { Tweet } from '../../types/index.js';
import { parseTwitterDate } from '../../tweet/dates.js';
import { toPlainRecord } from '../../utils/tree.js';
import type { ApiTweet } from './client.js';

/**
 * Remembers the author of every tweet mapped so far, so a reply can be
 * recognised as a self-thread continuation when its parent came earlier
 * in the same stream.
 */
export class AuthorLedger {
  private authors = new Map<string, string>();

  remember(tweetId: string, authorId: string): void {
    this.authors.set(tweetId, authorId);
  }

  authorOf(tweetId: string): string | undefined {
    return this.authors.get(tweetId);
  }
}

function optionalId(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : String(value);
}

export function mapApiTweet(source: ApiTweet, ledger: AuthorLedger = new AuthorLedger()): Tweet {
  const id = String(source.id);
  const authorId = String(source.tweetBy.id);
  const inReplyToId = optionalId(source.replyTo);

  const parentAuthor = inReplyToId ? ledger.authorOf(inReplyToId) : undefined;
  ledger.remember(id, authorId);

  return {
    id,
    createdAt: parseTwitterDate(source.createdAt),
    authorId,
    authorHandle: source.tweetBy.userName,
    text: source.fullText ?? '',
    conversationId: optionalId(source.conversationId),
    inReplyToId,
    isRepost: source.retweetedTweet !== undefined && source.retweetedTweet !== null,
    isQuote: source.quoted !== undefined && source.quoted !== null,
    hasMedia: (source.media?.length ?? 0) > 0,
    isSelfThreadContinuation: parentAuthor !== undefined && parentAuthor === authorId,
    isThreadStarter: false,
    raw: toPlainRecord(source),
  };
}
