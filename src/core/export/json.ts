// src/core/export/json.ts
import type { Tweet } from '../types/index.js';

/** The stable field set written to stdout, one object per tweet. */
export interface TweetRecord {
  id: string;
  createdAt: string;
  authorId: string;
  authorHandle: string;
  text: string;
  conversationId: string | null;
  inReplyToId: string | null;
  isRepost: boolean;
  isQuote: boolean;
  hasMedia: boolean;
  isSelfThreadContinuation: boolean;
  isThreadStarter: boolean;
  raw: Record<string, unknown>;
}

export function serializeTweet(tweet: Tweet): TweetRecord {
  return {
    id: tweet.id,
    createdAt: tweet.createdAt.toISOString(),
    authorId: tweet.authorId,
    authorHandle: tweet.authorHandle,
    text: tweet.text,
    conversationId: tweet.conversationId ?? null,
    inReplyToId: tweet.inReplyToId ?? null,
    isRepost: tweet.isRepost,
    isQuote: tweet.isQuote,
    hasMedia: tweet.hasMedia,
    isSelfThreadContinuation: tweet.isSelfThreadContinuation,
    isThreadStarter: tweet.isThreadStarter,
    raw: tweet.raw,
  };
}

export function formatTweetJson(tweet: Tweet, pretty: boolean = false): string {
  return pretty
    ? JSON.stringify(serializeTweet(tweet), null, 2)
    : JSON.stringify(serializeTweet(tweet));
}
