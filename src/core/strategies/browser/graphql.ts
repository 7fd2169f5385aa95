// src/core/strategies/browser/graphql.ts
import type { Tweet } from '../../types/index.js';
import { parseTwitterDate } from '../../tweet/dates.js';
import { compareTweetIds } from '../../tweet/ids.js';
import { arrayAt, getPath, isRecord, recordAt, stringAt, type JsonRecord } from '../../utils/tree.js';

/**
 * A shape matcher returns the instruction list when the body has its
 * shape, or undefined to let the next matcher try.
 */
type ShapeMatcher = (data: unknown) => unknown[] | undefined;

function instructionsAt(...path: string[]): ShapeMatcher {
  return (data) => {
    const instructions = getPath(data, [...path, 'instructions']);
    return Array.isArray(instructions) ? instructions : undefined;
  };
}

export const TIMELINE_SHAPES: readonly ShapeMatcher[] = [
  instructionsAt('data', 'list', 'tweets_timeline', 'timeline'),
  instructionsAt('data', 'user', 'result', 'timeline_v2', 'timeline'),
  instructionsAt('data', 'user', 'result', 'timeline', 'timeline'),
  instructionsAt('data', 'user', 'result', 'timeline'),
];

export const THREAD_SHAPES: readonly ShapeMatcher[] = [
  instructionsAt('data', 'threaded_conversation_with_injections_v2'),
  instructionsAt('data', 'threaded_conversation_with_injections'),
];

function matchShape(data: unknown, shapes: readonly ShapeMatcher[]): unknown[] | undefined {
  for (const shape of shapes) {
    const instructions = shape(data);
    if (instructions) {
      return instructions;
    }
  }
  return undefined;
}

function unwrapResult(result: unknown): JsonRecord | undefined {
  if (!isRecord(result)) return undefined;
  if (result.__typename === 'TweetTombstone' || result.__typename === 'TweetUnavailable') {
    return undefined;
  }
  if (result.__typename === 'TweetWithVisibilityResults') {
    return recordAt(result, ['tweet']);
  }
  return result;
}

export function convertGraphqlTweet(result: JsonRecord): Tweet | undefined {
  const legacy = recordAt(result, ['legacy']);
  if (!legacy) {
    return undefined;
  }

  const id = stringAt(legacy, ['id_str']) ?? stringAt(result, ['rest_id']);
  if (!id) {
    return undefined;
  }

  const user = recordAt(result, ['core', 'user_results', 'result']);
  const authorId = stringAt(user, ['rest_id']) ?? stringAt(legacy, ['user_id_str']) ?? '';
  const authorHandle = stringAt(user, ['core', 'screen_name'])
    ?? stringAt(user, ['legacy', 'screen_name'])
    ?? '';
  const inReplyToUser = stringAt(legacy, ['in_reply_to_user_id_str']);

  return {
    id,
    createdAt: parseTwitterDate(legacy.created_at),
    authorId,
    authorHandle,
    text: stringAt(result, ['note_tweet', 'note_tweet_results', 'result', 'text'])
      ?? stringAt(legacy, ['full_text'])
      ?? '',
    conversationId: stringAt(legacy, ['conversation_id_str']),
    inReplyToId: stringAt(legacy, ['in_reply_to_status_id_str']),
    isRepost: 'retweeted_status_result' in legacy,
    isQuote: legacy.is_quote_status === true,
    hasMedia: arrayAt(legacy, ['extended_entities', 'media']).length > 0,
    isSelfThreadContinuation: inReplyToUser !== undefined && inReplyToUser === authorId,
    isThreadStarter: false,
    raw: result,
  };
}

function tweetFromItemContent(itemContent: unknown): Tweet | undefined {
  if (!isRecord(itemContent)) return undefined;
  const itemType = itemContent.itemType ?? itemContent.__typename;
  if (itemType !== 'TimelineTweet') return undefined;

  const result = unwrapResult(getPath(itemContent, ['tweet_results', 'result']));
  return result ? convertGraphqlTweet(result) : undefined;
}

function markThreadStarter(tweets: Tweet[]): void {
  if (tweets.length < 2) return;

  const first = tweets[0];
  const sameAuthor = tweets.filter((tweet) => tweet.authorId === first.authorId);
  if (sameAuthor.length < 2) return;

  const root = sameAuthor.find((tweet) => tweet.id === first.conversationId);
  const starter = root ?? sameAuthor.reduce((earliest, tweet) => {
    const diff = tweet.createdAt.getTime() - earliest.createdAt.getTime();
    if (diff !== 0) return diff < 0 ? tweet : earliest;
    return compareTweetIds(tweet.id, earliest.id) < 0 ? tweet : earliest;
  });
  starter.isThreadStarter = true;
}

function tweetsFromModule(items: unknown[]): Tweet[] {
  const tweets: Tweet[] = [];
  for (const item of items) {
    const itemContent = getPath(item, ['item', 'itemContent']) ?? getPath(item, ['itemContent']);
    const tweet = tweetFromItemContent(itemContent);
    if (tweet) tweets.push(tweet);
  }
  markThreadStarter(tweets);
  return tweets;
}

export function tweetsFromEntry(entry: unknown): Tweet[] {
  if (!isRecord(entry)) return [];

  const entryId = stringAt(entry, ['entryId']) ?? '';
  if (entryId.startsWith('cursor-')) return [];

  const content = recordAt(entry, ['content']);
  if (!content) return [];

  const contentType = content.entryType ?? content.__typename;
  if (contentType === 'TimelineTimelineCursor') return [];
  if (contentType === 'TimelineTimelineModule') {
    return tweetsFromModule(arrayAt(content, ['items']));
  }

  const tweet = tweetFromItemContent(content.itemContent);
  return tweet ? [tweet] : [];
}

function tweetsFromInstructions(instructions: unknown[]): Tweet[] {
  const tweets: Tweet[] = [];
  for (const instruction of instructions) {
    // Single-entry instructions (TimelinePinEntry, TimelineReplaceEntry) are
    // skipped: a pinned tweet sits outside the newest-first order.
    for (const entry of arrayAt(instruction, ['entries'])) {
      tweets.push(...tweetsFromEntry(entry));
    }

    // Threads append more replies to an existing module
    const moduleItems = arrayAt(instruction, ['moduleItems']);
    if (moduleItems.length > 0) {
      tweets.push(...tweetsFromModule(moduleItems));
    }
  }
  return tweets;
}

/**
 * Tweets in a list or user timeline body. `undefined` means no known
 * shape matched; an empty array means the shape matched but the page held
 * no tweets, which is the end-of-timeline signal.
 */
export function extractTimelineTweets(data: unknown): Tweet[] | undefined {
  const instructions = matchShape(data, TIMELINE_SHAPES);
  return instructions ? tweetsFromInstructions(instructions) : undefined;
}

export function extractThreadTweets(data: unknown): Tweet[] | undefined {
  const instructions = matchShape(data, THREAD_SHAPES);
  return instructions ? tweetsFromInstructions(instructions) : undefined;
}

export function extractUserId(data: unknown): string | undefined {
  return stringAt(data, ['data', 'user', 'result', 'rest_id']);
}

export function endpointOf(url: string, prefix: string): string | undefined {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return undefined;
  }
  if (!pathname.startsWith(prefix)) {
    return undefined;
  }
  const segments = pathname.slice(prefix.length).split('/');
  // <queryId>/<Endpoint>
  return segments.length === 2 && segments[1] ? segments[1] : undefined;
}
