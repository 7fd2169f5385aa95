// src/core/target/resolver.ts
import { ACCEPTED_HOSTS, BASE_URL, RESERVED_PATHS } from '../config/constants.js';
import { DumpError, ErrorCode } from '../errors.js';
import type { TimelineTarget } from '../types/index.js';

const LIST_PATH = /^\/i\/lists\/(\d+)\/?$/;
const USER_PATH = /^\/@?(\w{1,15})(?:\/[^/]*)?\/?$/;
const TWEET_ID = /^\d+$/;

function unsupported(url: string): DumpError {
  return new DumpError(
    ErrorCode.UNSUPPORTED_URL,
    `Unsupported URL: ${url}`,
    false,
    'Use a list URL (https://x.com/i/lists/<id>) or a profile URL (https://x.com/<handle>)',
    { url }
  );
}

/**
 * Resolve a list or profile URL into a timeline target.
 */
export function parseTimelineUrl(url: string): TimelineTarget {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw unsupported(url);
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw unsupported(url);
  }

  const host = parsed.hostname.toLowerCase();
  if (!ACCEPTED_HOSTS.some((accepted) => accepted === host)) {
    throw unsupported(url);
  }

  const listMatch = LIST_PATH.exec(parsed.pathname);
  if (listMatch) {
    const listId = listMatch[1];
    return {
      type: 'list',
      key: `list:${listId}`,
      sourceUrl: `${BASE_URL}/i/lists/${listId}`,
      listId,
    };
  }

  const userMatch = USER_PATH.exec(parsed.pathname);
  if (userMatch) {
    const handle = userMatch[1];
    const lowered = handle.toLowerCase();
    if (!RESERVED_PATHS.some((reserved) => reserved === lowered)) {
      return {
        type: 'user',
        key: `user:${lowered}`,
        sourceUrl: `${BASE_URL}/${handle}`,
        handle,
      };
    }
  }

  throw unsupported(url);
}

export function threadTarget(tweetId: string): TimelineTarget {
  if (!TWEET_ID.test(tweetId)) {
    throw new DumpError(
      ErrorCode.UNSUPPORTED_URL,
      `Invalid tweet id: ${tweetId}`,
      false,
      'Tweet ids are numeric, e.g. the last segment of https://x.com/<handle>/status/<id>',
      { tweetId }
    );
  }
  return {
    type: 'thread',
    key: `thread:${tweetId}`,
    sourceUrl: `${BASE_URL}/i/status/${tweetId}`,
    tweetId,
  };
}

export function rekeyThreadTarget(target: TimelineTarget, conversationId: string): TimelineTarget {
  if (target.type !== 'thread') {
    return target;
  }
  return { ...target, key: `thread:${conversationId}` };
}
