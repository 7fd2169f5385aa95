// src/core/export/summary.ts
import { BASE_URL } from '../config/constants.js';
import type { ScrapeSummary } from '../orchestrator.js';
import type { Tweet } from '../types/index.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;
const PREVIEW_LENGTH = 50;
const SEPARATOR = '\n\n------\n\n';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY-MM-DD HH:MM` in UTC. */
export function formatTimestamp(date: Date): string {
  return `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} `
    + `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}`;
}

/** Whole days when at least one, else whole hours. */
export function formatAge(createdAt: Date, now: Date = new Date()): string {
  const elapsed = Math.max(0, now.getTime() - createdAt.getTime());
  const days = Math.floor(elapsed / DAY_MS);
  return days > 0 ? `${days}d` : `${Math.floor(elapsed / HOUR_MS)}h`;
}

export function previewText(text: string): string {
  const flat = (value: string): string => value.replace(/\n/g, ' ');
  return text.length > PREVIEW_LENGTH ? `${flat(text.slice(0, PREVIEW_LENGTH))}...` : flat(text);
}

export function formatProgressLine(index: number, tweet: Tweet, now: Date = new Date()): string {
  const marker = tweet.isSelfThreadContinuation ? ' [thread]' : '';
  return `[${index}] @${tweet.authorHandle} (${formatAge(tweet.createdAt, now)} ago)${marker}: ${previewText(tweet.text)}`;
}

export function formatScrapeSummary(summary: ScrapeSummary, now: Date = new Date()): string {
  let line = `Scraped ${summary.fetched} tweets: ${summary.emitted - summary.fromThreads} new, ${summary.cached} cached`;
  if (summary.fromThreads > 0) {
    line += `, ${summary.fromThreads} from threads`;
  }
  if (summary.oldestCreatedAt) {
    const days = Math.floor(Math.max(0, now.getTime() - summary.oldestCreatedAt.getTime()) / DAY_MS);
    line += ` (oldest: ${days}d ago)`;
  }
  return line;
}

/**
 * Plain-text digest of stored tweets. Tweets whose conversation appears
 * more than once in the list link to the conversation root.
 */
export function formatSummary(tweets: Tweet[]): string {
  const conversationSizes = new Map<string, number>();
  for (const tweet of tweets) {
    if (tweet.conversationId) {
      conversationSizes.set(tweet.conversationId, (conversationSizes.get(tweet.conversationId) ?? 0) + 1);
    }
  }

  return tweets
    .map((tweet) => {
      const inThread = tweet.conversationId !== undefined
        && (conversationSizes.get(tweet.conversationId) ?? 0) > 1;
      const statusId = inThread && tweet.conversationId ? tweet.conversationId : tweet.id;
      const url = `${BASE_URL}/${tweet.authorHandle}/status/${statusId}`;
      const header = `@${tweet.authorHandle} @ ${formatTimestamp(tweet.createdAt)} - ${inThread ? '🧵 ' : ''}${url}`;
      return `${header}\n${tweet.text}`;
    })
    .join(SEPARATOR);
}
