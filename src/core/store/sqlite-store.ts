// src/core/store/sqlite-store.ts
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { DumpError, ErrorCode } from '../errors.js';
import { newerId, olderId } from '../tweet/ids.js';
import { isRecord } from '../utils/tree.js';
import type { TimelineRecord, TimelineType, Tweet } from '../types/index.js';
import type { TimelineQuery, TweetStore } from './types.js';

const SCHEMA = `
CREATE TABLE IF NOT EXISTS timelines (
  key TEXT PRIMARY KEY,
  url TEXT NOT NULL,
  type TEXT NOT NULL,
  first_scraped_at TEXT NOT NULL,
  last_scraped_at TEXT NOT NULL,
  newest_tweet_id TEXT,
  oldest_tweet_id TEXT
);

CREATE TABLE IF NOT EXISTS tweets (
  id TEXT PRIMARY KEY,
  timeline_key TEXT NOT NULL,
  created_at TEXT NOT NULL,
  user_id TEXT NOT NULL,
  screen_name TEXT NOT NULL,
  conversation_id TEXT,
  in_reply_to_id TEXT,
  is_retweet INTEGER NOT NULL DEFAULT 0,
  is_quote INTEGER NOT NULL DEFAULT 0,
  has_media INTEGER NOT NULL DEFAULT 0,
  is_self_thread INTEGER NOT NULL DEFAULT 0,
  is_thread_starter INTEGER NOT NULL DEFAULT 0,
  text TEXT NOT NULL,
  raw TEXT NOT NULL,
  stored_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tweets_timeline ON tweets(timeline_key);
CREATE INDEX IF NOT EXISTS idx_tweets_created ON tweets(created_at);
CREATE INDEX IF NOT EXISTS idx_tweets_user ON tweets(user_id);
CREATE INDEX IF NOT EXISTS idx_tweets_conversation ON tweets(conversation_id);
CREATE INDEX IF NOT EXISTS idx_tweets_reply ON tweets(in_reply_to_id);
`;

interface TweetRow {
  id: string;
  timeline_key: string;
  created_at: string;
  user_id: string;
  screen_name: string;
  conversation_id: string | null;
  in_reply_to_id: string | null;
  is_retweet: number;
  is_quote: number;
  has_media: number;
  is_self_thread: number;
  is_thread_starter: number;
  text: string;
  raw: string;
  stored_at: string;
}

interface TimelineRow {
  key: string;
  url: string;
  type: string;
  first_scraped_at: string;
  last_scraped_at: string;
  newest_tweet_id: string | null;
  oldest_tweet_id: string | null;
}

// Numeric id order without casting: shorter decimal strings are smaller.
const NEWEST_FIRST = 'ORDER BY created_at DESC, length(id) DESC, id DESC';
const OLDEST_FIRST = 'ORDER BY created_at ASC, length(id) ASC, id ASC';

function isTimelineType(value: string): value is TimelineType {
  return value === 'list' || value === 'user' || value === 'thread';
}

function parseRaw(text: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(text);
    return isRecord(parsed) ? parsed : {};
  } catch (error) {
    console.error(`[WARN] Stored raw payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

function rowToTweet(row: TweetRow): Tweet {
  return {
    id: row.id,
    createdAt: new Date(row.created_at),
    authorId: row.user_id,
    authorHandle: row.screen_name,
    text: row.text,
    conversationId: row.conversation_id ?? undefined,
    inReplyToId: row.in_reply_to_id ?? undefined,
    isRepost: row.is_retweet === 1,
    isQuote: row.is_quote === 1,
    hasMedia: row.has_media === 1,
    isSelfThreadContinuation: row.is_self_thread === 1,
    isThreadStarter: row.is_thread_starter === 1,
    raw: parseRaw(row.raw),
  };
}

function rowToRecord(row: TimelineRow): TimelineRecord {
  return {
    key: row.key,
    sourceUrl: row.url,
    type: isTimelineType(row.type) ? row.type : 'list',
    firstScrapedAt: row.first_scraped_at,
    lastScrapedAt: row.last_scraped_at,
    newestId: row.newest_tweet_id ?? undefined,
    oldestId: row.oldest_tweet_id ?? undefined,
  };
}

export class SqliteTweetStore implements TweetStore {
  private db: Database.Database;

  constructor(
    filename: string,
    private now: () => Date = () => new Date()
  ) {
    try {
      if (filename !== ':memory:') {
        fs.mkdirSync(path.dirname(filename), { recursive: true });
      }
      this.db = new Database(filename);
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
    } catch (error) {
      throw new DumpError(
        ErrorCode.STORE_FAILED,
        `Failed to open tweet store: ${error instanceof Error ? error.message : String(error)}`,
        false,
        'Check TLDUMP_STORE and the permissions of its directory',
        { filename }
      );
    }
  }

  hasTweet(id: string): boolean {
    return this.db.prepare<[string], { found: number }>('SELECT 1 AS found FROM tweets WHERE id = ?').get(id) !== undefined;
  }

  storeTweet(tweet: Tweet, timelineKey: string): boolean {
    const result = this.db.prepare(
      `INSERT OR IGNORE INTO tweets (
        id, timeline_key, created_at, user_id, screen_name, conversation_id, in_reply_to_id,
        is_retweet, is_quote, has_media, is_self_thread, is_thread_starter, text, raw, stored_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      tweet.id,
      timelineKey,
      tweet.createdAt.toISOString(),
      tweet.authorId,
      tweet.authorHandle,
      tweet.conversationId ?? null,
      tweet.inReplyToId ?? null,
      tweet.isRepost ? 1 : 0,
      tweet.isQuote ? 1 : 0,
      tweet.hasMedia ? 1 : 0,
      tweet.isSelfThreadContinuation ? 1 : 0,
      tweet.isThreadStarter ? 1 : 0,
      tweet.text,
      JSON.stringify(tweet.raw),
      this.now().toISOString()
    );
    return result.changes > 0;
  }

  getTimelineRecord(key: string): TimelineRecord | undefined {
    const row = this.db.prepare<[string], TimelineRow>('SELECT * FROM timelines WHERE key = ?').get(key);
    return row ? rowToRecord(row) : undefined;
  }

  updateTimelineRecord(
    key: string,
    url: string,
    type: TimelineType,
    newestId?: string,
    oldestId?: string
  ): void {
    const update = this.db.transaction(() => {
      const existing = this.getTimelineRecord(key);
      const timestamp = this.now().toISOString();

      if (!existing) {
        this.db.prepare(
          `INSERT INTO timelines (key, url, type, first_scraped_at, last_scraped_at, newest_tweet_id, oldest_tweet_id)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        ).run(key, url, type, timestamp, timestamp, newestId ?? null, oldestId ?? null);
        return;
      }

      this.db.prepare(
        `UPDATE timelines
         SET url = ?, last_scraped_at = ?, newest_tweet_id = ?, oldest_tweet_id = ?
         WHERE key = ?`
      ).run(
        url,
        timestamp,
        newerId(existing.newestId, newestId) ?? null,
        olderId(existing.oldestId, oldestId) ?? null,
        key
      );
    });
    update();
  }

  getTweetsForTimeline(key: string, query: TimelineQuery = {}): Tweet[] {
    const order = query.order === 'oldest' ? OLDEST_FIRST : NEWEST_FIRST;
    if (query.limit !== undefined) {
      return this.db
        .prepare<[string, number], TweetRow>(`SELECT * FROM tweets WHERE timeline_key = ? ${order} LIMIT ?`)
        .all(key, query.limit)
        .map(rowToTweet);
    }
    return this.db
      .prepare<[string], TweetRow>(`SELECT * FROM tweets WHERE timeline_key = ? ${order}`)
      .all(key)
      .map(rowToTweet);
  }

  getThread(conversationId: string): Tweet[] {
    return this.db
      .prepare<[string, string], TweetRow>(`SELECT * FROM tweets WHERE conversation_id = ? OR id = ? ${OLDEST_FIRST}`)
      .all(conversationId, conversationId)
      .map(rowToTweet);
  }

  countTweets(key: string): number {
    const row = this.db
      .prepare<[string], { total: number }>('SELECT COUNT(*) AS total FROM tweets WHERE timeline_key = ?')
      .get(key);
    return row?.total ?? 0;
  }

  close(): void {
    this.db.close();
  }
}
