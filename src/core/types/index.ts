export type TimelineType = 'list' | 'user' | 'thread';

export type BrowserType = 'chrome' | 'edge' | 'chromium' | 'auto';

export type ConfigurableBrowser = Exclude<BrowserType, 'auto'>;

export interface BrowserConfig {
  channel?: 'chrome' | 'msedge';  // undefined = Playwright's bundled Chromium
  name: string;
  profileDir: string;
}

/**
 * Backend-independent tweet. Ids are decimal strings; compare them with
 * `compareTweetIds`, never lexicographically.
 */
export interface Tweet {
  id: string;
  createdAt: Date;
  authorId: string;
  authorHandle: string;
  text: string;
  conversationId?: string;
  inReplyToId?: string;
  isRepost: boolean;
  isQuote: boolean;
  hasMedia: boolean;
  isSelfThreadContinuation: boolean;
  isThreadStarter: boolean;
  raw: Record<string, unknown>;
}

export interface TimelineTarget {
  type: TimelineType;
  key: string;            // "list:<id>", "user:<handle>" or "thread:<id>"
  sourceUrl: string;
  listId?: string;
  handle?: string;
  tweetId?: string;
}

export interface TimelineRecord {
  key: string;
  sourceUrl: string;
  type: TimelineType;
  firstScrapedAt: string;  // ISO 8601
  lastScrapedAt: string;   // ISO 8601
  newestId?: string;
  oldestId?: string;
}
