// src/core/store/types.ts
import type { TimelineRecord, TimelineType, Tweet } from '../types/index.js';

export type TweetOrder = 'newest' | 'oldest';

export interface TimelineQuery {
  limit?: number;
  order?: TweetOrder;
}

/**
 * Persistence the orchestrator and the view command rely on. Tweets are
 * insert-only; timeline bounds only ever widen.
 */
export interface TweetStore {
  hasTweet(id: string): boolean;
  /** Returns false when the id is already stored. */
  storeTweet(tweet: Tweet, timelineKey: string): boolean;
  getTimelineRecord(key: string): TimelineRecord | undefined;
  updateTimelineRecord(
    key: string,
    url: string,
    type: TimelineType,
    newestId?: string,
    oldestId?: string
  ): void;
  getTweetsForTimeline(key: string, query?: TimelineQuery): Tweet[];
  getThread(conversationId: string): Tweet[];
  countTweets(key: string): number;
  close(): void;
}
