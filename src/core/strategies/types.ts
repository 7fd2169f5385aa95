// src/core/strategies/types.ts
import type { Tweet } from '../types/index.js';
import type { BackendKind, Settings } from '../config/settings.js';

/**
 * Capability set shared by every fetch backend. Timeline streams are
 * newest first; thread streams are oldest first and hold only the
 * conversation root author's tweets.
 */
export interface FetchStrategy {
  readonly kind: BackendKind;
  resolveUserId(handle: string): Promise<string>;
  streamListTimeline(listId: string, limit?: number): AsyncIterable<Tweet>;
  streamUserTimeline(handle: string, limit?: number): AsyncIterable<Tweet>;
  streamThread(tweetId: string, limit?: number): AsyncIterable<Tweet>;
  close(): Promise<void>;
}

export type StrategyFactory = (settings: Settings) => Promise<FetchStrategy>;
