// src/core/strategies/browser/channel.ts
import type { Tweet } from '../../types/index.js';

export interface Drained {
  tweets: Tweet[];
  ended: boolean;
}

/**
 * Single producer / single consumer FIFO between the response observer
 * and the scroll loop. `end()` is the sentinel: it is distinct from the
 * queue being momentarily empty.
 */
export class TweetChannel {
  private queue: Tweet[] = [];
  private ended = false;
  private seen = new Set<string>();

  /** Enqueue unless the id was already taken in. Returns whether it was new. */
  push(tweet: Tweet): boolean {
    if (this.ended || this.seen.has(tweet.id)) {
      return false;
    }
    this.seen.add(tweet.id);
    this.queue.push(tweet);
    return true;
  }

  end(): void {
    this.ended = true;
  }

  drain(): Drained {
    const tweets = this.queue;
    this.queue = [];
    return { tweets, ended: this.ended };
  }
}
