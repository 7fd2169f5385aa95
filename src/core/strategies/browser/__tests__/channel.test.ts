// src/core/strategies/browser/__tests__/channel.test.ts
import { describe, it, expect } from '@jest/globals';
import { TweetChannel } from '../channel.js';
import { makeTweet } from './fixtures.js';

describe('TweetChannel', () => {
  it('drains in arrival order and empties the queue', () => {
    const channel = new TweetChannel();
    channel.push(makeTweet({ id: '2' }));
    channel.push(makeTweet({ id: '1' }));

    expect(channel.drain().tweets.map((t) => t.id)).toEqual(['2', '1']);
    expect(channel.drain()).toEqual({ tweets: [], ended: false });
  });

  it('rejects ids it has already taken in, even after a drain', () => {
    const channel = new TweetChannel();
    expect(channel.push(makeTweet({ id: '1' }))).toBe(true);
    channel.drain();
    expect(channel.push(makeTweet({ id: '1' }))).toBe(false);
  });

  it('keeps queued tweets after the end signal but accepts no more', () => {
    const channel = new TweetChannel();
    channel.push(makeTweet({ id: '1' }));
    channel.end();

    expect(channel.push(makeTweet({ id: '2' }))).toBe(false);

    const drained = channel.drain();
    expect(drained.tweets.map((t) => t.id)).toEqual(['1']);
    expect(drained.ended).toBe(true);
  });
});
