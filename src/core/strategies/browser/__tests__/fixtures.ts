// Builders for GraphQL payloads shaped like the web app's responses.
import type { Tweet } from '../../../types/index.js';
import type { InterceptedResponse } from '../page.js';

export interface TweetFixture {
  id: string;
  userId?: string;
  handle?: string;
  createdAt?: string;
  text?: string;
  noteText?: string;
  conversationId?: string;
  inReplyToId?: string;
  inReplyToUserId?: string;
  retweet?: boolean;
  quote?: boolean;
  media?: boolean;
}

export function tweetResult(fixture: TweetFixture): Record<string, unknown> {
  const legacy: Record<string, unknown> = {
    id_str: fixture.id,
    created_at: fixture.createdAt ?? 'Mon Jan 15 10:30:00 +0000 2024',
    full_text: fixture.text ?? `tweet ${fixture.id}`,
    conversation_id_str: fixture.conversationId ?? fixture.id,
    user_id_str: fixture.userId ?? '42',
    is_quote_status: fixture.quote ?? false,
  };
  if (fixture.inReplyToId) legacy.in_reply_to_status_id_str = fixture.inReplyToId;
  if (fixture.inReplyToUserId) legacy.in_reply_to_user_id_str = fixture.inReplyToUserId;
  if (fixture.retweet) legacy.retweeted_status_result = { result: {} };
  if (fixture.media) legacy.extended_entities = { media: [{ type: 'photo' }] };

  const result: Record<string, unknown> = {
    __typename: 'Tweet',
    rest_id: fixture.id,
    core: {
      user_results: {
        result: {
          rest_id: fixture.userId ?? '42',
          core: { screen_name: fixture.handle ?? 'alice' },
        },
      },
    },
    legacy,
  };
  if (fixture.noteText) {
    result.note_tweet = { note_tweet_results: { result: { text: fixture.noteText } } };
  }
  return result;
}

export function itemContent(result: Record<string, unknown>): Record<string, unknown> {
  return { itemType: 'TimelineTweet', tweet_results: { result } };
}

export function tweetEntry(fixture: TweetFixture): Record<string, unknown> {
  return {
    entryId: `tweet-${fixture.id}`,
    content: { entryType: 'TimelineTimelineItem', itemContent: itemContent(tweetResult(fixture)) },
  };
}

export function moduleEntry(id: string, fixtures: TweetFixture[]): Record<string, unknown> {
  return {
    entryId: `profile-conversation-${id}`,
    content: {
      entryType: 'TimelineTimelineModule',
      items: fixtures.map((fixture) => ({
        entryId: `item-${fixture.id}`,
        item: { itemContent: itemContent(tweetResult(fixture)) },
      })),
    },
  };
}

export function cursorEntry(position: 'top' | 'bottom'): Record<string, unknown> {
  return {
    entryId: `cursor-${position}-1`,
    content: { entryType: 'TimelineTimelineCursor', value: 'abc', cursorType: position === 'top' ? 'Top' : 'Bottom' },
  };
}

function addEntries(entries: unknown[]): Record<string, unknown> {
  return { type: 'TimelineAddEntries', entries };
}

export function listBody(entries: unknown[]): Record<string, unknown> {
  return { data: { list: { tweets_timeline: { timeline: { instructions: [addEntries(entries)] } } } } };
}

export function userBodyV2(entries: unknown[]): Record<string, unknown> {
  return { data: { user: { result: { timeline_v2: { timeline: { instructions: [addEntries(entries)] } } } } } };
}

/** A profile page whose pinned tweet arrives ahead of the regular entries. */
export function userBodyWithPin(pinned: TweetFixture, entries: unknown[]): Record<string, unknown> {
  const instructions = [
    { type: 'TimelineClearCache' },
    { type: 'TimelinePinEntry', entry: tweetEntry(pinned) },
    addEntries(entries),
  ];
  return { data: { user: { result: { timeline_v2: { timeline: { instructions } } } } } };
}

export function userBodyNested(entries: unknown[]): Record<string, unknown> {
  return { data: { user: { result: { timeline: { timeline: { instructions: [addEntries(entries)] } } } } } };
}

export function threadBody(entries: unknown[]): Record<string, unknown> {
  return { data: { threaded_conversation_with_injections_v2: { instructions: [addEntries(entries)] } } };
}

export function userLookupBody(restId?: string): Record<string, unknown> {
  return restId ? { data: { user: { result: { __typename: 'User', rest_id: restId } } } } : { data: {} };
}

export function graphqlUrl(endpoint: string): string {
  return `https://x.com/i/api/graphql/AbCdEf123/${endpoint}?variables=%7B%7D`;
}

export function fakeResponse(url: string, body: unknown, status: number = 200): InterceptedResponse {
  return {
    url: () => url,
    ok: () => status >= 200 && status < 300,
    status: () => status,
    json: async () => body,
  };
}

export function makeTweet(overrides: Partial<Tweet> & { id: string }): Tweet {
  return {
    createdAt: new Date('2024-01-15T10:30:00Z'),
    authorId: '42',
    authorHandle: 'alice',
    text: `tweet ${overrides.id}`,
    isRepost: false,
    isQuote: false,
    hasMedia: false,
    isSelfThreadContinuation: false,
    isThreadStarter: false,
    raw: {},
    ...overrides,
  };
}
