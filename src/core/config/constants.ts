// src/core/config/constants.ts
export const APP_NAME = 'tldump';

export const BASE_URL = 'https://x.com';

export const ACCEPTED_HOSTS = [
  'x.com',
  'www.x.com',
  'mobile.x.com',
  'twitter.com',
  'www.twitter.com',
  'mobile.twitter.com',
] as const;

// First path segments that look like handles but are app routes
export const RESERVED_PATHS = [
  'i',
  'home',
  'explore',
  'search',
  'notifications',
  'messages',
  'settings',
  'compose',
  'intent',
] as const;

export const GRAPHQL_PATH_PREFIX = '/i/api/graphql/';
export const LIST_ENDPOINTS = ['ListLatestTweetsTimeline', 'ListTimeline'] as const;
export const USER_ENDPOINTS = ['UserTweets', 'UserTweetsAndReplies'] as const;
export const THREAD_ENDPOINTS = ['TweetDetail'] as const;
export const USER_LOOKUP_ENDPOINT = 'UserByScreenName';

export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const MAX_IDLE_CYCLES = 5;
export const MAX_REPLY_PAGES = 10;

// [min, max] in milliseconds
export const SETTLE_DELAY: readonly [number, number] = [2000, 4000];
export const THREAD_SETTLE_DELAY: readonly [number, number] = [2000, 3000];
export const SCROLL_DELAY: readonly [number, number] = [2500, 4500];
export const THREAD_PACING_DELAY: readonly [number, number] = [3000, 6000];

export const LOGGED_IN_SELECTORS = [
  '[data-testid="SideNav_NewTweet_Button"]',
  '[data-testid="AppTabBar_Profile_Link"]',
  '[aria-label="Account menu"]',
] as const;
export const LOGIN_WALL_SELECTOR = '[data-testid="sheetDialog"], [data-testid="loginButton"]';

export const LOGIN_POLL_INTERVAL = 2000;
export const DEFAULT_LOGIN_TIMEOUT_MINUTES = 5;
