// src/core/strategies/api/__tests__/client.test.ts
import { describe, it, expect, jest } from '@jest/globals';
import { isAuthFailure, paginate, type ApiTweet } from '../client.js';
import { DumpError, ErrorCode } from '../../../errors.js';
import { apiTweet } from './fake-client.js';

interface Page {
  list: ApiTweet[];
  next?: { value?: string };
}

async function ids(source: AsyncIterable<ApiTweet>): Promise<string[]> {
  const out: string[] = [];
  for await (const tweet of source) out.push(tweet.id);
  return out;
}

describe('paginate', () => {
  it('follows the cursor until an empty page', async () => {
    const pages: Record<string, Page> = {
      start: { list: [apiTweet({ id: '3' }), apiTweet({ id: '2' })], next: { value: 'c1' } },
      c1: { list: [apiTweet({ id: '1' })], next: { value: 'c2' } },
      c2: { list: [], next: { value: 'c3' } },
    };
    const fetchPage = jest.fn(async (cursor?: string): Promise<Page> => pages[cursor ?? 'start']);

    expect(await ids(paginate(fetchPage, 'fetch list 1'))).toEqual(['3', '2', '1']);
    expect(fetchPage.mock.calls.map(([cursor]) => cursor)).toEqual([undefined, 'c1', 'c2']);
  });

  it('stops when the cursor is missing or repeats', async () => {
    const repeating = jest.fn(async (): Promise<Page> => ({ list: [apiTweet({ id: '1' })], next: { value: 'same' } }));
    expect(await ids(paginate(repeating, 'fetch'))).toEqual(['1', '1']);
    expect(repeating).toHaveBeenCalledTimes(2);

    const last = jest.fn(async (): Promise<Page> => ({ list: [apiTweet({ id: '1' })] }));
    expect(await ids(paginate(last, 'fetch'))).toEqual(['1']);
    expect(last).toHaveBeenCalledTimes(1);
  });

  it('respects the page budget', async () => {
    let n = 0;
    const endless = jest.fn(async (): Promise<Page> => {
      n++;
      return { list: [apiTweet({ id: String(n) })], next: { value: `c${n}` } };
    });

    expect(await ids(paginate(endless, 'fetch', 3))).toEqual(['1', '2', '3']);
  });

  it('maps auth failures to LOGIN_REQUIRED and others to a retryable network error', async () => {
    const rejected = paginate(async () => {
      throw Object.assign(new Error('Forbidden'), { status: 403 });
    }, 'fetch list 9');
    await expect(ids(rejected)).rejects.toMatchObject({ code: ErrorCode.LOGIN_REQUIRED });

    const broken = paginate(async () => {
      throw new Error('socket hang up');
    }, 'fetch list 9');
    const error = await ids(broken).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DumpError);
    expect(error).toMatchObject({
      code: ErrorCode.NETWORK_ERROR,
      retryable: true,
      message: 'Failed to fetch list 9: socket hang up',
    });
  });
});

describe('isAuthFailure', () => {
  it('recognises 401 and 403 by status or code', () => {
    expect(isAuthFailure({ status: 401 })).toBe(true);
    expect(isAuthFailure({ code: 403 })).toBe(true);
    expect(isAuthFailure({ status: 500 })).toBe(false);
    expect(isAuthFailure('401')).toBe(false);
  });
});
