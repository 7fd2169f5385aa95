// src/core/tweet/__tests__/ids.test.ts
import { describe, it, expect } from '@jest/globals';
import { compareTweetIds, newerId, olderId } from '../ids.js';

describe('tweet ids', () => {
  it('orders numerically, not lexicographically', () => {
    expect(compareTweetIds('100000000000000001', '99999999999999999')).toBe(1);
    expect(compareTweetIds('99999999999999999', '100000000000000001')).toBe(-1);
    expect(compareTweetIds('1750000000000000000', '1750000000000000000')).toBe(0);
  });

  it('keeps precision beyond Number.MAX_SAFE_INTEGER', () => {
    expect(compareTweetIds('9007199254740993', '9007199254740992')).toBe(1);
  });

  it('picks the newer and older id, ignoring absent ones', () => {
    expect(newerId('10', '12')).toBe('12');
    expect(newerId('12', undefined)).toBe('12');
    expect(newerId(undefined, '7')).toBe('7');
    expect(olderId('5', '7')).toBe('5');
    expect(olderId(undefined, undefined)).toBeUndefined();
  });
});
