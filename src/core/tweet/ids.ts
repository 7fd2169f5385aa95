// src/core/tweet/ids.ts

// Ids are snowflakes; string length differs across eras so compare numerically.
export function compareTweetIds(a: string, b: string): number {
  const left = BigInt(a);
  const right = BigInt(b);
  if (left === right) return 0;
  return left > right ? 1 : -1;
}

export function newerId(a: string | undefined, b: string | undefined): string | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return compareTweetIds(a, b) >= 0 ? a : b;
}

export function olderId(a: string | undefined, b: string | undefined): string | undefined {
  if (a === undefined) return b;
  if (b === undefined) return a;
  return compareTweetIds(a, b) <= 0 ? a : b;
}
