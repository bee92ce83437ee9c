/**
 * String and signature similarity
 */

import type { Signature } from './types.js';

const HOST_WEIGHT = 0.3;
const QUERY_WEIGHT = 0.7;

/**
 * Length of the longest common subsequence of two strings.
 *
 * A shared prefix and suffix are matched directly; the rest runs through
 * the O(|a|·|b|) table. With `band` set, only cells within `band` of the
 * diagonal are filled: the result is exact whenever the strings differ by
 * at most `band` unmatched characters, and a lower bound otherwise.
 */
export function lcsLength(a: string, b: string, band: number = Infinity): number {
  let start = 0;
  while (start < a.length && start < b.length && a.charCodeAt(start) === b.charCodeAt(start)) {
    start++;
  }
  let endA = a.length;
  let endB = b.length;
  while (endA > start && endB > start && a.charCodeAt(endA - 1) === b.charCodeAt(endB - 1)) {
    endA--;
    endB--;
  }
  const matched = start + (a.length - endA);

  let long = a.slice(start, endA);
  let short = b.slice(start, endB);
  if (long.length < short.length) {
    [long, short] = [short, long];
  }
  const width = short.length;
  if (width === 0) return matched;

  // Cells outside the band keep older values, which are still valid lower bounds
  let previous = new Uint32Array(width + 1);
  let current = new Uint32Array(width + 1);

  for (let i = 1; i <= long.length; i++) {
    const from = Math.max(1, i - band);
    const to = Math.min(width, i + band);
    if (from > to) break;

    const ch = long.charCodeAt(i - 1);
    for (let j = from; j <= to; j++) {
      current[j] = ch === short.charCodeAt(j - 1)
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return matched + previous[width];
}

/**
 * Upper bound on the LCS: characters the two strings have in common,
 * counted with multiplicity.
 */
function sharedCharacterCount(a: string, b: string): number {
  const counts = new Map<number, number>();
  for (let i = 0; i < a.length; i++) {
    const ch = a.charCodeAt(i);
    counts.set(ch, (counts.get(ch) ?? 0) + 1);
  }
  let shared = 0;
  for (let i = 0; i < b.length; i++) {
    const ch = b.charCodeAt(i);
    const left = counts.get(ch) ?? 0;
    if (left > 0) {
      shared++;
      counts.set(ch, left - 1);
    }
  }
  return shared;
}

/**
 * Normalized similarity in [0, 1]: 2·LCS / (|a| + |b|).
 * Two empty strings are identical (1).
 *
 * With `minRatio`, the result is exact when it is at least `minRatio`;
 * below that it is only guaranteed to stay below `minRatio`.
 */
export function similarityRatio(a: string, b: string, minRatio: number = 0): number {
  const total = a.length + b.length;
  if (total === 0 || a === b) return 1;

  const bound = (2 * sharedCharacterCount(a, b)) / total;
  if (bound < minRatio) return bound;

  // Pairs at or above minRatio leave at most this many characters unmatched
  const band = Math.ceil((1 - Math.max(0, minRatio)) * total) + 1;
  return (2 * lcsLength(a, b, band)) / total;
}

/**
 * Weighted similarity of two signatures. Paths must match exactly; once
 * they do, query differences count more than host differences.
 *
 * With `threshold`, scores at or above it are exact and scores below it
 * may be cut short.
 */
export function signatureSimilarity(a: Signature, b: Signature, threshold: number = 0): number {
  if (a.path !== b.path) {
    return 0;
  }
  const hostSimilarity = similarityRatio(a.host, b.host);
  const queryFloor = (threshold - HOST_WEIGHT * hostSimilarity) / QUERY_WEIGHT;
  const querySimilarity = similarityRatio(a.query, b.query, queryFloor);
  return HOST_WEIGHT * hostSimilarity + QUERY_WEIGHT * querySimilarity;
}
