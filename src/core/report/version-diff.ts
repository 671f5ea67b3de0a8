/**
 * Version Diff
 *
 * Finds the part two version strings share so only the changed tail gets
 * highlighted, and weighs how large the change is for sorting.
 */

import { MAX_DIFF_WEIGHT, VERSION_SEPARATORS } from '../../constants/index.js';

export interface VersionPrefix {
  /** Leading segments (and their separators) equal in both versions */
  shared: string;
  /** Number of segments that differ; 0 for identical versions */
  weight: number;
}

function isSeparator(token: string): boolean {
  return VERSION_SEPARATORS.has(token);
}

/**
 * Split a version into segments and single-character separators,
 * e.g. `1:2.0-3` becomes `['1', ':', '2', '.', '0', '-', '3']`.
 */
export function splitVersion(version: string): string[] {
  const tokens: string[] = [];
  let segment = '';

  for (const char of version) {
    if (isSeparator(char)) {
      if (segment) {
        tokens.push(segment);
        segment = '';
      }
      tokens.push(char);
    } else {
      segment += char;
    }
  }
  if (segment) {
    tokens.push(segment);
  }

  return tokens;
}

function countSegments(tokens: readonly string[], from: number): number {
  let count = 0;
  for (let i = from; i < tokens.length; i++) {
    if (!isSeparator(tokens[i])) {
      count++;
    }
  }
  return count;
}

/**
 * Longest shared prefix of two versions at segment granularity.
 *
 * `1.2.3` vs `1.2.4` share `1.2.`; `1.2.3` vs `1.3.0` share `1.`.
 * Equal versions weigh 0, even when both are empty. Otherwise, when either
 * side is empty nothing is shared and the weight is maximal.
 */
export function commonPrefix(a: string, b: string): VersionPrefix {
  if (a === b) {
    return { shared: a, weight: 0 };
  }
  if (!a || !b) {
    return { shared: '', weight: MAX_DIFF_WEIGHT };
  }

  const left = splitVersion(a);
  const right = splitVersion(b);

  let matched = 0;
  while (matched < left.length && matched < right.length && left[matched] === right[matched]) {
    matched++;
  }

  const shared = left.slice(0, matched).join('');
  const weight = Math.max(countSegments(left, matched), countSegments(right, matched));

  return { shared, weight: Math.min(weight, MAX_DIFF_WEIGHT) };
}

/**
 * Remainder of `full` after the shared prefix.
 */
export function suffix(full: string, shared: string): string {
  return full.startsWith(shared) ? full.slice(shared.length) : full;
}
