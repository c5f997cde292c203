/**
 * Title matching for topic deduplication.
 *
 * Two titles name the same topic when their normalized forms are equal, when
 * one contains the other and is not dwarfed by it, or when they are within a
 * small edit distance of each other.
 */

import { distance as levenshteinDistance } from 'fastest-levenshtein';

const LEADING_ARTICLE = /^(the|a|an)\s+/;

/** Shorter title must be at least this share of the longer one to count as contained */
export const CONTAINMENT_RATIO = 0.4;
export const MIN_CONTAINED_LENGTH = 3;
export const EDIT_SIMILARITY_THRESHOLD = 0.85;

export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(LEADING_ARTICLE, '');
}

/**
 * 1 - distance / longer length, in [0, 1].
 */
export function editSimilarity(a: string, b: string): number {
  const longer = Math.max(a.length, b.length);
  if (longer === 0) return 1;
  return 1 - levenshteinDistance(a, b) / longer;
}

export function isContained(a: string, b: string): boolean {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length < MIN_CONTAINED_LENGTH) return false;
  if (!longer.includes(shorter)) return false;
  return shorter.length / longer.length >= CONTAINMENT_RATIO;
}

export function titlesMatch(a: string, b: string): boolean {
  const left = normalizeTitle(a);
  const right = normalizeTitle(b);

  if (!left || !right) return left === right;
  if (left === right) return true;
  if (isContained(left, right)) return true;
  return editSimilarity(left, right) >= EDIT_SIMILARITY_THRESHOLD;
}
