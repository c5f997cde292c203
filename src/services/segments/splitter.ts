/**
 * Character-precise overlapping splitter.
 * Pure functions, no I/O. Offsets always refer to the full input text.
 */

import type { Unit } from '../../types/learningPlan';
import { ConfigError } from '../../utils/errors';
import { DEFAULT_SEPARATOR } from '../../config/constants';
import type { Cut, SplitOptions } from './splitter.types';

const ABBREVIATIONS = new Set([
  'mr', 'mrs', 'ms', 'dr', 'prof', 'sr', 'jr', 'st', 'vs', 'etc',
  'i.e', 'e.g', 'cf', 'al', 'vol', 'no', 'pp', 'fig', 'approx',
]);

const SENTENCE_END = new Set(['.', '!', '?']);
const CLOSING_MARKS = new Set(['"', "'", ')', ']', '”', '’']);

function isWhitespace(char: string | undefined): boolean {
  return char !== undefined && /\s/.test(char);
}

export function validateSplitOptions(options: SplitOptions): void {
  const { unitSize, overlapSize, separator = DEFAULT_SEPARATOR } = options;

  if (!Number.isInteger(unitSize) || unitSize <= 0) {
    throw new ConfigError(`unitSize must be a positive integer, got ${unitSize}`);
  }
  if (!Number.isInteger(overlapSize) || overlapSize < 0) {
    throw new ConfigError(`overlapSize must be a non-negative integer, got ${overlapSize}`);
  }
  if (overlapSize >= unitSize) {
    throw new ConfigError(
      `overlapSize (${overlapSize}) must be smaller than unitSize (${unitSize})`,
    );
  }
  if (separator.length === 0) {
    throw new ConfigError('separator must not be empty');
  }
  if (options.tolerance !== undefined && options.tolerance < 0) {
    throw new ConfigError(`tolerance must be non-negative, got ${options.tolerance}`);
  }
}

/**
 * True when `i` falls between the two halves of a surrogate pair.
 */
function splitsSurrogatePair(text: string, i: number): boolean {
  const high = text.charCodeAt(i - 1);
  const low = text.charCodeAt(i);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}

/**
 * Move `i` off the middle of a surrogate pair, backwards unless that would
 * reach `floor`.
 */
function toCodePointBoundary(text: string, i: number, floor: number): number {
  if (!splitsSurrogatePair(text, i)) return i;
  return i - 1 > floor ? i - 1 : i + 1;
}

/**
 * True when position `i` directly follows the whitespace after a sentence terminator.
 */
function isSentenceBoundary(text: string, i: number): boolean {
  if (!isWhitespace(text[i - 1])) return false;

  let p = i - 2;
  if (CLOSING_MARKS.has(text[p])) p--;
  if (!SENTENCE_END.has(text[p])) return false;

  if (text[p] === '.') {
    let wordStart = p;
    while (wordStart > 0 && !isWhitespace(text[wordStart - 1])) wordStart--;
    const lastWord = text.slice(wordStart, p).toLowerCase();
    if (ABBREVIATIONS.has(lastWord)) return false;
    // Initials like "J."
    if (/^[a-z]$/.test(lastWord)) return false;
  }

  return true;
}

/**
 * Find where the unit starting at `start` should end.
 * Searches back from `limit` no further than `lower`.
 */
export function findCut(
  text: string,
  lower: number,
  limit: number,
  separator: string,
): Cut {
  let idx = text.lastIndexOf(separator, limit - separator.length);
  while (idx >= 0 && idx + separator.length >= lower) {
    const position = idx + separator.length;
    if (position <= limit) {
      return { position, kind: 'separator' };
    }
    if (idx === 0) break;
    idx = text.lastIndexOf(separator, idx - 1);
  }

  for (let i = limit; i >= lower; i--) {
    if (isSentenceBoundary(text, i)) {
      return { position: i, kind: 'sentence' };
    }
  }

  for (let i = limit; i >= lower; i--) {
    if (isWhitespace(text[i - 1])) {
      return { position: i, kind: 'word' };
    }
  }

  return { position: toCodePointBoundary(text, limit, lower - 1), kind: 'hard' };
}

/**
 * Step back from `raw` to the start of a token so overlap text doesn't begin
 * mid-word. Never moves to or before `floor`.
 */
function alignOverlapStart(
  text: string,
  raw: number,
  floor: number,
  overlapSize: number,
): number {
  const lowest = Math.max(floor + 1, raw - overlapSize);
  for (let i = raw; i >= lowest; i--) {
    if (isWhitespace(text[i - 1])) {
      return i;
    }
  }
  return toCodePointBoundary(text, raw, floor);
}

/**
 * Compute [start, end) spans covering text.slice(from, to).
 */
export function computeSpans(
  text: string,
  from: number,
  to: number,
  options: SplitOptions,
): Array<[number, number]> {
  validateSplitOptions(options);

  const { unitSize, overlapSize, separator = DEFAULT_SEPARATOR } = options;
  const tolerance = options.tolerance ?? Math.floor(unitSize * 0.5);
  const spans: Array<[number, number]> = [];

  if (to <= from) return spans;

  let start = from;
  while (to - start > unitSize) {
    const limit = start + unitSize;
    const lower = Math.max(limit - tolerance, start + overlapSize + 1);
    const { position: end } = findCut(text, lower, limit, separator);

    spans.push([start, end]);

    start =
      overlapSize === 0
        ? end
        : alignOverlapStart(text, end - overlapSize, start, overlapSize);
  }

  spans.push([start, to]);
  return spans;
}

/**
 * Split text into overlapping units.
 *
 * Units cover the whole text with no gaps, starts strictly increase and each
 * consecutive pair overlaps by roughly `overlapSize` characters.
 */
export function split(
  text: string,
  unitSize: number,
  overlapSize: number,
  separator: string = DEFAULT_SEPARATOR,
): Unit[] {
  const spans = computeSpans(text, 0, text.length, { unitSize, overlapSize, separator });

  return spans.map(([start, end], index) => ({
    index,
    text: text.slice(start, end),
    start,
    end,
  }));
}
