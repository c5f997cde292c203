/**
 * Parser for a user-supplied table of contents.
 * Turns pasted TOC text into entries and locates them in the document body.
 */

import type { Section } from './splitter.types';
import {
  type Line,
  extractTocBlock,
  findHeadingLine,
  sectionsFromHeadings,
  toLines,
} from './section.detector';

export interface TocEntry {
  title: string;
  page?: number;
  number?: string;
}

const SKIP_PATTERNS = [
  /^(preface|foreword|acknowledgments?|about|copyright|index|appendix|glossary|bibliography|references)$/,
  /^table of contents$/,
  /^contents$/,
  /^part\s+[ivxlc]+$/,
];

const TITLE_HINTS = [
  'introduction',
  'chapter',
  'getting started',
  'basic',
  'advanced',
  'conclusion',
  'summary',
];

function stripLeaders(title: string): string {
  return title.replace(/\.{2,}\s*\d*\s*$/, '').trim();
}

export function parseTocLine(raw: string): TocEntry | null {
  const line = raw.trim();
  if (!line) return null;

  const lower = line.toLowerCase();
  if (SKIP_PATTERNS.some((pattern) => pattern.test(lower))) return null;

  // "Chapter 3: Joins ........ 41" or "iv - Views   88"
  let match = line.match(
    /^(?:chapter\s+)?(\d+|[ivxlc]+)[:.\-\s]+(.+?)(?:\s*\.{2,}\s*|\s{2,})(\d+)\s*$/i,
  );
  if (match) {
    return { title: match[2].trim(), page: Number(match[3]), number: match[1] };
  }

  // "Chapter 3: Joins"
  match = line.match(/^chapter\s+(\d+|[ivxlc]+)[:.\-\s]+(.+)$/i);
  if (match) {
    return { title: stripLeaders(match[2]), number: match[1] };
  }

  // "3. Joins .... 41", "3) Joins"
  match = line.match(/^(\d+)[.)\s]+(.+?)(?:\s*\.{2,}\s*|\s{2,})(\d+)?\s*$/);
  if (match) {
    return {
      title: match[2].trim(),
      page: match[3] ? Number(match[3]) : undefined,
      number: match[1],
    };
  }

  match = line.match(/^(\d+)[.)\s]+(.+)$/);
  if (match) {
    return { title: stripLeaders(match[2]), number: match[1] };
  }

  // "Part II: Administration"
  match = line.match(/^part\s+(\d+|[ivxlc]+)[:.\-\s]+(.+?)(?:(?:\s*\.{2,}\s*|\s{2,})(\d+))?\s*$/i);
  if (match) {
    return {
      title: `Part ${match[1]}: ${match[2].trim()}`,
      page: match[3] ? Number(match[3]) : undefined,
      number: match[1],
    };
  }

  // "Indexes and Performance ....... 120"
  match = line.match(/^(.+?)(?:\s*\.{2,}\s*|\s{3,})(\d+)\s*$/);
  if (match && match[1].trim().length > 3) {
    return { title: match[1].trim(), page: Number(match[2]) };
  }

  if (line.length > 5 && !/^\d+$/.test(line)) {
    if (TITLE_HINTS.some((hint) => lower.includes(hint)) || /^[A-Z]/.test(line)) {
      return { title: line };
    }
  }

  return null;
}

/**
 * Parse TOC text into entries. When at least three numbered entries exist,
 * unnumbered ones are dropped as front/back matter.
 */
export function parseToc(tocText: string): TocEntry[] {
  if (!tocText.trim()) return [];

  const entries = tocText
    .trim()
    .split('\n')
    .map(parseTocLine)
    .filter((entry): entry is TocEntry => entry !== null);

  if (entries.length <= 3) return entries;

  const filtered = entries.filter((entry) => entry.title.length > 3);
  const numbered = filtered.filter((entry) => entry.number !== undefined);
  return numbered.length >= 3 ? numbered : filtered;
}

/**
 * Locate a title in the body: the whole title on a heading-length line, else
 * its first three words.
 */
function locateTitle(lines: Line[], title: string, from: number): number {
  const exact = findHeadingLine(lines, title, from);
  if (exact !== -1) return exact;

  const words = title.split(/\s+/);
  if (words.length >= 2) {
    return findHeadingLine(lines, words.slice(0, 3).join(' '), from);
  }
  return -1;
}

/**
 * Match TOC entries to the document, in order. Entries not found after the
 * previous match are skipped. Sections are contiguous and cover the document.
 */
export function sectionsFromToc(text: string, entries: TocEntry[]): Section[] {
  const headings: Array<{ offset: number; title: string }> = [];
  const lines = toLines(text);
  let from = extractTocBlock(text, lines)?.end ?? 0;

  for (const entry of entries) {
    const offset = locateTitle(lines, entry.title, from);
    if (offset === -1) continue;
    headings.push({ offset, title: entry.title });
    from = offset + 1;
  }

  return sectionsFromHeadings(text, headings);
}
