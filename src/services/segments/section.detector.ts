/**
 * Pure functions for detecting chapter-like sections in text.
 * No side effects, no I/O - just text processing.
 */

import { MAX_HEADING_LENGTH, MIN_SECTION_WORDS } from '../../config/constants';
import type { Section } from './splitter.types';

const HEADING_PATTERNS = [
  /^Chapter\s+\d+/,
  /^CHAPTER\s+\d+/,
  /^\d+\.\s+[A-Z][a-z]+/,
  /^PART\s+[IVX\d]+/,
  /^[A-Z][A-Z\s]{15,60}$/,
  /^#{1,3}\s+\S/,
];

const TOC_SKIP = [
  'preface',
  'foreword',
  'acknowledgment',
  'about the author',
  'copyright',
  'index',
  'appendix',
  'glossary',
];

// Lines with this many words or more are body text, not headings
const HEADING_WORD_LIMIT = 20;

export interface Line {
  text: string;
  offset: number;
}

interface TocBlock {
  titles: string[];
  /** Offset of the first line after the block */
  end: number;
}

export interface DetectOptions {
  minSectionWords?: number;
}

export function toLines(text: string): Line[] {
  const lines: Line[] = [];
  let offset = 0;
  for (const line of text.split('\n')) {
    lines.push({ text: line, offset });
    offset += line.length + 1;
  }
  return lines;
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function isHeadingLine(line: string): boolean {
  const trimmed = line.trim();
  if (!trimmed || trimmed.length >= MAX_HEADING_LENGTH) return false;
  return HEADING_PATTERNS.some((pattern) => pattern.test(trimmed));
}

/**
 * Strip dot leaders and trailing page numbers from a TOC line.
 */
export function cleanTocLine(line: string): string {
  return line
    .replace(/\.{2,}\s*\d+\s*$/, '')
    .replace(/\s+\d+\s*$/, '')
    .trim();
}

function isTocStart(line: string): boolean {
  const lower = line.trim().toLowerCase();
  return lower.includes('table of contents') || lower === 'contents';
}

/**
 * Find an in-document table of contents and collect its entries.
 * The block ends at the first body-length line or at the first entry that
 * repeats, which is the body heading of the first listed chapter.
 */
export function extractTocBlock(text: string, lines: Line[] = toLines(text)): TocBlock | null {
  const startIdx = lines.findIndex((line) => isTocStart(line.text));
  if (startIdx === -1) return null;

  const titles: string[] = [];
  const seen = new Set<string>();
  let end = text.length;

  for (const line of lines.slice(startIdx + 1)) {
    if (!line.text.trim()) continue;

    if (countWords(line.text) >= HEADING_WORD_LIMIT) {
      end = line.offset;
      break;
    }

    const cleaned = cleanTocLine(line.text);
    const key = cleaned.toLowerCase();
    if (seen.has(key)) {
      end = line.offset;
      break;
    }

    if (cleaned.length > 3 && cleaned.length < MAX_HEADING_LENGTH) {
      if (!TOC_SKIP.some((skip) => key.includes(skip))) {
        titles.push(cleaned);
        seen.add(key);
      }
    }
  }

  return titles.length > 0 ? { titles, end } : null;
}

/**
 * Offset of the first short line at or after `from` that contains `title`.
 * `lines` comes from one `toLines` call shared by every lookup in a document.
 */
export function findHeadingLine(lines: Line[], title: string, from = 0): number {
  const needle = title.toLowerCase();
  for (const line of lines) {
    if (line.offset < from) continue;
    if (
      line.text.toLowerCase().includes(needle) &&
      countWords(line.text) < HEADING_WORD_LIMIT
    ) {
      return line.offset;
    }
  }
  return -1;
}

function headingTitle(line: string): string {
  return line.trim().replace(/^#{1,3}\s+/, '');
}

/**
 * Build contiguous sections from heading offsets. The preamble before the
 * first heading is folded into the first section.
 */
export function sectionsFromHeadings(
  text: string,
  headings: Array<{ offset: number; title: string }>,
): Section[] {
  const sorted = [...headings].sort((a, b) => a.offset - b.offset);
  const sections: Section[] = [];

  for (const heading of sorted) {
    const last = sections[sections.length - 1];
    if (last && heading.offset <= last.start) continue;
    if (last) last.end = heading.offset;
    sections.push({ title: heading.title, start: heading.offset, end: text.length });
  }

  if (sections.length > 0) sections[0].start = 0;
  return sections;
}

/**
 * Fold sections below the word minimum into their predecessor. A short first
 * section is folded into the one after it.
 */
export function mergeShortSections(
  text: string,
  sections: Section[],
  minWords: number,
): Section[] {
  const merged: Section[] = [];

  for (const section of sections) {
    const words = countWords(text.slice(section.start, section.end));
    const previous = merged[merged.length - 1];

    if (previous && words < minWords) {
      previous.end = section.end;
      continue;
    }
    if (
      previous &&
      merged.length === 1 &&
      countWords(text.slice(previous.start, previous.end)) < minWords
    ) {
      merged[0] = { title: section.title, start: previous.start, end: section.end };
      continue;
    }
    merged.push({ ...section });
  }

  return merged;
}

/**
 * Detect chapter-like sections. An in-document table of contents takes
 * precedence over heading patterns. Returns an empty list when nothing
 * heading-like is found.
 */
export function detect(text: string, options: DetectOptions = {}): Section[] {
  const minWords = options.minSectionWords ?? MIN_SECTION_WORDS;
  const headings: Array<{ offset: number; title: string }> = [];
  const lines = toLines(text);

  const toc = extractTocBlock(text, lines);
  if (toc) {
    let from = toc.end;
    for (const title of toc.titles) {
      const offset = findHeadingLine(lines, title, from);
      if (offset === -1) continue;
      headings.push({ offset, title });
      from = offset + 1;
    }
  }

  if (headings.length === 0) {
    for (const line of lines) {
      if (isHeadingLine(line.text)) {
        headings.push({ offset: line.offset, title: headingTitle(line.text) });
      }
    }
  }

  return mergeShortSections(text, sectionsFromHeadings(text, headings), minWords);
}
