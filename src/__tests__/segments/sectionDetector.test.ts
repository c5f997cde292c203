import { describe, expect, test } from 'vitest';
import {
  cleanTocLine,
  detect,
  extractTocBlock,
  findHeadingLine,
  isHeadingLine,
  mergeShortSections,
  toLines,
} from '../../services/segments/section.detector';
import { words } from '../helpers';

function chapter(n: number, bodyWords: number): string {
  return `Chapter ${n}: Part ${n} Title\n${words(bodyWords)}`;
}

describe('isHeadingLine', () => {
  test.each([
    ['Chapter 3: Joins', true],
    ['CHAPTER 12', true],
    ['1. Introduction', true],
    ['PART IV', true],
    ['## Setup', true],
    ['INTRODUCTION TO DATABASES', true],
    ['NOTES', false],
    ['1. the end', false],
    ['Chapter one', false],
    ['', false],
  ])('%j -> %s', (line, expected) => {
    expect(isHeadingLine(line)).toBe(expected);
  });

  test('rejects heading-like lines that are too long', () => {
    expect(isHeadingLine(`Chapter 1 ${'x'.repeat(100)}`)).toBe(false);
  });
});

describe('cleanTocLine', () => {
  test('strips dot leaders and page numbers', () => {
    expect(cleanTocLine('Chapter 1: Alpha Topics ....... 3')).toBe('Chapter 1: Alpha Topics');
    expect(cleanTocLine('Views   88')).toBe('Views');
  });
});

describe('detect', () => {
  test('finds one section per chapter heading', () => {
    const text = [1, 2, 3, 4].map((n) => chapter(n, 120)).join('\n\n');
    const sections = detect(text);

    expect(sections.map((s) => s.title)).toEqual([
      'Chapter 1: Part 1 Title',
      'Chapter 2: Part 2 Title',
      'Chapter 3: Part 3 Title',
      'Chapter 4: Part 4 Title',
    ]);
    expect(sections[0].start).toBe(0);
    expect(sections[3].end).toBe(text.length);
    for (let i = 1; i < sections.length; i++) {
      expect(sections[i].start).toBe(sections[i - 1].end);
      expect(sections[i].start).toBe(text.indexOf(`Chapter ${i + 1}:`));
    }
  });

  test('folds the preamble into the first section', () => {
    const text = `Some opening remarks\n\n${[1, 2, 3].map((n) => chapter(n, 120)).join('\n\n')}`;
    const sections = detect(text);

    expect(sections).toHaveLength(3);
    expect(sections[0]).toMatchObject({ title: 'Chapter 1: Part 1 Title', start: 0 });
  });

  test('strips Markdown heading markers from titles', () => {
    const text = `# Setup\n${words(120)}\n## Usage\n${words(120)}`;
    expect(detect(text).map((s) => s.title)).toEqual(['Setup', 'Usage']);
  });

  test('returns nothing for text without headings', () => {
    expect(detect(words(500))).toEqual([]);
  });

  test('prefers an in-document table of contents', () => {
    const text = [
      'Contents',
      'Chapter 1: Alpha Topics ....... 3',
      'Chapter 2: Beta Topics ....... 9',
      'Chapter 3: Gamma Topics ....... 15',
      '',
      'Chapter 1: Alpha Topics',
      words(120),
      '',
      'Chapter 2: Beta Topics',
      words(120),
      '',
      'Chapter 3: Gamma Topics',
      words(120),
    ].join('\n');

    const sections = detect(text);

    expect(sections.map((s) => s.title)).toEqual([
      'Chapter 1: Alpha Topics',
      'Chapter 2: Beta Topics',
      'Chapter 3: Gamma Topics',
    ]);
    expect(sections[0].start).toBe(0);
    expect(sections[1].start).toBe(text.lastIndexOf('Chapter 2: Beta Topics'));
    expect(sections[2].start).toBe(text.lastIndexOf('Chapter 3: Gamma Topics'));
  });
});

describe('extractTocBlock', () => {
  test('ends the block at the first repeated entry', () => {
    const text = 'Table of Contents\nIntro Part\nMain Part\n\nIntro Part\nbody';
    expect(extractTocBlock(text)).toEqual({
      titles: ['Intro Part', 'Main Part'],
      end: text.lastIndexOf('Intro Part'),
    });
  });

  test('skips front matter entries', () => {
    const text = 'Contents\nPreface\nFirst Steps\nIndex';
    expect(extractTocBlock(text)?.titles).toEqual(['First Steps']);
  });

  test('returns null without a contents heading', () => {
    expect(extractTocBlock('Just prose here.')).toBeNull();
  });
});

describe('findHeadingLine', () => {
  const text = `Contents\nJoins\n${words(25)} joins\nChapter 2: Joins\nbody`;
  const lines = toLines(text);

  test('finds heading-length lines at or after an offset', () => {
    expect(findHeadingLine(lines, 'JOINS')).toBe(9);
    expect(findHeadingLine(lines, 'joins', 10)).toBe(text.indexOf('Chapter 2: Joins'));
    expect(findHeadingLine(lines, 'indexes')).toBe(-1);
  });

  test('shares one line index with the contents reader', () => {
    expect(extractTocBlock(text, lines)).toEqual(extractTocBlock(text));
  });
});

describe('mergeShortSections', () => {
  test('folds a short section into its predecessor', () => {
    const text = [chapter(1, 120), chapter(2, 10), chapter(3, 120), chapter(4, 120)].join('\n\n');
    const sections = detect(text, { minSectionWords: 100 });

    expect(sections.map((s) => s.title)).toEqual([
      'Chapter 1: Part 1 Title',
      'Chapter 3: Part 3 Title',
      'Chapter 4: Part 4 Title',
    ]);
    expect(sections[0].end).toBe(text.indexOf('Chapter 3:'));
  });

  test('folds a short first section into the next one', () => {
    const text = [chapter(1, 10), chapter(2, 120), chapter(3, 120)].join('\n\n');
    const sections = detect(text, { minSectionWords: 100 });

    expect(sections).toHaveLength(2);
    expect(sections[0]).toEqual({
      title: 'Chapter 2: Part 2 Title',
      start: 0,
      end: text.indexOf('Chapter 3:'),
    });
  });

  test('does not modify its input', () => {
    const text = [chapter(1, 120), chapter(2, 10)].join('\n\n');
    const input = [
      { title: 'a', start: 0, end: text.indexOf('Chapter 2:') },
      { title: 'b', start: text.indexOf('Chapter 2:'), end: text.length },
    ];
    const merged = mergeShortSections(text, input, 100);

    expect(merged).toEqual([{ title: 'a', start: 0, end: text.length }]);
    expect(input[0].end).toBe(text.indexOf('Chapter 2:'));
  });
});
