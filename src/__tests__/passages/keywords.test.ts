import { describe, expect, test } from 'vitest';
import {
  countOccurrences,
  extractKeywords,
  keywordScore,
  topicKeywords,
} from '../../services/passages/keywords';
import { parseRelevanceScore } from '../../services/passages/relevance';

describe('extractKeywords', () => {
  test('keeps distinct longer words that are not stop words', () => {
    expect(extractKeywords('The Art of SQL: Joins, Joins and more JOINS')).toEqual(['joins']);
    expect(extractKeywords('Query planning with statistics')).toEqual(['query', 'planning', 'statistics']);
  });

  test('keeps accented and non-Latin words whole', () => {
    expect(extractKeywords('Économie politique')).toEqual(['économie', 'politique']);
    expect(extractKeywords('Теория графов')).toEqual(['теория', 'графов']);
    expect(extractKeywords('Release 2024 notes')).toEqual(['release', '2024', 'notes']);
  });

  test('measures word length in code points', () => {
    expect(extractKeywords('𝑎𝑏𝑐 𝑎𝑏𝑐𝑑')).toEqual(['𝑎𝑏𝑐𝑑']);
  });
});

describe('topicKeywords', () => {
  test('puts the topic keywords before title and description words', () => {
    expect(
      topicKeywords({
        title: 'Window Functions',
        description: 'Ranking rows',
        keywords: ['OVER clause', 'sql'],
      }),
    ).toEqual(['over clause', 'window', 'functions', 'ranking', 'rows']);
  });
});

describe('countOccurrences', () => {
  test('counts non-overlapping matches', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2);
    expect(countOccurrences('abc', '')).toBe(0);
  });
});

describe('keywordScore', () => {
  test('sums occurrences case-insensitively', () => {
    expect(keywordScore('Joins join JOINS', ['joins'])).toBe(2);
    expect(keywordScore('Joins over rows', ['joins', 'rows'])).toBe(2);
  });
});

describe('parseRelevanceScore', () => {
  test.each([
    ['7', 7],
    ['Score: 8/10', 8],
    ['6.5', 6.5],
    ['15', 10],
    ['-3', 0],
    ['no idea', null],
  ])('%j -> %s', (raw, expected) => {
    expect(parseRelevanceScore(raw)).toBe(expected);
  });
});
