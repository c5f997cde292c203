import type { Topic } from '../../types/learningPlan';
import stopWordList from './stopWords.json';

const STOP_WORDS = new Set<string>(stopWordList);
const MIN_KEYWORD_LENGTH = 4;

function isKeyword(term: string): boolean {
  return [...term].length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(term);
}

/**
 * Lower-case words of at least four letters or digits in any script, stop
 * words removed, in order of first occurrence.
 */
export function extractKeywords(text: string): string[] {
  const words = text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
  return [...new Set(words.filter(isKeyword))];
}

/**
 * The topic's own keywords first, then words from its title and description.
 */
export function topicKeywords(topic: Pick<Topic, 'title' | 'description' | 'keywords'>): string[] {
  const own = topic.keywords.map((k) => k.trim().toLowerCase()).filter(isKeyword);
  return [...new Set([...own, ...extractKeywords(`${topic.title} ${topic.description}`)])];
}

/**
 * Non-overlapping occurrences of `needle` in `haystack`. Both lower-case.
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count++;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

export function keywordScore(text: string, keywords: string[]): number {
  const lower = text.toLowerCase();
  return keywords.reduce((score, keyword) => score + countOccurrences(lower, keyword), 0);
}
