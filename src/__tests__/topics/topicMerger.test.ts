import { describe, expect, test } from 'vitest';
import {
  compareCandidates,
  mergeTopics,
  topicId,
} from '../../services/topics/topic.merger';
import type { Importance } from '../../types/learningPlan';
import { ConfigError } from '../../utils/errors';
import { makeCandidate } from '../helpers';

const SUBJECTS = [
  'Algebra',
  'Botany',
  'Calculus',
  'Dentistry',
  'Ethics',
  'Forestry',
  'Genetics',
  'Hydrology',
  'Immunology',
  'Journalism',
  'Kinematics',
  'Linguistics',
  'Metallurgy',
  'Neurology',
  'Optics',
  'Phonetics',
  'Quantum mechanics',
  'Rhetoric',
  'Statistics',
  'Topology',
];

function importanceFor(i: number): Importance {
  if (i % 4 === 0) return 'High';
  if (i % 4 === 1) return 'Medium';
  return 'Low';
}

const subjectCandidates = SUBJECTS.map((title, i) =>
  makeCandidate({ title, description: `${title} basics`, importance: importanceFor(i), sourceUnitIndex: i }),
);

describe('mergeTopics', () => {
  test('merges near-duplicate titles across units', () => {
    const candidates = [
      makeCandidate({ title: 'Intro', description: 'Short', sourceUnitIndex: 0, position: 0 }),
      makeCandidate({ title: 'Intro', description: 'A longer description', sourceUnitIndex: 0, position: 1 }),
      makeCandidate({ title: 'Intro', description: 'Mid one', sourceUnitIndex: 0, position: 2, importance: 'High' }),
      makeCandidate({ title: 'Introduction', description: 'Tiny', sourceUnitIndex: 1, position: 0 }),
      makeCandidate({ title: 'Introduction', description: 'Another long one!', sourceUnitIndex: 1, position: 1 }),
    ];

    const topics = mergeTopics(candidates, 1, 15);

    expect(topics).toEqual([
      {
        id: topicId('Introduction'),
        title: 'Introduction',
        description: 'A longer description',
        importance: 'High',
        ordinal: 1,
        keywords: [],
        sourceUnits: [0, 1],
      },
    ]);
  });

  test('orders topics by first appearance in the document', () => {
    const candidates = [
      makeCandidate({ title: 'Indexes', sourceUnitIndex: 1, position: 0 }),
      makeCandidate({ title: 'Transactions', sourceUnitIndex: 0, position: 1 }),
      makeCandidate({ title: 'Normalization', sourceUnitIndex: 0, position: 0 }),
    ];

    const topics = mergeTopics(candidates, 1, 15);

    expect(topics.map((t) => [t.ordinal, t.title])).toEqual([
      [1, 'Normalization'],
      [2, 'Transactions'],
      [3, 'Indexes'],
    ]);
  });

  test('keeps the most important topics when over the maximum', () => {
    expect(mergeTopics(subjectCandidates, 1, 5).map((t) => t.title)).toEqual([
      'Algebra',
      'Ethics',
      'Immunology',
      'Metallurgy',
      'Quantum mechanics',
    ]);
  });

  test('breaks importance ties by first appearance when trimming', () => {
    expect(mergeTopics(subjectCandidates, 1, 7).map((t) => t.title)).toEqual([
      'Algebra',
      'Botany',
      'Ethics',
      'Forestry',
      'Immunology',
      'Metallurgy',
      'Quantum mechanics',
    ]);
  });

  test('returns fewer topics than the minimum without inventing any', () => {
    const topics = mergeTopics(subjectCandidates.slice(0, 2), 8, 15);
    expect(topics.map((t) => t.title)).toEqual(['Algebra', 'Botany']);
  });

  test('unions keywords case-insensitively', () => {
    const topics = mergeTopics(
      [
        makeCandidate({ title: 'Joins', keywords: ['SQL', 'joins'] }),
        makeCandidate({ title: 'Join', sourceUnitIndex: 1, keywords: ['sql', 'Outer'] }),
      ],
      1,
      15,
    );
    expect(topics[0].keywords).toEqual(['SQL', 'joins', 'Outer']);
  });

  test('does not depend on input order', () => {
    const reversed = [...subjectCandidates].reverse();
    expect(mergeTopics(reversed, 3, 10)).toEqual(mergeTopics(subjectCandidates, 3, 10));
  });

  test('gives the same topics when the same candidates are merged again', () => {
    expect(mergeTopics(subjectCandidates, 3, 10)).toEqual(mergeTopics(subjectCandidates, 3, 10));
  });

  test('returns nothing for no candidates', () => {
    expect(mergeTopics([], 8, 15)).toEqual([]);
  });

  test('rejects invalid bounds', () => {
    expect(() => mergeTopics([], 0, 15)).toThrow(ConfigError);
    expect(() => mergeTopics([], 8, 5)).toThrow(ConfigError);
    expect(() => mergeTopics([], 2.5, 5)).toThrow(ConfigError);
  });
});

describe('topicId', () => {
  test('is stable across title spelling noise', () => {
    expect(topicId('Intro')).toBe(topicId('intro!'));
    expect(topicId('Intro')).toMatch(/^[0-9a-f]{12}$/);
    expect(topicId('Intro')).not.toBe(topicId('Joins'));
  });
});

describe('compareCandidates', () => {
  test('orders by unit, then position, then title', () => {
    const a = makeCandidate({ sourceUnitIndex: 0, position: 2 });
    const b = makeCandidate({ sourceUnitIndex: 1, position: 0 });
    const c = makeCandidate({ sourceUnitIndex: 0, position: 2, title: 'Aggregates' });
    expect([b, a, c].sort(compareCandidates)).toEqual([c, a, b]);
  });
});
