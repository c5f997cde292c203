/**
 * Reconcile topic candidates extracted independently from each unit into one
 * deduplicated, bounded, document-ordered topic list.
 */

import { createHash } from 'node:crypto';
import { IMPORTANCE_RANK } from '../../types/learningPlan';
import type { Importance, Topic, TopicCandidate } from '../../types/learningPlan';
import { ConfigError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { normalizeTitle, titlesMatch } from './titleSimilarity';

interface TopicGroup {
  members: TopicCandidate[];
  /** Order of the group's earliest member */
  firstAppearance: number;
}

export function compareCandidates(a: TopicCandidate, b: TopicCandidate): number {
  return (
    a.sourceUnitIndex - b.sourceUnitIndex ||
    a.position - b.position ||
    a.title.localeCompare(b.title) ||
    a.description.localeCompare(b.description) ||
    IMPORTANCE_RANK[b.importance] - IMPORTANCE_RANK[a.importance]
  );
}

export function topicId(title: string): string {
  return createHash('sha256').update(normalizeTitle(title)).digest('hex').slice(0, 12);
}

/**
 * Longest value wins; ties go to the earliest member.
 */
function longest(values: string[]): string {
  return values.reduce((best, value) => (value.length > best.length ? value : best), '');
}

function highestImportance(members: TopicCandidate[]): Importance {
  return members.reduce<Importance>(
    (best, member) =>
      IMPORTANCE_RANK[member.importance] > IMPORTANCE_RANK[best] ? member.importance : best,
    'Low',
  );
}

function unionKeywords(members: TopicCandidate[]): string[] {
  const seen = new Set<string>();
  const keywords: string[] = [];
  for (const member of members) {
    for (const keyword of member.keywords ?? []) {
      const key = keyword.toLowerCase();
      if (!seen.has(key)) {
        seen.add(key);
        keywords.push(keyword);
      }
    }
  }
  return keywords;
}

/**
 * Single pass in first-appearance order: each candidate joins the first group
 * holding a matching title, or opens a new one.
 */
export function groupCandidates(candidates: TopicCandidate[]): TopicGroup[] {
  const ordered = [...candidates].sort(compareCandidates);
  const groups: TopicGroup[] = [];

  ordered.forEach((candidate, order) => {
    const group = groups.find((g) =>
      g.members.some((member) => titlesMatch(member.title, candidate.title)),
    );
    if (group) {
      group.members.push(candidate);
    } else {
      groups.push({ members: [candidate], firstAppearance: order });
    }
  });

  return groups;
}

function groupToTopic(group: TopicGroup, ordinal: number): Topic {
  const title = longest(group.members.map((m) => m.title.trim()));
  return {
    id: topicId(title),
    title,
    description: longest(group.members.map((m) => m.description.trim())),
    importance: highestImportance(group.members),
    ordinal,
    keywords: unionKeywords(group.members),
    sourceUnits: [...new Set(group.members.map((m) => m.sourceUnitIndex))].sort((a, b) => a - b),
  };
}

/**
 * Merge candidates into at most `targetMax` topics. Fewer than `targetMin`
 * groups are returned as they are.
 */
export function mergeTopics(
  candidates: TopicCandidate[],
  targetMin: number,
  targetMax: number,
): Topic[] {
  if (!Number.isInteger(targetMin) || targetMin < 1) {
    throw new ConfigError(`targetMin must be a positive integer, got ${targetMin}`);
  }
  if (!Number.isInteger(targetMax) || targetMax < targetMin) {
    throw new ConfigError(`targetMax (${targetMax}) must be an integer >= targetMin (${targetMin})`);
  }

  let groups = groupCandidates(candidates);

  if (groups.length > targetMax) {
    const importanceOf = (group: TopicGroup) =>
      IMPORTANCE_RANK[highestImportance(group.members)];

    groups = [...groups]
      .sort(
        (a, b) => importanceOf(b) - importanceOf(a) || a.firstAppearance - b.firstAppearance,
      )
      .slice(0, targetMax)
      .sort((a, b) => a.firstAppearance - b.firstAppearance);
  }

  if (groups.length < targetMin) {
    logger.warn(
      { topics: groups.length, targetMin, candidates: candidates.length },
      'Fewer topics than target minimum',
    );
  }

  const topics = groups.map((group, i) => groupToTopic(group, i + 1));
  logger.info({ candidates: candidates.length, topics: topics.length }, 'Merged topic candidates');
  return topics;
}
