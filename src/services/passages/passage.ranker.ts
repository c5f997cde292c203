/**
 * Passage retrieval without a vector index: the document is re-split into
 * small overlapping passages and each is scored against a topic.
 */

import { DEFAULT_COMPLETION_TIMEOUT_MS, DEFAULT_CONTEXT_WORDS } from '../../config/constants';
import { DEFAULT_RETRY_POLICY, withRetry } from '../../lib/retry';
import type { RetryPolicy } from '../../lib/retry';
import { withTimeout } from '../../lib/timeout';
import { runPool } from '../../lib/worker-pool';
import { judgeRelevancePrompt } from '../../prompts/learningPlan';
import type { Document, Passage, RankingStrategy, Topic, Unit } from '../../types/learningPlan';
import { ConfigError, ParseError, isRetryableError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { CompletionProvider } from '../completion/provider.interface';
import { countWords } from '../segments/section.detector';
import { split } from '../segments/splitter';
import { keywordScore, topicKeywords } from './keywords';
import { parseRelevanceScore } from './relevance';

export interface PassageSplitOptions {
  passageSize: number;
  overlapRatio: number;
  separator?: string;
}

export interface RankOptions extends PassageSplitOptions {
  /** Pre-split passages; reused across topics of one run */
  passages?: Unit[];
  completion?: CompletionProvider;
  concurrency?: number;
  timeoutMs?: number;
  retry?: RetryPolicy;
  /** Completion ranking only judges this many keyword-prefiltered passages */
  maxJudgedPassages?: number;
  signal?: AbortSignal;
}

type RankableTopic = Pick<Topic, 'title' | 'description' | 'keywords'>;

interface ScoredPassage {
  unit: Unit;
  score: number;
}

export function splitPassages(document: Document, options: PassageSplitOptions): Unit[] {
  if (!(options.overlapRatio >= 0 && options.overlapRatio < 1)) {
    throw new ConfigError(`overlapRatio must be in [0, 1), got ${options.overlapRatio}`);
  }
  const overlap = Math.floor(options.passageSize * options.overlapRatio);
  return split(document.text, options.passageSize, overlap, options.separator);
}

/**
 * Highest score first, earlier passage on ties.
 */
function byScoreThenOffset(a: ScoredPassage, b: ScoredPassage): number {
  return b.score - a.score || a.unit.start - b.unit.start;
}

function toPassages(scored: ScoredPassage[], topK: number): Passage[] {
  return [...scored]
    .sort(byScoreThenOffset)
    .slice(0, topK)
    .map(({ unit, score }, i) => ({
      text: unit.text,
      start: unit.start,
      end: unit.end,
      score,
      rank: i + 1,
    }));
}

function scoreByKeywords(topic: RankableTopic, passages: Unit[]): ScoredPassage[] {
  const keywords = topicKeywords(topic);
  return passages.map((unit) => ({ unit, score: keywordScore(unit.text, keywords) }));
}

/**
 * Deterministic keyword ranking. Passages with no matches still fill the
 * result after every passage that matched.
 */
export function rankByKeywords(topic: RankableTopic, passages: Unit[], topK: number): Passage[] {
  return toPassages(scoreByKeywords(topic, passages), topK);
}

async function judgePassage(
  topic: RankableTopic,
  unit: Unit,
  completion: CompletionProvider,
  options: RankOptions,
): Promise<number> {
  const prompt = judgeRelevancePrompt.build({
    topicTitle: topic.title,
    topicDescription: topic.description,
    passageText: unit.text,
  });

  try {
    return await withRetry(
      async () => {
        const raw = await withTimeout(
          (signal) =>
            completion.complete(prompt, {
              maxTokens: judgeRelevancePrompt.maxTokens,
              temperature: judgeRelevancePrompt.temperature,
              signal,
            }),
          options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS,
        );
        const score = parseRelevanceScore(raw);
        if (score === null) {
          throw new ParseError('Unreadable relevance score', raw);
        }
        return score;
      },
      {
        policy: options.retry ?? DEFAULT_RETRY_POLICY,
        isRetryable: isRetryableError,
        signal: options.signal,
      },
    );
  } catch (error) {
    logger.warn(
      {
        start: unit.start,
        error: error instanceof Error ? error.message : String(error),
        ...(error instanceof ParseError ? { preview: error.raw.slice(0, 80) } : {}),
      },
      'Relevance judgment failed, scoring passage as zero',
    );
    return 0;
  }
}

async function scoreByCompletion(
  topic: RankableTopic,
  passages: Unit[],
  completion: CompletionProvider,
  options: RankOptions,
): Promise<ScoredPassage[]> {
  const limit = options.maxJudgedPassages ?? passages.length;
  const candidates =
    passages.length > limit
      ? scoreByKeywords(topic, passages)
          .sort(byScoreThenOffset)
          .slice(0, limit)
          .map(({ unit }) => unit)
      : passages;

  const slots = await runPool(
    candidates,
    (unit) => judgePassage(topic, unit, completion, options),
    { concurrency: options.concurrency ?? 1, signal: options.signal },
  );

  return candidates.map((unit, i) => {
    const slot = slots[i];
    return { unit, score: slot.status === 'fulfilled' ? slot.value : 0 };
  });
}

/**
 * Rank passages of `document` for `topic`. Returns exactly
 * min(topK, candidate passages), highest score first, earlier offset on ties.
 */
export async function rankPassages(
  topic: RankableTopic,
  document: Document,
  strategy: RankingStrategy,
  topK: number,
  options: RankOptions,
): Promise<Passage[]> {
  if (!Number.isInteger(topK) || topK < 0) {
    throw new ConfigError(`topK must be a non-negative integer, got ${topK}`);
  }

  const passages = options.passages ?? splitPassages(document, options);

  if (strategy === 'keyword') {
    return rankByKeywords(topic, passages, topK);
  }

  if (!options.completion) {
    throw new ConfigError('Completion ranking requires a completion provider');
  }

  const scored = await scoreByCompletion(topic, passages, options.completion, options);
  return toPassages(scored, topK);
}

/**
 * Join ranked passages into one context block within a word budget, for
 * prompts that teach the topic.
 */
export function buildTopicContext(
  passages: Passage[],
  maxWords: number = DEFAULT_CONTEXT_WORDS,
): { context: string; wordCount: number; passages: number } {
  const selected: string[] = [];
  let total = 0;

  for (const passage of passages) {
    const words = countWords(passage.text);
    if (total + words <= maxWords) {
      selected.push(passage.text);
      total += words;
    }
    if (total >= maxWords * 0.9) break;
  }

  return { context: selected.join('\n\n---\n\n'), wordCount: total, passages: selected.length };
}
