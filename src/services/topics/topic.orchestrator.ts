/**
 * Drives one topic-extraction completion per unit through a bounded pool.
 * Per-unit failures never escape: they are retried, then recorded.
 */

import { DEFAULT_RETRY_POLICY, withRetry } from '../../lib/retry';
import type { RetryPolicy } from '../../lib/retry';
import { withTimeout } from '../../lib/timeout';
import { runPool } from '../../lib/worker-pool';
import { extractTopicsPrompt } from '../../prompts/learningPlan';
import type { TopicCandidate, Unit } from '../../types/learningPlan';
import { isRetryableError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { CompletionProvider } from '../completion/provider.interface';
import { parseTopicResponse } from './topic.parser';

export type UnitStatus = 'ok' | 'malformed' | 'failed';

export interface UnitProgress {
  unitIndex: number;
  status: UnitStatus;
  completed: number;
  total: number;
}

export interface ExtractionOptions {
  documentTitle: string;
  concurrency: number;
  timeoutMs: number;
  topicRange: { min: number; max: number };
  retry?: RetryPolicy;
  /** Stops dispatching further units; units already running finish */
  signal?: AbortSignal;
  onUnitComplete?: (progress: UnitProgress) => void;
}

export interface ExtractionResult {
  candidates: TopicCandidate[];
  failedUnits: number[];
  malformedUnits: number[];
  /** Units never dispatched because the run was cancelled */
  skippedUnits: number[];
  cancelled: boolean;
}

interface UnitOutcome {
  status: UnitStatus;
  candidates: TopicCandidate[];
}

/**
 * Temperature drops on each retry for more conservative output.
 */
export function temperatureForAttempt(attempt: number): number {
  const base = extractTopicsPrompt.temperature;
  return Math.max(0.1, Math.round((base - 0.1 * (attempt - 1)) * 10) / 10);
}

async function extractFromUnit(
  unit: Unit,
  totalUnits: number,
  completion: CompletionProvider,
  options: ExtractionOptions,
): Promise<UnitOutcome> {
  const prompt = extractTopicsPrompt.build({
    unitText: unit.text,
    unitIndex: unit.index,
    totalUnits,
    documentTitle: options.documentTitle,
    unitTitle: unit.title,
    topicRange: options.topicRange,
  });

  let raw: string;
  try {
    raw = await withRetry(
      (attempt) =>
        withTimeout(
          (signal) =>
            completion.complete(prompt, {
              maxTokens: extractTopicsPrompt.maxTokens,
              temperature: temperatureForAttempt(attempt),
              systemMessage: extractTopicsPrompt.systemMessage,
              signal,
            }),
          options.timeoutMs,
        ),
      {
        policy: options.retry ?? DEFAULT_RETRY_POLICY,
        isRetryable: isRetryableError,
        signal: options.signal,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            {
              unitIndex: unit.index,
              attempt,
              delayMs,
              error: error instanceof Error ? error.message : String(error),
            },
            'Topic extraction attempt failed, retrying',
          );
        },
      },
    );
  } catch (error) {
    const level = isRetryableError(error) ? 'warn' : 'error';
    logger[level](
      { unitIndex: unit.index, error: error instanceof Error ? error.message : String(error) },
      'Topic extraction failed for unit, skipping',
    );
    return { status: 'failed', candidates: [] };
  }

  const parsed = parseTopicResponse(raw, unit.index);
  if (parsed.kind === 'malformed') {
    logger.warn(
      { unitIndex: unit.index, reason: parsed.reason, preview: parsed.raw.slice(0, 200) },
      'Malformed topic response, unit contributes no candidates',
    );
    return { status: 'malformed', candidates: [] };
  }

  logger.debug(
    { unitIndex: unit.index, candidates: parsed.candidates.length },
    'Extracted topic candidates from unit',
  );
  return { status: 'ok', candidates: parsed.candidates };
}

/**
 * Extract topic candidates from every unit. Never throws for per-unit
 * failures; check `failedUnits` and `malformedUnits` for partial coverage.
 */
export async function extractTopics(
  units: Unit[],
  completion: CompletionProvider,
  options: ExtractionOptions,
): Promise<ExtractionResult> {
  let completed = 0;

  logger.info(
    { units: units.length, concurrency: options.concurrency, provider: completion.name },
    'Extracting topics',
  );

  const slots = await runPool(
    units,
    async (unit) => {
      const outcome = await extractFromUnit(unit, units.length, completion, options);
      completed++;
      options.onUnitComplete?.({
        unitIndex: unit.index,
        status: outcome.status,
        completed,
        total: units.length,
      });
      return outcome;
    },
    { concurrency: options.concurrency, signal: options.signal },
  );

  const result: ExtractionResult = {
    candidates: [],
    failedUnits: [],
    malformedUnits: [],
    skippedUnits: [],
    cancelled: Boolean(options.signal?.aborted),
  };

  slots.forEach((slot, i) => {
    const unitIndex = units[i].index;
    if (slot.status === 'skipped') {
      result.skippedUnits.push(unitIndex);
    } else if (slot.status === 'rejected') {
      logger.error({ unitIndex, error: slot.reason }, 'Unexpected failure in topic extraction worker');
      result.failedUnits.push(unitIndex);
    } else if (slot.value.status === 'failed') {
      result.failedUnits.push(unitIndex);
    } else {
      if (slot.value.status === 'malformed') result.malformedUnits.push(unitIndex);
      result.candidates.push(...slot.value.candidates);
    }
  });

  logger.info(
    {
      candidates: result.candidates.length,
      failedUnits: result.failedUnits.length,
      malformedUnits: result.malformedUnits.length,
      skippedUnits: result.skippedUnits.length,
      cancelled: result.cancelled,
    },
    'Topic extraction finished',
  );

  return result;
}

/**
 * List-only form of `extractTopics`.
 */
export async function extract(
  units: Unit[],
  completion: CompletionProvider,
  options: ExtractionOptions,
): Promise<TopicCandidate[]> {
  const { candidates } = await extractTopics(units, completion, options);
  return candidates;
}
