/**
 * Learning-plan pipeline.
 *
 * Stage 1: Segmentation (sections within the accepted band, else overlapping split)
 * Stage 2: Topic Extraction (completion, parallel per unit)
 * Stage 3: Topic Merge (title similarity grouping, bounded)
 * Stage 4: Passage Ranking (keyword or completion, per topic)
 * Stage 5: Plan Assembly (with a section overview when sections were accepted)
 *
 * Finished plans are cached under a hash of the document text and the
 * plan-affecting configuration.
 */

import {
  type PipelineConfig,
  type PipelineConfigInput,
  planAffectingConfig,
  resolvePipelineConfig,
} from '../../config/pipeline';
import type {
  Document,
  LearningPlan,
  Passage,
  PlanProvenance,
  RankingStrategy,
} from '../../types/learningPlan';
import { ExtractionFailedError, SegmentationError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { CompletionProvider } from '../completion/provider.interface';
import { rankPassages, splitPassages } from '../passages/passage.ranker';
import { assemblePlan } from '../plans/plan.assembler';
import { generateOverview } from '../overview/overview.generator';
import { type PlanCache, computePlanCacheKey } from '../plans/plan.cache';
import { segmentDocument } from '../segments/segmentation';
import { mergeTopics } from '../topics/topic.merger';
import { extractTopics } from '../topics/topic.orchestrator';
import { type PipelineProgress, PipelineSession, type SessionStats } from './session';

export interface RunOptions {
  completion: CompletionProvider;
  config?: PipelineConfigInput;
  cache?: PlanCache;
  /** Cooperative cancellation: stops dispatching units and returns a partial plan */
  signal?: AbortSignal;
  onProgress?: (progress: PipelineProgress) => void;
}

export interface PipelineResult {
  plan: LearningPlan;
  cacheKey: string;
  cacheHit: boolean;
  /** Cancelled, or some units failed; partial plans are not cached */
  partial: boolean;
  sessionId?: string;
  stats?: SessionStats;
}

export function planCacheKey(
  document: Document,
  config: PipelineConfig,
  completion: CompletionProvider,
): string {
  return computePlanCacheKey(document.text, {
    ...planAffectingConfig(config),
    provider: completion.name,
    model: completion.model,
  });
}

export const learningPlanPipeline = {
  /**
   * Run every stage for one document.
   */
  async run(document: Document, options: RunOptions): Promise<PipelineResult> {
    const { completion, cache } = options;
    const config = resolvePipelineConfig(options.config);
    const cacheKey = planCacheKey(document, config, completion);

    if (cache) {
      const cached = await cache.get(cacheKey);
      if (cached) {
        logger.info(
          { cacheKey, title: document.metadata.title, topics: cached.topics.length },
          'Reusing cached learning plan',
        );
        return { plan: cached, cacheKey, cacheHit: true, partial: false };
      }
    }

    const session = new PipelineSession(document, config, {
      signal: options.signal,
      onProgress: options.onProgress,
    });

    // Stage 1: Segmentation
    session.enterStage(1);
    const segmentation = segmentDocument(document.text, {
      unitSize: config.unitSize,
      overlapSize: config.overlapSize,
      separator: config.separator,
      sectionBand: config.sectionBand,
      minSectionWords: config.minSectionWords,
      useSections: config.useSections,
      tocText: config.tocText,
    });
    const { units } = segmentation;
    if (units.length === 0) {
      throw new SegmentationError();
    }
    session.stats.units = units.length;

    // Stage 2: Topic Extraction
    session.enterStage(2);
    const extraction = await extractTopics(units, completion, {
      documentTitle: document.metadata.title,
      concurrency: config.concurrency,
      timeoutMs: config.timeoutMs,
      topicRange: config.topicRange,
      retry: config.retry,
      signal: session.signal,
      onUnitComplete: (progress) => session.reportUnit(progress),
    });

    session.stats.candidates = extraction.candidates.length;
    session.stats.failedUnits = extraction.failedUnits;
    session.stats.malformedUnits = extraction.malformedUnits;
    session.stats.skippedUnits = extraction.skippedUnits;

    if (!extraction.cancelled && extraction.failedUnits.length === units.length) {
      throw new ExtractionFailedError(
        extraction.failedUnits,
        `Failed to extract topics from any unit. All ${units.length} units failed.`,
      );
    }

    // Stage 3: Topic Merge
    session.enterStage(3);
    const topics = mergeTopics(
      extraction.candidates,
      config.topicRange.min,
      config.topicRange.max,
    );
    session.stats.topics = topics.length;

    // Stage 4: Passage Ranking. A cancelled run finishes with keyword ranking.
    session.enterStage(4);
    const passages = splitPassages(document, {
      passageSize: config.passageSize,
      overlapRatio: config.passageOverlapRatio,
      separator: config.separator,
    });

    const rankAll = async (strategy: RankingStrategy): Promise<Map<string, Passage[]>> => {
      const ranked = new Map<string, Passage[]>();
      for (const topic of topics) {
        ranked.set(
          topic.id,
          await rankPassages(topic, document, strategy, config.topK, {
            passageSize: config.passageSize,
            overlapRatio: config.passageOverlapRatio,
            passages,
            completion,
            concurrency: config.concurrency,
            timeoutMs: config.timeoutMs,
            retry: config.retry,
            maxJudgedPassages: config.maxJudgedPassages,
            signal: session.signal,
          }),
        );
      }
      return ranked;
    };

    let rankingStrategy: RankingStrategy = extraction.cancelled
      ? 'keyword'
      : config.rankingStrategy;
    let passagesByTopic = await rankAll(rankingStrategy);

    // Judgments skipped after a mid-ranking abort score zero
    if (session.cancelled && rankingStrategy !== 'keyword') {
      logger.warn({ sessionId: session.id }, 'Cancelled during passage ranking, ranking by keywords');
      rankingStrategy = 'keyword';
      passagesByTopic = await rankAll(rankingStrategy);
    }

    // Stage 5: Plan Assembly
    session.enterStage(5);
    const { sections } = segmentation;
    const overview =
      config.overview && sections && !session.cancelled
        ? await generateOverview(
            sections.map((section) => ({
              title: section.title,
              text: document.text.slice(section.start, section.end),
            })),
            completion,
            {
              documentTitle: document.metadata.title,
              timeoutMs: config.timeoutMs,
              retry: config.retry,
              signal: session.signal,
            },
          )
        : undefined;

    const cancelled = extraction.cancelled || session.cancelled;
    const provenance: PlanProvenance = {
      cacheKey,
      segmentation: segmentation.mode,
      unitCount: units.length,
      failedUnits: extraction.failedUnits,
      malformedUnits: extraction.malformedUnits,
      cancelled,
      rankingStrategy,
      createdAt: new Date().toISOString(),
    };
    const plan = assemblePlan(document.metadata, topics, passagesByTopic, provenance, overview);

    const partial = cancelled || extraction.failedUnits.length > 0;
    if (cache && !partial) {
      await cache.set(cacheKey, plan);
    }

    logger.info(
      {
        sessionId: session.id,
        topics: topics.length,
        units: units.length,
        partial,
        elapsedMs: session.elapsedMs,
      },
      'Learning plan complete',
    );

    return {
      plan,
      cacheKey,
      cacheHit: false,
      partial,
      sessionId: session.id,
      stats: session.stats,
    };
  },
};
