import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import {
  DEFAULT_PASSAGE_OVERLAP_RATIO,
  DEFAULT_PASSAGE_SIZE,
  DEFAULT_SEPARATOR,
  DEFAULT_TOP_K,
  DEFAULT_UNIT_OVERLAP,
  DEFAULT_UNIT_SIZE,
  MAX_JUDGED_PASSAGES,
  MAX_RETRIES,
  MIN_SECTION_WORDS,
  RETRY_DELAYS,
  SECTION_BAND_MAX,
  SECTION_BAND_MIN,
  TOPIC_TARGET_MAX,
  TOPIC_TARGET_MIN,
} from './constants';
import { env } from './env';

const rangeSchema = (min: number, max: number) =>
  z
    .object({
      min: z.number().int().positive().default(min),
      max: z.number().int().positive().default(max),
    })
    .default({})
    .refine((range) => range.min <= range.max, { message: 'min must not exceed max' });

export const pipelineConfigSchema = z
  .object({
    unitSize: z.number().int().positive().default(DEFAULT_UNIT_SIZE),
    overlapSize: z.number().int().nonnegative().default(DEFAULT_UNIT_OVERLAP),
    separator: z.string().min(1).default(DEFAULT_SEPARATOR),
    useSections: z.boolean().default(true),
    sectionBand: rangeSchema(SECTION_BAND_MIN, SECTION_BAND_MAX),
    minSectionWords: z.number().int().nonnegative().default(MIN_SECTION_WORDS),
    tocText: z.string().optional(),
    topicRange: rangeSchema(TOPIC_TARGET_MIN, TOPIC_TARGET_MAX),
    passageSize: z.number().int().positive().default(DEFAULT_PASSAGE_SIZE),
    passageOverlapRatio: z.number().min(0).lt(1).default(DEFAULT_PASSAGE_OVERLAP_RATIO),
    topK: z.number().int().nonnegative().default(DEFAULT_TOP_K),
    rankingStrategy: z.enum(['keyword', 'completion']).default('keyword'),
    maxJudgedPassages: z.number().int().positive().default(MAX_JUDGED_PASSAGES),
    /** Summarize the accepted sections into a document overview */
    overview: z.boolean().default(true),
    concurrency: z.number().int().positive().default(env.EXTRACTION_CONCURRENCY),
    timeoutMs: z.number().int().positive().default(env.COMPLETION_TIMEOUT_MS),
    retry: z
      .object({
        maxAttempts: z.number().int().positive().default(MAX_RETRIES),
        delays: z.array(z.number().nonnegative()).default(RETRY_DELAYS),
      })
      .default({}),
  })
  .refine((config) => config.overlapSize < config.unitSize, {
    message: 'overlapSize must be smaller than unitSize',
    path: ['overlapSize'],
  });

export type PipelineConfig = z.output<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export function resolvePipelineConfig(input: PipelineConfigInput = {}): PipelineConfig {
  const result = pipelineConfigSchema.safeParse(input);
  if (!result.success) {
    const errors = result.error.issues.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(`Pipeline configuration invalid:\n${errors.join('\n')}`);
  }
  return result.data;
}

/**
 * The settings that change what a run produces. Concurrency, timeouts and
 * retry policy are left out: they change how fast a plan is built, not which plan.
 */
export function planAffectingConfig(config: PipelineConfig) {
  return {
    unitSize: config.unitSize,
    overlapSize: config.overlapSize,
    separator: config.separator,
    useSections: config.useSections,
    sectionBand: config.sectionBand,
    minSectionWords: config.minSectionWords,
    tocText: config.tocText,
    topicRange: config.topicRange,
    passageSize: config.passageSize,
    passageOverlapRatio: config.passageOverlapRatio,
    topK: config.topK,
    rankingStrategy: config.rankingStrategy,
    maxJudgedPassages: config.maxJudgedPassages,
    overview: config.overview,
  };
}
