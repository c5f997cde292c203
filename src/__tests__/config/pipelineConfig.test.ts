import { describe, expect, test } from 'vitest';
import { DEFAULT_COMPLETION_TIMEOUT_MS } from '../../config/constants';
import { validateEnv } from '../../config/env';
import { planAffectingConfig, resolvePipelineConfig } from '../../config/pipeline';
import { ConfigError } from '../../utils/errors';

describe('resolvePipelineConfig', () => {
  test('fills in defaults', () => {
    const config = resolvePipelineConfig();

    expect(config).toMatchObject({
      unitSize: 14742,
      overlapSize: 1470,
      separator: '\n\n',
      useSections: true,
      sectionBand: { min: 3, max: 20 },
      minSectionWords: 100,
      topicRange: { min: 8, max: 15 },
      passageSize: 1000,
      passageOverlapRatio: 0.2,
      topK: 5,
      rankingStrategy: 'keyword',
      maxJudgedPassages: 50,
      overview: true,
      retry: { maxAttempts: 3, delays: [1000, 2000, 4000] },
    });
  });

  test('fills in the missing half of a range', () => {
    expect(resolvePipelineConfig({ sectionBand: { min: 2 } }).sectionBand).toEqual({ min: 2, max: 20 });
  });

  test.each([
    ['overlap as large as the unit', { unitSize: 100, overlapSize: 100 }],
    ['inverted band', { sectionBand: { min: 10, max: 5 } }],
    ['overlap ratio of one', { passageOverlapRatio: 1 }],
    ['negative topK', { topK: -1 }],
    ['zero concurrency', { concurrency: 0 }],
  ])('rejects %s', (_name, input) => {
    expect(() => resolvePipelineConfig(input)).toThrow(ConfigError);
  });

  test('names the offending setting', () => {
    expect(() => resolvePipelineConfig({ unitSize: 100, overlapSize: 100 })).toThrow(
      'Pipeline configuration invalid:\noverlapSize: overlapSize must be smaller than unitSize',
    );
  });
});

describe('planAffectingConfig', () => {
  test('leaves out settings that only change speed', () => {
    const affecting = planAffectingConfig(resolvePipelineConfig({ concurrency: 7, timeoutMs: 5 }));

    expect(affecting).not.toHaveProperty('concurrency');
    expect(affecting).not.toHaveProperty('timeoutMs');
    expect(affecting).not.toHaveProperty('retry');
    expect(affecting.topK).toBe(5);
    expect(affecting.overview).toBe(true);
  });
});

describe('validateEnv', () => {
  test('applies defaults', () => {
    const env = validateEnv({});

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      COMPLETION_PROVIDER: 'openai-compatible',
      COMPLETION_TIMEOUT_MS: 600000,
      EXTRACTION_CONCURRENCY: 2,
      OPENAI_BASE_URL: 'http://localhost:11434/v1',
      PLAN_CACHE_TTL: 604800,
    });
  });

  test('takes the completion timeout default from the shared constant', () => {
    expect(validateEnv({}).COMPLETION_TIMEOUT_MS).toBe(DEFAULT_COMPLETION_TIMEOUT_MS);
    expect(validateEnv({ COMPLETION_TIMEOUT_MS: '2500' }).COMPLETION_TIMEOUT_MS).toBe(2500);
  });

  test('rejects unknown values', () => {
    expect(() => validateEnv({ LOG_LEVEL: 'loud' })).toThrow(/Environment validation failed/);
  });
});
