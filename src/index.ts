export { env } from './config/env';
export {
  pipelineConfigSchema,
  resolvePipelineConfig,
  planAffectingConfig,
  type PipelineConfig,
  type PipelineConfigInput,
} from './config/pipeline';
export * from './types/learningPlan';
export * from './utils/errors';
export { logger } from './utils/logger';
export { runPool, type PoolOptions, type PoolSlot } from './lib/worker-pool';
export { withRetry, DEFAULT_RETRY_POLICY, type RetryPolicy } from './lib/retry';
export { withTimeout } from './lib/timeout';
export * from './services/completion';
export * from './services/documents';
export * from './services/segments';
export * from './services/topics';
export * from './services/passages';
export * from './services/overview';
export * from './services/plans';
export * from './services/pipeline';
