/**
 * Learning-plan pipeline.
 * Orchestrates the 5-stage segmentation and reconciliation process.
 */

export {
  learningPlanPipeline,
  planCacheKey,
  type PipelineResult,
  type RunOptions,
} from './pipeline';
export {
  PipelineSession,
  type PipelineProgress,
  type SessionStats,
} from './session';
export { type PlanStage, STAGE_LABELS, getStageLabel } from './stages';
