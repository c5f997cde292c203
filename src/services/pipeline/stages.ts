/**
 * Stage definitions and labels for the learning-plan pipeline.
 *
 * Stage 1: Segmentation (sections or overlapping split)
 * Stage 2: Topic Extraction (completion, parallel per unit)
 * Stage 3: Topic Merge (algorithmic)
 * Stage 4: Passage Ranking (keyword or completion)
 * Stage 5: Plan Assembly
 */

export type PlanStage = 1 | 2 | 3 | 4 | 5;

export const STAGE_LABELS: Record<
  PlanStage,
  { generic: string; technical: string }
> = {
  1: {
    generic: 'Reading through your document...',
    technical: 'Stage 1: Segmentation',
  },
  2: {
    generic: 'Identifying the key topics...',
    technical: 'Stage 2: Topic Extraction',
  },
  3: {
    generic: 'Combining overlapping topics...',
    technical: 'Stage 3: Topic Merge',
  },
  4: {
    generic: 'Finding the best passages for each topic...',
    technical: 'Stage 4: Passage Ranking',
  },
  5: {
    generic: 'Putting your learning plan together...',
    technical: 'Stage 5: Plan Assembly',
  },
};

export function getStageLabel(stage: PlanStage, technical = false): string {
  return technical
    ? STAGE_LABELS[stage].technical
    : STAGE_LABELS[stage].generic;
}
