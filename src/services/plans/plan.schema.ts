import { z } from 'zod';
import type { LearningPlan } from '../../types/learningPlan';

const importanceSchema = z.enum(['High', 'Medium', 'Low']);

const passageSchema = z.object({
  text: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  score: z.number(),
  rank: z.number().int().positive(),
});

const plannedTopicSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string(),
  importance: importanceSchema,
  ordinal: z.number().int().positive(),
  keywords: z.array(z.string()),
  sourceUnits: z.array(z.number().int().nonnegative()),
  passages: z.array(passageSchema),
});

const documentMetadataSchema = z.object({
  title: z.string(),
  author: z.string().optional(),
  sourceName: z.string().optional(),
  wordCount: z.number().int().nonnegative(),
  charCount: z.number().int().nonnegative(),
  lineCount: z.number().int().nonnegative(),
});

const overviewSchema = z.object({
  summary: z.string(),
  sections: z.array(
    z.object({
      number: z.number().int().positive(),
      title: z.string(),
      description: z.string(),
      keyConcepts: z.array(z.string()),
    }),
  ),
});

const provenanceSchema = z.object({
  cacheKey: z.string(),
  segmentation: z.enum(['sections', 'toc', 'split']),
  unitCount: z.number().int().nonnegative(),
  failedUnits: z.array(z.number().int()),
  malformedUnits: z.array(z.number().int()),
  cancelled: z.boolean(),
  rankingStrategy: z.enum(['keyword', 'completion']),
  createdAt: z.string(),
});

export const learningPlanSchema: z.ZodType<LearningPlan> = z.object({
  schemaVersion: z.literal(1),
  document: documentMetadataSchema,
  topics: z.array(plannedTopicSchema),
  overview: overviewSchema.optional(),
  provenance: provenanceSchema.optional(),
});
