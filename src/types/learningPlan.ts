/**
 * Shared types for documents, topic extraction and assembled learning plans.
 * Used by the segmentation, topic, passage and plan services.
 */

export type Importance = 'High' | 'Medium' | 'Low';

export const IMPORTANCE_RANK: Record<Importance, number> = {
  High: 3,
  Medium: 2,
  Low: 1,
};

export interface DocumentMetadata {
  title: string;
  author?: string;
  sourceName?: string;
  wordCount: number;
  charCount: number;
  lineCount: number;
}

export interface Document {
  readonly text: string;
  readonly metadata: Readonly<DocumentMetadata>;
}

/**
 * A contiguous span of the document. `text` is always
 * `document.text.slice(start, end)`.
 */
export interface Unit {
  index: number;
  text: string;
  start: number;
  end: number;
  title?: string;
}

export interface TopicCandidate {
  title: string;
  description: string;
  importance: Importance;
  sourceUnitIndex: number;
  /** Index of the candidate within its unit's response */
  position: number;
  keywords?: string[];
}

export interface Topic {
  /** Stable content hash of the normalized title */
  id: string;
  title: string;
  description: string;
  importance: Importance;
  /** 1-based, in order of first appearance */
  ordinal: number;
  keywords: string[];
  sourceUnits: number[];
}

export interface Passage {
  text: string;
  start: number;
  end: number;
  score: number;
  /** 1-based */
  rank: number;
}

export type RankingStrategy = 'keyword' | 'completion';

export type SegmentationMode = 'sections' | 'toc' | 'split';

export interface PlanProvenance {
  cacheKey: string;
  segmentation: SegmentationMode;
  unitCount: number;
  failedUnits: number[];
  malformedUnits: number[];
  cancelled: boolean;
  rankingStrategy: RankingStrategy;
  createdAt: string;
}

export interface SectionOverview {
  /** 1-based position among the accepted sections */
  number: number;
  title: string;
  description: string;
  keyConcepts: string[];
}

/**
 * Whole-document summary written from the accepted sections. Only present
 * when the document was segmented by sections or a table of contents.
 */
export interface DocumentOverview {
  summary: string;
  sections: SectionOverview[];
}

export interface PlannedTopic extends Topic {
  passages: Passage[];
}

export interface LearningPlan {
  schemaVersion: 1;
  document: DocumentMetadata;
  topics: PlannedTopic[];
  overview?: DocumentOverview;
  provenance?: PlanProvenance;
}
