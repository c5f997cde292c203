import type { SegmentationMode, Unit } from '../../types/learningPlan';

export interface SplitOptions {
  unitSize: number;
  overlapSize: number;
  separator?: string;
  /** How far back from the size limit a natural break may be taken (default: half a unit) */
  tolerance?: number;
}

export type CutKind = 'separator' | 'sentence' | 'word' | 'hard';

export interface Cut {
  position: number;
  kind: CutKind;
}

export interface Section {
  title: string;
  start: number;
  end: number;
}

export interface SegmentationOptions {
  unitSize: number;
  overlapSize: number;
  separator: string;
  sectionBand: { min: number; max: number };
  minSectionWords: number;
  useSections: boolean;
  /** User-supplied table of contents, preferred over heading detection */
  tocText?: string;
}

/**
 * Detection produced a section count outside the accepted band. Not an error:
 * the splitter takes over.
 */
export interface SegmentationAnomaly {
  source: 'sections' | 'toc';
  detected: number;
  band: { min: number; max: number };
}

export interface SegmentationResult {
  units: Unit[];
  mode: SegmentationMode;
  /** The accepted sections, in 'sections' and 'toc' modes */
  sections?: Section[];
  /** Sections found by detection, whether or not the band accepted them */
  detectedSections: number;
  anomaly?: SegmentationAnomaly;
}
