/**
 * Segments module - splitting, section detection and the band policy that
 * chooses between them.
 */

export { split, computeSpans, findCut, validateSplitOptions } from './splitter';
export { detect, extractTocBlock, isHeadingLine, countWords } from './section.detector';
export { parseToc, parseTocLine, sectionsFromToc } from './toc.parser';
export type { TocEntry } from './toc.parser';
export { segmentDocument, sectionsToUnits, inBand } from './segmentation';
export type {
  Cut,
  CutKind,
  Section,
  SegmentationAnomaly,
  SegmentationOptions,
  SegmentationResult,
  SplitOptions,
} from './splitter.types';
