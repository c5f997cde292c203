import type { Unit } from '../../types/learningPlan';
import { logger } from '../../utils/logger';
import { countWords, detect, mergeShortSections } from './section.detector';
import { computeSpans, split, validateSplitOptions } from './splitter';
import type {
  Section,
  SegmentationAnomaly,
  SegmentationOptions,
  SegmentationResult,
} from './splitter.types';
import { parseToc, sectionsFromToc } from './toc.parser';

export function inBand(count: number, band: { min: number; max: number }): boolean {
  return count >= band.min && count <= band.max;
}

/**
 * Turn accepted sections into units. Sections never overlap each other; a
 * section longer than a unit is re-split inside its own range.
 */
export function sectionsToUnits(
  text: string,
  sections: Section[],
  options: Pick<SegmentationOptions, 'unitSize' | 'overlapSize' | 'separator'>,
): Unit[] {
  const units: Unit[] = [];

  for (const section of sections) {
    if (section.end - section.start <= options.unitSize) {
      units.push({
        index: units.length,
        text: text.slice(section.start, section.end),
        start: section.start,
        end: section.end,
        title: section.title,
      });
      continue;
    }

    const spans = computeSpans(text, section.start, section.end, options);
    spans.forEach(([start, end], part) => {
      units.push({
        index: units.length,
        text: text.slice(start, end),
        start,
        end,
        title: `${section.title} (Part ${part + 1})`,
      });
    });
  }

  return units;
}

/**
 * Choose between structural sections and plain splitting.
 *
 * Sections are honored only when their count falls inside the band; a
 * document whose detector reports hundreds of "chapters" is split as if it
 * had none.
 */
export function segmentDocument(
  text: string,
  options: SegmentationOptions,
): SegmentationResult {
  validateSplitOptions(options);

  const { sectionBand } = options;
  let anomaly: SegmentationAnomaly | undefined;
  let detectedSections = 0;

  if (options.tocText?.trim()) {
    const entries = parseToc(options.tocText);
    const sections = mergeShortSections(
      text,
      sectionsFromToc(text, entries),
      options.minSectionWords,
    );
    detectedSections = sections.length;

    if (inBand(sections.length, sectionBand)) {
      logger.info(
        { entries: entries.length, sections: sections.length },
        'Using table of contents sections',
      );
      return {
        units: sectionsToUnits(text, sections, options),
        mode: 'toc',
        sections,
        detectedSections,
      };
    }
    anomaly = { source: 'toc', detected: sections.length, band: sectionBand };
    logger.warn(anomaly, 'Table of contents section count outside accepted band');
  }

  if (options.useSections) {
    const sections = detect(text, { minSectionWords: options.minSectionWords });
    detectedSections = sections.length;

    if (inBand(sections.length, sectionBand)) {
      logger.info(
        {
          sections: sections.length,
          averageWords: Math.round(countWords(text) / sections.length),
        },
        'Using detected sections',
      );
      return {
        units: sectionsToUnits(text, sections, options),
        mode: 'sections',
        sections,
        detectedSections,
      };
    }

    if (sections.length > 0) {
      anomaly = { source: 'sections', detected: sections.length, band: sectionBand };
      logger.warn(anomaly, 'Detected section count outside accepted band, splitting instead');
    }
  }

  const units = split(text, options.unitSize, options.overlapSize, options.separator);
  logger.info({ units: units.length, unitSize: options.unitSize }, 'Split document into units');

  return { units, mode: 'split', detectedSections, anomaly };
}
