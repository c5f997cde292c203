import { z } from 'zod';
import type { DocumentOverview, SectionOverview } from '../../types/learningPlan';
import { sliceBetween, stripCodeFences, tryParse } from '../topics/topic.parser';

export type OverviewParseResult =
  | { kind: 'ok'; overview: DocumentOverview }
  | { kind: 'malformed'; raw: string; reason: string };

const rawOverviewSchema = z.object({
  summary: z.string().trim().min(1),
  sections: z.array(z.unknown()).optional().default([]),
});

const rawSectionSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().optional().default(''),
  keyConcepts: z.array(z.string()).optional().default([]),
});

function toSections(items: unknown[], sectionTitles: string[]): SectionOverview[] {
  const sections: SectionOverview[] = [];
  for (const item of items) {
    if (sections.length === sectionTitles.length) break;
    const parsed = rawSectionSchema.safeParse(item);
    if (!parsed.success) continue;
    sections.push({
      number: sections.length + 1,
      title: parsed.data.title,
      description: parsed.data.description,
      keyConcepts: parsed.data.keyConcepts.map((c) => c.trim()).filter(Boolean),
    });
  }

  // Sections past the prompt's excerpt limit keep their titles
  for (let i = sections.length; i < sectionTitles.length; i++) {
    sections.push({ number: i + 1, title: sectionTitles[i], description: '', keyConcepts: [] });
  }
  return sections;
}

/**
 * Parse an overview response. `sectionTitles` are the accepted sections in
 * order; the result has exactly one entry per section.
 */
export function parseOverviewResponse(raw: string, sectionTitles: string[]): OverviewParseResult {
  const text = stripCodeFences(raw);
  if (!text) {
    return { kind: 'malformed', raw, reason: 'empty response' };
  }

  for (const variant of [text, sliceBetween(text, '{', '}')]) {
    if (variant === null) continue;
    const parsed = rawOverviewSchema.safeParse(tryParse(variant));
    if (parsed.success) {
      return {
        kind: 'ok',
        overview: {
          summary: parsed.data.summary,
          sections: toSections(parsed.data.sections, sectionTitles),
        },
      };
    }
  }

  return { kind: 'malformed', raw, reason: 'no overview object found in response' };
}
