/**
 * Lenient parsing of topic lists returned by a completion call.
 * Models wrap JSON in fences, add prose, or drop commas; anything that can be
 * recovered is, and anything that can't comes back as `malformed`.
 */

import { z } from 'zod';
import type { Importance, TopicCandidate } from '../../types/learningPlan';

export type ParseResult =
  | { kind: 'ok'; candidates: TopicCandidate[] }
  | { kind: 'malformed'; raw: string; reason: string };

const rawTopicSchema = z.object({
  title: z.string().trim().min(1),
  description: z.string().trim().optional().default(''),
  importance: z.string().optional(),
  keywords: z.array(z.string()).optional(),
});

type RawTopic = z.infer<typeof rawTopicSchema>;

export function normalizeImportance(value: string | undefined): Importance {
  switch (value?.trim().toLowerCase()) {
    case 'high':
      return 'High';
    case 'low':
      return 'Low';
    default:
      return 'Medium';
  }
}

export function stripCodeFences(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return (fenced ? fenced[1] : text).trim();
}

/**
 * Fix the usual near-JSON mistakes: trailing commas, and missing commas
 * between objects or between a value and the next key.
 */
export function repairJson(text: string): string {
  return text
    .replace(/,\s*([}\]])/g, '$1')
    .replace(/}\s*{/g, '},{')
    .replace(/"\s*\n\s*"/g, '",\n"');
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * JSON.parse, then once more after `repairJson`. Undefined when both fail.
 */
export function tryParse(text: string): unknown {
  return parseJson(text) ?? parseJson(repairJson(text));
}

export function sliceBetween(text: string, open: string, close: string): string | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? text.slice(start, end + 1) : null;
}

function toItems(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (typeof value === 'object' && value !== null) {
    if ('topics' in value && Array.isArray(value.topics)) return value.topics;
    if ('title' in value) return [value];
  }
  return null;
}

function validItems(items: unknown[]): RawTopic[] {
  const topics: RawTopic[] = [];
  for (const item of items) {
    const parsed = rawTopicSchema.safeParse(item);
    if (parsed.success) topics.push(parsed.data);
  }
  return topics;
}

/**
 * Pull out standalone `{...}` objects when the surrounding structure is broken.
 */
function salvageObjects(text: string): RawTopic[] {
  const objects = text.match(/\{[^{}]*\}/g) ?? [];
  return validItems(objects.map((chunk) => tryParse(chunk)).filter((v) => v !== undefined));
}

function toCandidates(topics: RawTopic[], unitIndex: number): TopicCandidate[] {
  return topics.map((topic, position) => ({
    title: topic.title,
    description: topic.description,
    importance: normalizeImportance(topic.importance),
    sourceUnitIndex: unitIndex,
    position,
    keywords: topic.keywords?.map((k) => k.trim()).filter(Boolean),
  }));
}

export function parseTopicResponse(raw: string, unitIndex: number): ParseResult {
  const text = stripCodeFences(raw);
  if (!text) {
    return { kind: 'malformed', raw, reason: 'empty response' };
  }

  const variants = [text, sliceBetween(text, '[', ']'), sliceBetween(text, '{', '}')];
  for (const variant of variants) {
    if (variant === null) continue;
    const items = toItems(tryParse(variant));
    if (items === null) continue;

    const topics = validItems(items);
    if (items.length === 0 || topics.length > 0) {
      return { kind: 'ok', candidates: toCandidates(topics, unitIndex) };
    }
  }

  const salvaged = salvageObjects(text);
  if (salvaged.length > 0) {
    return { kind: 'ok', candidates: toCandidates(salvaged, unitIndex) };
  }

  return { kind: 'malformed', raw, reason: 'no topic list found in response' };
}
