import type { Document, DocumentMetadata } from '../../types/learningPlan';
import { EmptyDocumentError } from '../../utils/errors';
import { countWords } from '../segments/section.detector';

export interface DocumentInput {
  text: string;
  title?: string;
  author?: string;
  sourceName?: string;
}

export function textStatistics(text: string): Pick<DocumentMetadata, 'wordCount' | 'charCount' | 'lineCount'> {
  return {
    wordCount: countWords(text),
    charCount: text.length,
    lineCount: text ? text.split('\n').length : 0,
  };
}

/**
 * Wrap decoded text as an immutable document. Line endings are normalized to
 * `\n` so offsets agree across platforms.
 */
export function createDocument(input: DocumentInput): Document {
  const text = input.text.replace(/\r\n?/g, '\n');
  if (!text.trim()) {
    throw new EmptyDocumentError();
  }

  const metadata: DocumentMetadata = {
    title: input.title?.trim() || input.sourceName || 'Untitled document',
    ...(input.author ? { author: input.author } : {}),
    ...(input.sourceName ? { sourceName: input.sourceName } : {}),
    ...textStatistics(text),
  };

  return Object.freeze({ text, metadata: Object.freeze(metadata) });
}
