import { describe, expect, test } from 'vitest';
import { createDocument, textStatistics } from '../../services/documents/document';
import { EmptyDocumentError } from '../../utils/errors';

describe('createDocument', () => {
  test('normalizes line endings and computes statistics', () => {
    const document = createDocument({ text: 'one two\r\nthree\rfour', sourceName: 'notes.txt' });

    expect(document.text).toBe('one two\nthree\nfour');
    expect(document.metadata).toEqual({
      title: 'notes.txt',
      sourceName: 'notes.txt',
      wordCount: 4,
      charCount: 18,
      lineCount: 3,
    });
  });

  test('prefers an explicit title', () => {
    const document = createDocument({ text: 'body', title: '  Databases ', author: 'A. Writer' });
    expect(document.metadata).toMatchObject({ title: 'Databases', author: 'A. Writer' });
  });

  test('falls back to a generic title', () => {
    expect(createDocument({ text: 'body' }).metadata.title).toBe('Untitled document');
  });

  test('rejects blank text', () => {
    expect(() => createDocument({ text: ' \n\t ' })).toThrow(EmptyDocumentError);
  });

  test('is immutable', () => {
    const document = createDocument({ text: 'body' });
    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.metadata)).toBe(true);
  });
});

describe('textStatistics', () => {
  test('counts nothing in empty text', () => {
    expect(textStatistics('')).toEqual({ wordCount: 0, charCount: 0, lineCount: 0 });
  });
});
