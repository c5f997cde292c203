import { describe, expect, test } from 'vitest';
import { generateOverview } from '../../services/overview/overview.generator';
import { ModelError, TransportError } from '../../utils/errors';
import { createFakeCompletion, never } from '../helpers';

const sections = Array.from({ length: 12 }, (_, i) => ({
  title: `Part ${i + 1}`,
  text: `Part ${i + 1} body ${'x'.repeat(600)}`,
}));

const options = {
  documentTitle: 'Databases',
  timeoutMs: 1000,
  retry: { maxAttempts: 2, delays: [0] },
};

describe('generateOverview', () => {
  test('summarizes the opening of the first sections', async () => {
    const completion = createFakeCompletion(() => '{"summary": "A database primer."}');

    const overview = await generateOverview(sections, completion, options);

    expect(overview?.summary).toBe('A database primer.');
    expect(overview?.sections.map((s) => s.number)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(overview?.sections[11].title).toBe('Part 12');

    const [{ prompt, options: callOptions }] = completion.calls;
    expect(prompt.startsWith('Analyze the document "Databases"')).toBe(true);
    expect(prompt).toContain('Section 10: Part 10');
    expect(prompt).not.toContain('Section 11:');
    expect(prompt).toContain('The document has 12 sections in total');
    expect(prompt).not.toContain('x'.repeat(500));
    expect(callOptions.temperature).toBe(0.4);
  });

  test('retries transport failures', async () => {
    const completion = createFakeCompletion((_prompt, _options, callIndex) => {
      if (callIndex === 0) throw new TransportError('connection reset');
      return '{"summary": "Second try."}';
    });

    const overview = await generateOverview(sections.slice(0, 3), completion, options);

    expect(overview?.summary).toBe('Second try.');
    expect(completion.calls).toHaveLength(2);
  });

  test('gives up after the last attempt', async () => {
    const completion = createFakeCompletion(() => {
      throw new ModelError('overloaded', 503);
    });

    expect(await generateOverview(sections, completion, options)).toBeUndefined();
    expect(completion.calls).toHaveLength(2);
  });

  test('does not retry an unreadable response', async () => {
    const completion = createFakeCompletion(() => 'Nothing to report.');

    expect(await generateOverview(sections, completion, options)).toBeUndefined();
    expect(completion.calls).toHaveLength(1);
  });

  test('times out a hung call', async () => {
    const completion = createFakeCompletion(() => never());

    const overview = await generateOverview(sections, completion, {
      ...options,
      timeoutMs: 20,
      retry: { maxAttempts: 1, delays: [0] },
    });

    expect(overview).toBeUndefined();
  });

  test('makes no call without sections', async () => {
    const completion = createFakeCompletion(() => '{"summary": "unused"}');

    expect(await generateOverview([], completion, options)).toBeUndefined();
    expect(completion.calls).toHaveLength(0);
  });
});
