import { describe, expect, test } from 'vitest';
import {
  type ExtractionOptions,
  extract,
  extractTopics,
  temperatureForAttempt,
} from '../../services/topics/topic.orchestrator';
import type { Unit } from '../../types/learningPlan';
import { ModelError, TransportError } from '../../utils/errors';
import { createFakeCompletion, makeUnit, never, tick } from '../helpers';

function makeUnits(count: number): Unit[] {
  return Array.from({ length: count }, (_, i) => makeUnit(i, i * 100, `[[unit ${i}]] body text`));
}

function unitOf(prompt: string): number {
  const match = prompt.match(/\[\[unit (\d+)\]\]/);
  return match ? Number(match[1]) : -1;
}

function topicJson(unit: number): string {
  return JSON.stringify([{ title: `Topic ${unit}`, description: `From unit ${unit}`, importance: 'High' }]);
}

function options(overrides: Partial<ExtractionOptions> = {}): ExtractionOptions {
  return {
    documentTitle: 'Test Book',
    concurrency: 4,
    timeoutMs: 1000,
    topicRange: { min: 8, max: 15 },
    retry: { maxAttempts: 2, delays: [0] },
    ...overrides,
  };
}

describe('extractTopics', () => {
  test('collects candidates from every unit in unit order', async () => {
    const completion = createFakeCompletion(async (prompt) => {
      const unit = unitOf(prompt);
      await tick(10 - unit * 3);
      return topicJson(unit);
    });

    const result = await extractTopics(makeUnits(3), completion, options());

    expect(result.candidates.map((c) => [c.sourceUnitIndex, c.title])).toEqual([
      [0, 'Topic 0'],
      [1, 'Topic 1'],
      [2, 'Topic 2'],
    ]);
    expect(result.failedUnits).toEqual([]);
    expect(result.cancelled).toBe(false);
  });

  test('records units that keep timing out and carries on', async () => {
    const completion = createFakeCompletion((prompt) => {
      const unit = unitOf(prompt);
      return unit === 3 || unit === 7 ? never() : topicJson(unit);
    });

    const result = await extractTopics(makeUnits(10), completion, options({ timeoutMs: 20 }));

    expect(result.failedUnits).toEqual([3, 7]);
    expect(result.candidates).toHaveLength(8);
    expect(result.candidates.map((c) => c.sourceUnitIndex)).toEqual([0, 1, 2, 4, 5, 6, 8, 9]);
    expect(completion.calls.filter((c) => unitOf(c.prompt) === 3)).toHaveLength(2);
  });

  test('malformed output yields no candidates and is not retried', async () => {
    const completion = createFakeCompletion((prompt) =>
      unitOf(prompt) === 1 ? 'Sorry, I cannot do that.' : topicJson(unitOf(prompt)),
    );

    const result = await extractTopics(makeUnits(3), completion, options());

    expect(result.malformedUnits).toEqual([1]);
    expect(result.failedUnits).toEqual([]);
    expect(result.candidates.map((c) => c.sourceUnitIndex)).toEqual([0, 2]);
    expect(completion.calls).toHaveLength(3);
  });

  test('retries transport errors with a lower temperature', async () => {
    const completion = createFakeCompletion((prompt, _options, callIndex) => {
      if (callIndex === 0) throw new TransportError('connection reset');
      return topicJson(unitOf(prompt));
    });

    const result = await extractTopics(makeUnits(1), completion, options());

    expect(result.candidates).toHaveLength(1);
    expect(completion.calls.map((c) => c.options.temperature)).toEqual([0.3, 0.2]);
  });

  test('gives up after the last attempt on model errors', async () => {
    const completion = createFakeCompletion(() => {
      throw new ModelError('rate limited', 429);
    });

    const result = await extractTopics(makeUnits(2), completion, options({ retry: { maxAttempts: 3, delays: [0] } }));

    expect(result.failedUnits).toEqual([0, 1]);
    expect(completion.calls).toHaveLength(6);
  });

  test('does not retry errors outside the taxonomy', async () => {
    const completion = createFakeCompletion(() => {
      throw new Error('bug');
    });

    const result = await extractTopics(makeUnits(1), completion, options());

    expect(result.failedUnits).toEqual([0]);
    expect(completion.calls).toHaveLength(1);
  });

  test('never runs more units at once than the concurrency bound', async () => {
    let inFlight = 0;
    let peak = 0;
    const completion = createFakeCompletion(async (prompt) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await tick(5);
      inFlight--;
      return topicJson(unitOf(prompt));
    });

    await extractTopics(makeUnits(8), completion, options({ concurrency: 2 }));

    expect(peak).toBe(2);
    expect(completion.calls).toHaveLength(8);
  });

  test('stops dispatching when cancelled and keeps finished work', async () => {
    const controller = new AbortController();
    const completion = createFakeCompletion((prompt) => {
      controller.abort();
      return topicJson(unitOf(prompt));
    });

    const result = await extractTopics(
      makeUnits(5),
      completion,
      options({ concurrency: 1, signal: controller.signal }),
    );

    expect(result.cancelled).toBe(true);
    expect(result.candidates.map((c) => c.title)).toEqual(['Topic 0']);
    expect(result.skippedUnits).toEqual([1, 2, 3, 4]);
    expect(completion.calls).toHaveLength(1);
  });

  test('reports progress per unit', async () => {
    const completion = createFakeCompletion((prompt) => topicJson(unitOf(prompt)));
    const seen: number[] = [];

    await extractTopics(
      makeUnits(3),
      completion,
      options({ concurrency: 1, onUnitComplete: (p) => seen.push(p.completed) }),
    );

    expect(seen).toEqual([1, 2, 3]);
  });

  test('passes the unit text and position in the prompt', async () => {
    const completion = createFakeCompletion((prompt) => topicJson(unitOf(prompt)));

    await extract([{ ...makeUnit(0, 0, '[[unit 0]] body text'), title: 'Chapter 1' }], completion, options());

    expect(completion.calls[0].prompt).toContain('section "Chapter 1" (part 1 of 1)');
    expect(completion.calls[0].prompt).toContain('"Test Book"');
    expect(completion.calls[0].options.systemMessage).toBeDefined();
  });
});

describe('extract', () => {
  test('returns the candidate list only', async () => {
    const completion = createFakeCompletion((prompt) => topicJson(unitOf(prompt)));
    const candidates = await extract(makeUnits(2), completion, options());
    expect(candidates.map((c) => c.title)).toEqual(['Topic 0', 'Topic 1']);
  });
});

describe('temperatureForAttempt', () => {
  test('drops by a tenth per attempt down to 0.1', () => {
    expect([1, 2, 3, 4, 5].map(temperatureForAttempt)).toEqual([0.3, 0.2, 0.1, 0.1, 0.1]);
  });
});
