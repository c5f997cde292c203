/**
 * One completion call that summarizes the accepted sections of a document.
 * The overview is optional: a failed call or an unreadable response leaves
 * it out of the plan.
 */

import { OVERVIEW_EXCERPT_CHARS, OVERVIEW_SECTION_LIMIT } from '../../config/constants';
import { DEFAULT_RETRY_POLICY, withRetry } from '../../lib/retry';
import type { RetryPolicy } from '../../lib/retry';
import { withTimeout } from '../../lib/timeout';
import { summarizeDocumentPrompt } from '../../prompts/learningPlan';
import type { DocumentOverview } from '../../types/learningPlan';
import { isRetryableError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { CompletionProvider } from '../completion/provider.interface';
import { parseOverviewResponse } from './overview.parser';

export interface OverviewSection {
  title: string;
  text: string;
}

export interface OverviewOptions {
  documentTitle: string;
  timeoutMs: number;
  retry?: RetryPolicy;
  signal?: AbortSignal;
}

export async function generateOverview(
  sections: OverviewSection[],
  completion: CompletionProvider,
  options: OverviewOptions,
): Promise<DocumentOverview | undefined> {
  if (sections.length === 0) return undefined;

  const prompt = summarizeDocumentPrompt.build({
    documentTitle: options.documentTitle,
    sections: sections.slice(0, OVERVIEW_SECTION_LIMIT).map((section) => ({
      title: section.title,
      excerpt: section.text.slice(0, OVERVIEW_EXCERPT_CHARS),
    })),
    totalSections: sections.length,
  });

  let raw: string;
  try {
    raw = await withRetry(
      () =>
        withTimeout(
          (signal) =>
            completion.complete(prompt, {
              maxTokens: summarizeDocumentPrompt.maxTokens,
              temperature: summarizeDocumentPrompt.temperature,
              systemMessage: summarizeDocumentPrompt.systemMessage,
              signal,
            }),
          options.timeoutMs,
        ),
      {
        policy: options.retry ?? DEFAULT_RETRY_POLICY,
        isRetryable: isRetryableError,
        signal: options.signal,
        onRetry: (error, attempt, delayMs) => {
          logger.warn(
            { attempt, delayMs, error: error instanceof Error ? error.message : String(error) },
            'Overview attempt failed, retrying',
          );
        },
      },
    );
  } catch (error) {
    logger.warn(
      { error: error instanceof Error ? error.message : String(error) },
      'Overview generation failed, plan has no overview',
    );
    return undefined;
  }

  const parsed = parseOverviewResponse(
    raw,
    sections.map((section) => section.title),
  );
  if (parsed.kind === 'malformed') {
    logger.warn(
      { reason: parsed.reason, preview: parsed.raw.slice(0, 200) },
      'Malformed overview response, plan has no overview',
    );
    return undefined;
  }

  logger.debug({ sections: parsed.overview.sections.length }, 'Generated document overview');
  return parsed.overview;
}
