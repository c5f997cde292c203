import { ModelError, TransportError } from '../../utils/errors';

function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error) {
    return typeof error.status === 'number' ? error.status : undefined;
  }
  return undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map an SDK failure onto the pipeline's error taxonomy. Anything carrying an
 * HTTP status came back from the backend; everything else is transport.
 */
export function toCompletionError(error: unknown, provider: string): Error {
  if (error instanceof TransportError || error instanceof ModelError) {
    return error;
  }

  const status = statusOf(error);
  if (status !== undefined) {
    return new ModelError(`${provider} rejected request (${status}): ${messageOf(error)}`, status);
  }

  const timedOut = error instanceof Error && /timed? ?out|timeout/i.test(error.message);
  return new TransportError(`${provider} request failed: ${messageOf(error)}`, timedOut);
}
