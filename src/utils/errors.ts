export class PipelineError extends Error {
  constructor(
    public message: string,
    public code: string,
  ) {
    super(message);
    this.name = 'PipelineError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends PipelineError {
  constructor(message: string) {
    super(message, 'CONFIG_INVALID');
    this.name = 'ConfigError';
  }
}

export class TransportError extends PipelineError {
  constructor(
    message: string,
    public timedOut = false,
  ) {
    super(message, timedOut ? 'TRANSPORT_TIMEOUT' : 'TRANSPORT_FAILED');
    this.name = 'TransportError';
  }
}

export class ModelError extends PipelineError {
  constructor(
    message: string,
    public status?: number,
  ) {
    super(message, 'MODEL_REJECTED');
    this.name = 'ModelError';
  }
}

export class ParseError extends PipelineError {
  constructor(
    message: string,
    public raw: string,
  ) {
    super(message, 'PARSE_FAILED');
    this.name = 'ParseError';
  }
}

export class EmptyDocumentError extends PipelineError {
  constructor(message = 'Document text is empty') {
    super(message, 'EMPTY_DOCUMENT');
    this.name = 'EmptyDocumentError';
  }
}

export class SegmentationError extends PipelineError {
  constructor(message = 'Segmentation produced no units') {
    super(message, 'SEGMENTATION_EMPTY');
    this.name = 'SegmentationError';
  }
}

export class ExtractionFailedError extends PipelineError {
  constructor(
    public failedUnits: number[],
    message = 'Failed to extract topics from any unit',
  ) {
    super(message, 'EXTRACTION_FAILED');
    this.name = 'ExtractionFailedError';
  }
}

export class PlanAssemblyError extends PipelineError {
  constructor(message: string) {
    super(message, 'PLAN_ASSEMBLY');
    this.name = 'PlanAssemblyError';
  }
}

/**
 * Transport and model failures are worth another attempt; everything else is not.
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof TransportError || error instanceof ModelError;
}
