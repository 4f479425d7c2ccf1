/**
 * Base class for every failure the pipeline raises on purpose.
 */
export class CdcPipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CdcPipelineError";
  }
}

/**
 * Connectivity failure against the log, the registry or a sink.
 * Retried with backoff before it is escalated.
 */
export class TransientIOError extends CdcPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransientIOError";
  }
}

/**
 * The registry does not know the schema id embedded in a payload.
 */
export class SchemaResolutionError extends CdcPipelineError {
  readonly schemaId: number;

  constructor(schemaId: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SchemaResolutionError";
    this.schemaId = schemaId;
  }
}

/**
 * A payload is malformed, or a required field is missing or mistyped.
 */
export class DecodeContractViolation extends CdcPipelineError {
  readonly field?: string;

  constructor(
    message: string,
    options?: { field?: string; cause?: unknown },
  ) {
    super(message, options);
    this.name = "DecodeContractViolation";
    this.field = options?.field;
  }
}

export class SinkWriteError extends CdcPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SinkWriteError";
  }
}

/**
 * A record reached the projector in a shape the decoder should have rejected.
 */
export class ProjectionInvariantError extends CdcPipelineError {
  constructor(message: string) {
    super(message);
    this.name = "ProjectionInvariantError";
  }
}

export class WindowStateError extends CdcPipelineError {
  constructor(message: string) {
    super(message);
    this.name = "WindowStateError";
  }
}

/**
 * Error thrown when configuration cannot be found, parsed or validated
 */
export class ConfigError extends CdcPipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
