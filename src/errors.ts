/**
 * Base class for every failure the pipeline raises on purpose.
 */
export class PipelineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {}

/** A remote model or operation reported a failed state. */
export class RemoteProcessingError extends PipelineError {}

/** The remote operation finished but returned nothing usable. */
export class GenerationIncompleteError extends PipelineError {}

/** The frame grab left a missing or empty image behind. */
export class ExtractionError extends PipelineError {}

export class ParseError extends PipelineError {}

/** Missing directories, files or objects. */
export class StorageError extends PipelineError {}

export class OperationTimeoutError extends PipelineError {}

/**
 * Best-effort message for values caught from third-party code.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
