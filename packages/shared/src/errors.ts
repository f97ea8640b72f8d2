// =============================================================================
// @postwatch/shared — Error taxonomy
// =============================================================================
// FetchError, SummarizationError and DeliveryError are scoped to one polling
// cycle and carry the pipeline stage that raised them. ConfigurationError is
// raised once at startup and is fatal.
// =============================================================================

/** Pipeline stages that can fail within a single cycle */
export type PipelineStage = "fetch" | "summarize" | "notify";

/**
 * Base class for all postwatch errors.
 */
export class PostwatchError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "PostwatchError";
    this.code = options?.code ?? "POSTWATCH_ERROR";
  }
}

/**
 * A recoverable failure inside one cycle of the processing pipeline.
 */
export class PipelineError extends PostwatchError {
  readonly stage: PipelineStage;

  constructor(
    message: string,
    options: { stage: PipelineStage; code: string; cause?: unknown },
  ) {
    super(message, { code: options.code, cause: options.cause });
    this.name = "PipelineError";
    this.stage = options.stage;
  }
}

/**
 * Thrown when the content source cannot be fetched or parsed.
 */
export class FetchError extends PipelineError {
  /** URL being fetched when the error occurred */
  readonly url?: string;

  constructor(message: string, options?: { url?: string; cause?: unknown }) {
    super(message, { stage: "fetch", code: "FETCH_FAILED", cause: options?.cause });
    this.name = "FetchError";
    this.url = options?.url;
  }
}

/**
 * Thrown when the summarizer errors, blocks the prompt, or returns no text.
 */
export class SummarizationError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, {
      stage: "summarize",
      code: "SUMMARIZATION_FAILED",
      cause: options?.cause,
    });
    this.name = "SummarizationError";
  }
}

/**
 * Thrown when the notifier does not confirm delivery.
 */
export class DeliveryError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, {
      stage: "notify",
      code: "DELIVERY_FAILED",
      cause: options?.cause,
    });
    this.name = "DeliveryError";
  }
}

/**
 * Thrown at startup when required configuration is missing or invalid.
 */
export class ConfigurationError extends PostwatchError {
  /** One human-readable line per failed variable */
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, {
      code: "CONFIGURATION_INVALID",
    });
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

/**
 * Coerce anything thrown at a stage boundary into that stage's error class.
 * Errors already belonging to the stage pass through untouched.
 */
export function toStageError(stage: PipelineStage, err: unknown): PipelineError {
  if (err instanceof PipelineError && err.stage === stage) return err;

  const message = err instanceof Error ? err.message : String(err);
  switch (stage) {
    case "fetch":
      return new FetchError(message, { cause: err });
    case "summarize":
      return new SummarizationError(message, { cause: err });
    case "notify":
      return new DeliveryError(message, { cause: err });
  }
}
