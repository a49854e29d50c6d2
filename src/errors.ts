/**
 * Error taxonomy shared by every pipeline stage. Each class carries a stable
 * `code` so the collection runner, the CLI and the logs can classify failures
 * without inspecting messages, plus the identifier of the dataset involved when
 * it is known.
 */

/** Stable codes surfaced by {@link PipelineError.code}. */
export const PIPELINE_ERROR_CODES = {
  acquisition: "E-ACQUISITION",
  estimation: "E-ESTIMATION",
  configuration: "E-CONFIGURATION",
  searchExecution: "E-SEARCH-EXECUTION",
  unsupportedVersion: "E-UNSUPPORTED-VERSION",
} as const;

export type PipelineErrorCode = (typeof PIPELINE_ERROR_CODES)[keyof typeof PIPELINE_ERROR_CODES];

export interface PipelineErrorOptions {
  /** Identifier of the dataset whose stage failed, when known. */
  readonly datasetId?: string | null;
  /** Structured metadata mirrored to logs and CLI reports. */
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;
}

/** Base class of every failure raised by the pipeline. */
export abstract class PipelineError extends Error {
  public abstract readonly code: PipelineErrorCode;
  public readonly datasetId: string | null;
  public readonly details: Record<string, unknown>;

  protected constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.datasetId = options.datasetId ?? null;
    this.details = options.details ?? {};
  }

  /** Serialisable view used by loggers and reports. */
  toJSON(): { code: PipelineErrorCode; message: string; dataset_id: string | null; details: Record<string, unknown> } {
    return { code: this.code, message: this.message, dataset_id: this.datasetId, details: this.details };
  }
}

/** The protein database source is unreachable, unknown or malformed. */
export class AcquisitionError extends PipelineError {
  public override readonly code = PIPELINE_ERROR_CODES.acquisition;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, options);
    this.name = "AcquisitionError";
  }
}

/** The parameter estimator failed or produced an unusable table. */
export class EstimationError extends PipelineError {
  public override readonly code = PIPELINE_ERROR_CODES.estimation;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, options);
    this.name = "EstimationError";
  }
}

/**
 * Registries, templates or the catalogue disagree with what a dataset asks
 * for, or a search was requested before the tolerances were known.
 */
export class ConfigurationError extends PipelineError {
  public override readonly code = PIPELINE_ERROR_CODES.configuration;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}

export interface SearchExecutionErrorOptions extends PipelineErrorOptions {
  /** Raw output paths left behind by the engine, kept for operator inspection. */
  readonly rawPaths?: readonly string[];
}

/** The search binary failed or left an incomplete result triple. */
export class SearchExecutionError extends PipelineError {
  public override readonly code = PIPELINE_ERROR_CODES.searchExecution;
  public readonly rawPaths: readonly string[];

  constructor(message: string, options: SearchExecutionErrorOptions = {}) {
    super(message, options);
    this.name = "SearchExecutionError";
    this.rawPaths = [...(options.rawPaths ?? [])];
  }
}

/** Normalisation met an engine version it has no format mapping for. */
export class UnsupportedVersionError extends PipelineError {
  public override readonly code = PIPELINE_ERROR_CODES.unsupportedVersion;
  public readonly version: string;

  constructor(version: string, supported: readonly string[], options: PipelineErrorOptions = {}) {
    super(`Unsupported engine version "${version}" (supported: ${supported.join(", ")}).`, {
      ...options,
      details: { version, supported: [...supported], ...options.details },
    });
    this.name = "UnsupportedVersionError";
    this.version = version;
  }
}

/** True for failures that only block the owning dataset. */
export function isDatasetLocalError(error: unknown): error is AcquisitionError | EstimationError {
  return error instanceof AcquisitionError || error instanceof EstimationError;
}

/** True for failures that reveal registries or templates out of sync with the catalogue. */
export function isFatalConfigurationError(error: unknown): error is ConfigurationError | UnsupportedVersionError {
  return error instanceof ConfigurationError || error instanceof UnsupportedVersionError;
}

/** Extracts a printable message from anything thrown. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
