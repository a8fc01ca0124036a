/**
 * Error Classes for the directory graph pipeline
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_UNREADABLE = "E1001",

  // Fetch errors (2xxx)
  FETCH_FAILED = "E2000",
  FETCH_TIMEOUT = "E2001",
  FETCH_HTTP_STATUS = "E2002",
  FETCH_EMPTY_CONTENT = "E2003",
  FETCH_CHALLENGE = "E2004",
  FETCH_NOT_FOUND = "E2005",
  FETCH_GOVERNOR_ABORTED = "E2006",

  // Artifact store errors (3xxx)
  STORE_INVALID_KEY = "E3000",
  STORE_IO_FAILED = "E3001",
  STORE_STATE_CORRUPT = "E3002",

  // Extraction errors (4xxx)
  EXTRACTION_FAILED = "E4000",
  EXTRACTION_NO_ITEMS = "E4001",

  // Graph errors (5xxx)
  GRAPH_INVARIANT_VIOLATION = "E5001",

  // Pipeline errors (6xxx)
  PIPELINE_PHASE_FAILED = "E6000",
  PIPELINE_WORKER_POOL_SHUTDOWN = "E6001",
  PIPELINE_QUEUE_FULL = "E6002",
  PIPELINE_TASK_TIMEOUT = "E6003",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all pipeline errors
 */
export class DirectoryGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DirectoryGraphError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Configuration file or flag errors
 */
export class ConfigurationError extends DirectoryGraphError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_INVALID, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Failure kinds reported by the page-fetch collaborator.
 * Every kind except `not-found` is an anomaly signal.
 */
export const FETCH_FAILURE_KINDS = [
  "timeout",
  "http-status",
  "empty-content",
  "challenge",
  "network",
  "not-found",
] as const;

export type FetchFailureKind = (typeof FETCH_FAILURE_KINDS)[number];

const FETCH_KIND_CODES: Record<FetchFailureKind, ErrorCode> = {
  timeout: ErrorCode.FETCH_TIMEOUT,
  "http-status": ErrorCode.FETCH_HTTP_STATUS,
  "empty-content": ErrorCode.FETCH_EMPTY_CONTENT,
  challenge: ErrorCode.FETCH_CHALLENGE,
  network: ErrorCode.FETCH_FAILED,
  "not-found": ErrorCode.FETCH_NOT_FOUND,
};

export function isAnomalousKind(kind: FetchFailureKind): boolean {
  return kind !== "not-found";
}

/**
 * A page could not be fetched (after retries, or permanently)
 */
export class FetchError extends DirectoryGraphError {
  public readonly kind: FetchFailureKind;
  public readonly url: string;
  public readonly attempts: number;
  public readonly status?: number;

  constructor(
    message: string,
    context: { kind: FetchFailureKind; url: string; attempts: number; status?: number; key?: string }
  ) {
    super(message, FETCH_KIND_CODES[context.kind], context);
    this.name = "FetchError";
    this.kind = context.kind;
    this.url = context.url;
    this.attempts = context.attempts;
    this.status = context.status;
  }

  get anomalous(): boolean {
    return isAnomalousKind(this.kind);
  }
}

/**
 * The fetch governor reached its terminal state; no further network I/O happens
 */
export class GovernorAbortedError extends DirectoryGraphError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ErrorCode.FETCH_GOVERNOR_ABORTED, context);
    this.name = "GovernorAbortedError";
  }
}

/**
 * Artifact store I/O and key errors
 */
export class ArtifactStoreError extends DirectoryGraphError {
  constructor(message: string, code: ErrorCode = ErrorCode.STORE_IO_FAILED, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ArtifactStoreError";
  }
}

/**
 * The structure of a page did not match what its extractor expects
 */
export class ExtractionError extends DirectoryGraphError {
  public readonly key?: string;
  public readonly pageType?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.EXTRACTION_FAILED,
    context?: Record<string, unknown> & { key?: string; pageType?: string }
  ) {
    super(message, code, context);
    this.name = "ExtractionError";
    this.key = context?.key;
    this.pageType = context?.pageType;
  }
}

/**
 * A graph invariant (unique identifiers, no orphans) does not hold
 */
export class InvariantViolationError extends DirectoryGraphError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GRAPH_INVARIANT_VIOLATION,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "InvariantViolationError";
  }
}

/**
 * Orchestration errors
 */
export class PipelineError extends DirectoryGraphError {
  constructor(message: string, code: ErrorCode = ErrorCode.PIPELINE_PHASE_FAILED, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "PipelineError";
  }
}

export function isDirectoryGraphError(error: unknown): error is DirectoryGraphError {
  return error instanceof DirectoryGraphError;
}

/**
 * Wrap an unknown error in a DirectoryGraphError
 */
export function wrapError(
  error: unknown,
  defaultMessage: string = "An unexpected error occurred",
  code: ErrorCode = ErrorCode.UNKNOWN_ERROR
): DirectoryGraphError {
  if (isDirectoryGraphError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new DirectoryGraphError(error.message || defaultMessage, code, {
      originalError: error.name,
      originalStack: error.stack,
    });
  }

  return new DirectoryGraphError(typeof error === "string" ? error : defaultMessage, code);
}

/** Message of any thrown value */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
