export type PipelineStage = "extract" | "transform" | "load";

export type SchemaIssue = {
  path: string;
  expected: string;
  received: string;
  message: string;
};

type SymbolFailureBase = {
  symbol: string;
  message: string;
  retryable: boolean;
  cause?: unknown;
};

export type TransportError = SymbolFailureBase & {
  kind: "transport_error";
  stage: "extract";
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  httpStatus?: number;
};

/**
 * Provider throttling. Kept apart from transport faults so operators can tell "throttled" from "broken".
 */
export type RateLimitError = SymbolFailureBase & {
  kind: "rate_limited";
  stage: "extract";
  httpStatus?: number;
};

export type SchemaValidationError = SymbolFailureBase & {
  kind: "schema_validation";
  stage: "extract";
  issues: SchemaIssue[];
};

export type SnapshotStorageError = SymbolFailureBase & {
  kind: "snapshot_storage";
  stage: "extract";
  path: string;
};

export type TransformError = SymbolFailureBase & {
  kind: "transform_error";
  stage: "transform";
  path: string;
};

/**
 * The store refused this symbol's rows (SQLSTATE class 22 or 23). The store itself is still usable.
 */
export type LoadRejectedError = SymbolFailureBase & {
  kind: "load_rejected";
  stage: "load";
  sqlState: string;
};

export type UnexpectedSymbolError = SymbolFailureBase & {
  kind: "unexpected_error";
  stage: PipelineStage;
};

export type ExtractionError =
  | TransportError
  | RateLimitError
  | SchemaValidationError
  | SnapshotStorageError;

export type SymbolFailure =
  | ExtractionError
  | TransformError
  | LoadRejectedError
  | UnexpectedSymbolError;

export type SymbolFailureKind = SymbolFailure["kind"];

/**
 * Base for failures that end the whole run instead of a single symbol.
 */
export abstract class EtlFatalError extends Error {
  abstract readonly code: string;

  constructor(
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ConfigurationError extends EtlFatalError {
  readonly code = "CONFIGURATION_INVALID";
}

export class PersistenceError extends EtlFatalError {
  readonly code = "PERSISTENCE_UNAVAILABLE";
}

export const isEtlFatalError = (error: unknown): error is EtlFatalError =>
  error instanceof EtlFatalError;
