/**
 * Custom exceptions for ingestion stages.
 */
import type { StageName } from "./types.js";

// ---------------------------------------------------------------------------
// Stage-local errors
// ---------------------------------------------------------------------------

/** Network, HTTP status or truncated-download failure. Retried. */
export class TransientTransferError extends Error {
  url: string;
  status: number | null;

  constructor(url: string, message: string, status: number | null = null) {
    super(`Transfer of ${url} failed: ${message}`);
    this.name = "TransientTransferError";
    this.url = url;
    this.status = status;
  }
}

/** Connection drop, deadlock or any other warehouse error. Retried. */
export class TransientLoadError extends Error {
  table: string;

  constructor(table: string, message: string) {
    super(`Load into ${table} failed: ${message}`);
    this.name = "TransientLoadError";
    this.table = table;
  }
}

/** The source columns cannot be mapped onto the canonical schema. Never retried. */
export class SchemaDriftError extends Error {
  columns: string[];

  constructor(message: string, columns: string[]) {
    super(`Schema drift: ${message}`);
    this.name = "SchemaDriftError";
    this.columns = columns;
  }
}

// ---------------------------------------------------------------------------
// Stage failures, raised once retries are exhausted
// ---------------------------------------------------------------------------

export class StageFailedException extends Error {
  readonly stage: StageName;
  unitKey: string;
  attempts: number;

  constructor(
    stage: StageName,
    unitKey: string,
    attempts: number,
    cause: unknown,
  ) {
    super(`${stage} failed for ${unitKey}: ${describeError(cause)}`, { cause });
    this.name = "StageFailedException";
    this.stage = stage;
    this.unitKey = unitKey;
    this.attempts = attempts;
  }
}

export class FetchFailedException extends StageFailedException {
  constructor(unitKey: string, attempts: number, cause: unknown) {
    super("fetch", unitKey, attempts, cause);
    this.name = "FetchFailedException";
  }
}

export class TransformFailedException extends StageFailedException {
  constructor(unitKey: string, attempts: number, cause: unknown) {
    super("transform", unitKey, attempts, cause);
    this.name = "TransformFailedException";
  }
}

export class LoadFailedException extends StageFailedException {
  constructor(unitKey: string, attempts: number, cause: unknown) {
    super("load", unitKey, attempts, cause);
    this.name = "LoadFailedException";
  }
}

// ---------------------------------------------------------------------------
// Input and run errors
// ---------------------------------------------------------------------------

export class UnsupportedServiceError extends Error {
  constructor(service: string) {
    super(`Unsupported service: ${service}`);
    this.name = "UnsupportedServiceError";
  }
}

export class InvalidUnitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidUnitError";
  }
}

export class IngestRunError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "IngestRunError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
