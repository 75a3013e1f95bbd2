/**
 * Shared types for units of work, tables, stage results and run summaries.
 */

export const SERVICES = ["yellow", "green"] as const;

/** Taxi service whose monthly trip file is ingested. */
export type Service = (typeof SERVICES)[number];

/** How units share warehouse tables. */
export type Granularity = "monthly" | "yearly";

/**
 * - `fail-if-exists`: each unit owns its table; an existing table means done.
 * - `append-with-reset`: units of a year append into one table; month 1 resets it.
 */
export type LoadPolicy = "fail-if-exists" | "append-with-reset";

export type ArtifactLayout = "by-year" | "flat";

export interface TableTarget {
  schema: string;
  name: string;
}

/** One (service, year, month) job with its derived locations. */
export interface UnitOfWork {
  readonly service: Service;
  readonly year: number;
  readonly month: number;
  readonly key: string;
  readonly sourceLocation: string;
  readonly artifactKey: string;
  readonly canonicalKey: string;
  readonly target: TableTarget;
}

export type ColumnType = "integer" | "float" | "text" | "timestamp" | "boolean";

export interface ColumnSpec {
  name: string;
  type: ColumnType;
}

export type CellValue = string | number | bigint | boolean | Date | null;

/** Row-major, schema-typed in-memory table. */
export interface CanonicalTable {
  columns: ColumnSpec[];
  rows: CellValue[][];
}

export type StageName = "fetch" | "transform" | "load";

/** Which on-disk forms of a unit's artifact currently exist. */
export type ArtifactState = "absent" | "raw" | "canonical" | "both";

// ---------------------------------------------------------------------------
// Stage results
// ---------------------------------------------------------------------------

export type FetchResult =
  | { status: "done"; bytes: number }
  | { status: "skipped"; reason: "artifact-present" };

export type TransformResult =
  | { status: "done"; table: CanonicalTable }
  | { status: "skipped"; reason: "canonical-present"; table: CanonicalTable };

export type LoadResult =
  | { status: "done"; rowsInserted: number; tableRows: number }
  | { status: "skipped"; reason: "already-loaded" };

// ---------------------------------------------------------------------------
// Run level
// ---------------------------------------------------------------------------

/** Coarse request, e.g. "year 2020 for all services". */
export interface IngestRequest {
  years: number[];
  services?: Service[];
  months?: number[];
}

export interface RunOptions {
  /** Drop every target table of the run before loading. */
  reset?: boolean;
}

export type UnitOutcome =
  | {
      unit: string;
      status: "loaded";
      table: string;
      rowsInserted: number;
      tableRows: number;
    }
  | { unit: string; status: "skipped"; table: string; reason: string }
  | {
      unit: string;
      status: "failed";
      table: string;
      stage: StageName;
      attempts: number;
      error: string;
    };

/** Result returned from a batch run. */
export interface RunSummary {
  runId: string;
  units: number;
  loaded: number;
  skipped: number;
  failed: number;
  rowsLoaded: number;
  outcomes: UnitOutcome[];
  /** Unit keys that should be re-invoked. */
  retryable: string[];
}
