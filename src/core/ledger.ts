/**
 * Per-run status ledger.
 *
 * Stages probe the filesystem and the warehouse, then ask the ledger what to
 * do with what they found. The ledger also records what each stage did so the
 * orchestrator can report per-unit outcomes.
 */
import type {
  ArtifactState,
  LoadPolicy,
  StageName,
  UnitOfWork,
  UnitOutcome,
} from "./types.js";

// ---------------------------------------------------------------------------
// Decisions
// ---------------------------------------------------------------------------

export type FetchDecision = "fetch" | "skip";
export type TransformDecision = "transform" | "reuse";
export type LoadDecision = "skip" | "create" | "append" | "reset-and-append";

export function decideFetch(state: ArtifactState): FetchDecision {
  return state === "absent" ? "fetch" : "skip";
}

export function decideTransform(state: ArtifactState): TransformDecision {
  return state === "canonical" || state === "both" ? "reuse" : "transform";
}

/**
 * @param firstOfPartition - the unit is month 1 of a shared partition
 * @param reset - whether this call may reset the partition
 */
export function decideLoad(
  policy: LoadPolicy,
  tableExists: boolean,
  firstOfPartition: boolean,
  reset: boolean,
): LoadDecision {
  if (policy === "fail-if-exists") return tableExists ? "skip" : "create";
  if (firstOfPartition && reset) return "reset-and-append";
  return "append";
}

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export type StageStatus = "pending" | "done" | "skipped" | "failed";

export interface LedgerEntry {
  unit: string;
  table: string;
  stages: Record<StageName, StageStatus>;
  rowsInserted: number;
  tableRows: number;
  attempts: number;
  skipReason: string | null;
  error: string | null;
}

export class UnitLedger {
  private entries = new Map<string, LedgerEntry>();

  begin(unit: UnitOfWork): LedgerEntry {
    const entry: LedgerEntry = {
      unit: unit.key,
      table: `${unit.target.schema}.${unit.target.name}`,
      stages: { fetch: "pending", transform: "pending", load: "pending" },
      rowsInserted: 0,
      tableRows: 0,
      attempts: 0,
      skipReason: null,
      error: null,
    };
    this.entries.set(unit.key, entry);
    return entry;
  }

  entry(unit: UnitOfWork): LedgerEntry {
    return this.entries.get(unit.key) ?? this.begin(unit);
  }

  mark(
    unit: UnitOfWork,
    stage: StageName,
    status: StageStatus,
    detail: Partial<
      Pick<LedgerEntry, "rowsInserted" | "tableRows" | "attempts" | "skipReason" | "error">
    > = {},
  ): void {
    const entry = this.entry(unit);
    entry.stages[stage] = status;
    Object.assign(entry, detail);
  }

  /** True once `stage` completed, by doing the work or by finding it done. */
  isComplete(unit: UnitOfWork, stage: StageName): boolean {
    const status = this.entries.get(unit.key)?.stages[stage];
    return status === "done" || status === "skipped";
  }

  outcome(unit: UnitOfWork): UnitOutcome {
    const e = this.entry(unit);
    const failedStage = (["fetch", "transform", "load"] as const).find(
      (s) => e.stages[s] === "failed",
    );
    if (failedStage) {
      return {
        unit: e.unit,
        status: "failed",
        table: e.table,
        stage: failedStage,
        attempts: e.attempts,
        error: e.error ?? "unknown error",
      };
    }
    if (e.stages.load === "skipped") {
      return {
        unit: e.unit,
        status: "skipped",
        table: e.table,
        reason: e.skipReason ?? "already-loaded",
      };
    }
    if (e.stages.load === "done") {
      return {
        unit: e.unit,
        status: "loaded",
        table: e.table,
        rowsInserted: e.rowsInserted,
        tableRows: e.tableRows,
      };
    }
    return {
      unit: e.unit,
      status: "failed",
      table: e.table,
      stage: "load",
      attempts: e.attempts,
      error: "unit did not finish",
    };
  }

  all(): LedgerEntry[] {
    return [...this.entries.values()];
  }
}
