/**
 * Batch orchestration: expand a request into units, prepare the warehouse,
 * then run every unit's pipeline on a bounded worker pool.
 */
import { randomUUID } from "node:crypto";
import pLimit from "p-limit";
import type { Logger } from "pino";
import type { DatabaseBackend } from "../db/backend.js";
import { FetchStage } from "../stages/fetch.js";
import { LoadStage } from "../stages/load.js";
import { TransformStage } from "../stages/transform.js";
import type { StorageBackend } from "../storage/backend.js";
import type { Transport } from "../transport/transport.js";
import { ETLPipeline } from "./etl.js";
import type { PipelineSettings } from "./etl.js";
import { IngestRunError, describeError } from "./exceptions.js";
import { UnitLedger } from "./ledger.js";
import { qualifiedName } from "./naming.js";
import { expandRequest } from "./planner.js";
import type { UnitOptions } from "./unit.js";
import type {
  IngestRequest,
  RunOptions,
  RunSummary,
  TableTarget,
  UnitOfWork,
  UnitOutcome,
} from "./types.js";

export interface OrchestratorOptions {
  storage: StorageBackend;
  db: DatabaseBackend;
  transport: Transport;
  logger: Logger;
  units: UnitOptions;
  pipeline: PipelineSettings;
  workers: number;
}

export class BatchOrchestrator {
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private transport: Transport;
  private logger: Logger;
  private unitOptions: UnitOptions;
  private settings: PipelineSettings;
  private workers: number;

  constructor(opts: OrchestratorOptions) {
    this.storage = opts.storage;
    this.db = opts.db;
    this.transport = opts.transport;
    this.logger = opts.logger;
    this.unitOptions = opts.units;
    this.settings = opts.pipeline;
    this.workers = Math.max(1, opts.workers);
  }

  async run(request: IngestRequest, options: RunOptions = {}): Promise<RunSummary> {
    const units = expandRequest(request, this.unitOptions);
    return this.runUnits(units, options);
  }

  /**
   * Run `units` to completion. A failing unit never stops the others; only a
   * warehouse that cannot be prepared aborts the run.
   */
  async runUnits(units: UnitOfWork[], options: RunOptions = {}): Promise<RunSummary> {
    const runId = randomUUID();
    const log = this.logger.child({ runId });
    const ledger = new UnitLedger();

    log.info(
      { units: units.length, workers: this.workers, policy: this.settings.policy },
      "starting run",
    );

    if (units.length > 0) {
      await this.prepareWarehouse(units, options.reset ?? false, log);
    }

    const pipeline = new ETLPipeline({
      fetch: new FetchStage(this.storage, this.transport, log),
      transform: new TransformStage(this.storage, log),
      load: new LoadStage(this.db, log),
      ledger,
      settings: this.settings,
      logger: log,
    });

    const limit = pLimit(this.workers);
    const outcomes = await Promise.all(
      units.map((unit) => limit(() => pipeline.run(unit, { reset: false }))),
    );

    const summary = summarize(runId, outcomes, this.resetGroups(units));
    log.info(
      {
        loaded: summary.loaded,
        skipped: summary.skipped,
        failed: summary.failed,
        rows: summary.rowsLoaded,
      },
      "run finished",
    );
    return summary;
  }

  /**
   * For each month-1 unit of a shared partition, every unit of the run that
   * loads into the same table. Re-running month 1 alone resets that table, so
   * the whole group has to be re-run with it.
   */
  private resetGroups(units: UnitOfWork[]): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    if (this.settings.policy !== "append-with-reset") return groups;

    const byTable = new Map<string, UnitOfWork[]>();
    for (const unit of units) {
      const name = qualifiedName(unit.target);
      byTable.set(name, [...(byTable.get(name) ?? []), unit]);
    }
    for (const members of byTable.values()) {
      const first = members.find((u) => u.month === 1);
      if (first) groups.set(first.key, members.map((u) => u.key));
    }
    return groups;
  }

  /**
   * Create the schema and drop the tables this run must rebuild: every target
   * when `reset` is set, otherwise each shared target whose month 1 is part
   * of the run.
   */
  private async prepareWarehouse(
    units: UnitOfWork[],
    reset: boolean,
    log: Logger,
  ): Promise<void> {
    const schema = this.unitOptions.schema;
    try {
      await this.db.ensureSchema(schema);
    } catch (err) {
      throw new IngestRunError(`Cannot prepare schema ${schema}: ${describeError(err)}`, err);
    }

    const shared = this.settings.policy === "append-with-reset";
    const drop = new Map<string, TableTarget>();
    for (const unit of units) {
      if (reset || (shared && unit.month === 1)) {
        drop.set(qualifiedName(unit.target), unit.target);
      }
    }

    for (const [name, target] of drop) {
      try {
        await this.db.dropTable(target);
      } catch (err) {
        throw new IngestRunError(`Cannot reset ${name}: ${describeError(err)}`, err);
      }
      log.info({ table: name }, "reset table");
    }
  }
}

/**
 * Tally outcomes. A failed unit listed in `resetGroups` makes its whole group
 * retryable.
 */
export function summarize(
  runId: string,
  outcomes: UnitOutcome[],
  resetGroups: ReadonlyMap<string, string[]> = new Map(),
): RunSummary {
  let loaded = 0;
  let skipped = 0;
  let failed = 0;
  let rowsLoaded = 0;
  const retry = new Set<string>();
  for (const o of outcomes) {
    if (o.status === "loaded") {
      loaded++;
      rowsLoaded += o.rowsInserted;
    } else if (o.status === "skipped") {
      skipped++;
    } else {
      failed++;
      for (const key of resetGroups.get(o.unit) ?? [o.unit]) retry.add(key);
    }
  }
  const retryable = outcomes.map((o) => o.unit).filter((key) => retry.has(key));
  return {
    runId,
    units: outcomes.length,
    loaded,
    skipped,
    failed,
    rowsLoaded,
    outcomes,
    retryable,
  };
}
