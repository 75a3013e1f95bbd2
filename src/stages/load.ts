/**
 * Load stage: append a unit's canonical rows to its warehouse table.
 *
 * Rows never go straight into the target. They are inserted in bounded batches
 * into a per-unit shadow table, which is then published in one step:
 *
 * - `fail-if-exists`: the shadow table is renamed onto the target, so the
 *   target exists only once it is complete.
 * - `append-with-reset`: the shadow rows are appended to the shared target and
 *   the shadow table dropped in one transaction, so a failed attempt leaves
 *   the target as it was.
 */
import type { Logger } from "pino";
import { TransientLoadError, describeError } from "../core/exceptions.js";
import { decideLoad } from "../core/ledger.js";
import { qualifiedName } from "../core/naming.js";
import type {
  CanonicalTable,
  ColumnSpec,
  LoadPolicy,
  LoadResult,
  TableTarget,
  UnitOfWork,
} from "../core/types.js";
import type { DatabaseBackend } from "../db/backend.js";
import {
  addColumnSql,
  appendSelectSql,
  countRows,
  createTableSql,
  renameTableSql,
} from "../db/sql.js";

export const DEFAULT_BATCH_SIZE = 10_000;

export interface LoadOptions {
  policy: LoadPolicy;
  batchSize?: number;
  /**
   * Let month 1 drop a shared target before appending. The orchestrator turns
   * this off after resetting partitions up front.
   */
  reset?: boolean;
}

export class LoadStage {
  constructor(
    private readonly db: DatabaseBackend,
    private readonly logger: Logger,
  ) {}

  async load(
    unit: UnitOfWork,
    table: CanonicalTable,
    opts: LoadOptions,
  ): Promise<LoadResult> {
    const target = unit.target;
    try {
      const exists = await this.db.tableExists(target);
      const decision = decideLoad(opts.policy, exists, unit.month === 1, opts.reset ?? true);
      const batchSize = Math.max(1, opts.batchSize ?? DEFAULT_BATCH_SIZE);

      switch (decision) {
        case "skip":
          this.logger.info(
            { unit: unit.key, table: qualifiedName(target) },
            "table already loaded, skipping",
          );
          return { status: "skipped", reason: "already-loaded" };
        case "create":
          return await this.loadExclusive(unit, table, batchSize);
        case "reset-and-append":
          this.logger.info(
            { unit: unit.key, table: qualifiedName(target) },
            "first month of partition, resetting table",
          );
          await this.db.dropTable(target);
          return await this.appendShared(unit, table, batchSize);
        case "append":
          return await this.appendShared(unit, table, batchSize);
      }
    } catch (err) {
      if (err instanceof TransientLoadError) throw err;
      throw new TransientLoadError(qualifiedName(target), describeError(err));
    }
  }

  private async loadExclusive(
    unit: UnitOfWork,
    table: CanonicalTable,
    batchSize: number,
  ): Promise<LoadResult> {
    const target = unit.target;
    const shadow: TableTarget = { schema: target.schema, name: `${target.name}__staging` };

    const inserted = await this.fillShadow(unit, shadow, table, batchSize);
    let tableRows = 0;
    await this.db.transaction(async (tx) => {
      await tx.execute(renameTableSql(shadow, target.name));
      tableRows = await countRows(tx, target);
    });

    this.logger.info(
      { unit: unit.key, table: qualifiedName(target), rows: inserted },
      "loaded table",
    );
    return { status: "done", rowsInserted: inserted, tableRows };
  }

  private async appendShared(
    unit: UnitOfWork,
    table: CanonicalTable,
    batchSize: number,
  ): Promise<LoadResult> {
    const target = unit.target;
    const mm = String(unit.month).padStart(2, "0");
    const shadow: TableTarget = { schema: target.schema, name: `${target.name}__m${mm}` };

    const inserted = await this.fillShadow(unit, shadow, table, batchSize);

    // The count runs before commit: once the append is committed, nothing may
    // fail and send the unit back to a retry that would append it again.
    let missing: ColumnSpec[] = [];
    let tableRows = 0;
    await this.db.transaction(async (tx) => {
      const existing = await this.db.tableColumns(target, tx);
      if (existing.length === 0) {
        await tx.execute(createTableSql(this.db, target, table.columns, true));
      } else {
        missing = table.columns.filter((c) => !existing.includes(c.name));
      }
      for (const column of missing) {
        await tx.execute(addColumnSql(this.db, target, column));
      }
      await tx.execute(appendSelectSql(target, shadow, table.columns));
      await this.db.dropTable(shadow, tx);
      tableRows = await countRows(tx, target);
    });

    if (missing.length > 0) {
      this.logger.warn(
        { unit: unit.key, table: qualifiedName(target), added: missing.map((c) => c.name) },
        "added columns to shared table",
      );
    }

    this.logger.info(
      { unit: unit.key, table: qualifiedName(target), rows: inserted, tableRows },
      "appended to table",
    );
    return { status: "done", rowsInserted: inserted, tableRows };
  }

  /** Recreate `shadow` and insert every row of `table` in batches. */
  private async fillShadow(
    unit: UnitOfWork,
    shadow: TableTarget,
    table: CanonicalTable,
    batchSize: number,
  ): Promise<number> {
    await this.db.dropTable(shadow);
    await this.db.execute(createTableSql(this.db, shadow, table.columns));

    let inserted = 0;
    for (let start = 0; start < table.rows.length; start += batchSize) {
      const batch = table.rows.slice(start, start + batchSize);
      inserted += await this.db.insertBatch(shadow, table.columns, batch);
      this.logger.debug(
        { unit: unit.key, table: qualifiedName(shadow), inserted, total: table.rows.length },
        "inserted batch",
      );
    }
    return inserted;
  }
}
