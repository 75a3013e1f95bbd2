/**
 * SQLite warehouse backend using better-sqlite3.
 *
 * Schemas are attached databases: `:memory:` for an in-memory warehouse,
 * otherwise `<path>.<schema>.db` beside the main file. There is one connection,
 * so every operation is queued behind the previous one and a transaction holds
 * the queue until it commits.
 */
import Database from "better-sqlite3";
import type { CellValue, ColumnSpec, ColumnType, TableTarget } from "../core/types.js";
import type { DatabaseBackend, SqlExecutor, SqlRow } from "./backend.js";
import { columnList, quoteIdent, quoteTarget } from "./sql.js";

type SqliteValue = string | number | bigint | null;

function toSqlite(value: CellValue): SqliteValue {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "boolean") return value ? 1 : 0;
  return value;
}

function isRow(value: unknown): value is SqlRow {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class SQLiteBackend implements DatabaseBackend {
  readonly dialect = "sqlite" as const;
  private db: Database.Database;
  private path: string;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(path: string = ":memory:") {
    this.path = path;
    this.db = new Database(path);
    if (path !== ":memory:") this.db.pragma("journal_mode = WAL");
  }

  /** Run `fn` once every previously queued operation has settled. */
  private exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    // Failures reach the caller through `run`; the queue only needs ordering.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private executeNow(sql: string): void {
    this.db.exec(sql);
  }

  private queryNow(sql: string): SqlRow[] {
    return this.db.prepare(sql).all().filter(isRow);
  }

  async execute(sql: string): Promise<void> {
    await this.exclusive(() => this.executeNow(sql));
  }

  async query(sql: string): Promise<SqlRow[]> {
    return this.exclusive(() => this.queryNow(sql));
  }

  async ensureSchema(schema: string): Promise<void> {
    await this.exclusive(() => {
      const attached = this.queryNow("PRAGMA database_list").some(
        (r) => r.name === schema,
      );
      if (attached) return;
      const file = this.path === ":memory:" ? ":memory:" : `${this.path}.${schema}.db`;
      this.db.prepare(`ATTACH DATABASE ? AS ${quoteIdent(schema)}`).run(file);
    });
  }

  async tableExists(target: TableTarget): Promise<boolean> {
    return this.exclusive(() => {
      const row = this.db
        .prepare(
          `SELECT name FROM ${quoteIdent(target.schema)}.sqlite_master WHERE type = 'table' AND name = ?`,
        )
        .get(target.name);
      return row !== undefined;
    });
  }

  async tableColumns(target: TableTarget, executor?: SqlExecutor): Promise<string[]> {
    const sql = `PRAGMA ${quoteIdent(target.schema)}.table_info(${quoteIdent(target.name)})`;
    const rows = await (executor ?? this).query(sql);
    return rows.map((r) => String(r.name));
  }

  async dropTable(target: TableTarget, executor?: SqlExecutor): Promise<void> {
    const sql = `DROP TABLE IF EXISTS ${quoteTarget(target)}`;
    if (executor) {
      await executor.execute(sql);
      return;
    }
    await this.execute(sql);
  }

  sqlType(type: ColumnType): string {
    switch (type) {
      case "integer":
      case "boolean":
        return "INTEGER";
      case "float":
        return "REAL";
      case "timestamp":
      case "text":
        return "TEXT";
    }
  }

  async insertBatch(
    target: TableTarget,
    columns: ColumnSpec[],
    rows: CellValue[][],
  ): Promise<number> {
    if (rows.length === 0 || columns.length === 0) return 0;
    return this.exclusive(() => {
      const slots = columns.map(() => "?").join(", ");
      const stmt = this.db.prepare(
        `INSERT INTO ${quoteTarget(target)} (${columnList(columns)}) VALUES (${slots})`,
      );
      const insertAll = this.db.transaction((batch: CellValue[][]) => {
        for (const row of batch) {
          stmt.run(columns.map((_, i) => toSqlite(row[i] ?? null)));
        }
      });
      insertAll(rows);
      return rows.length;
    });
  }

  async transaction(fn: (tx: SqlExecutor) => Promise<void>): Promise<void> {
    const tx: SqlExecutor = {
      execute: async (sql) => this.executeNow(sql),
      query: async (sql) => this.queryNow(sql),
    };
    await this.exclusive(async () => {
      this.db.exec("BEGIN");
      try {
        await fn(tx);
        this.db.exec("COMMIT");
      } catch (err) {
        this.db.exec("ROLLBACK");
        throw err;
      }
    });
  }

  async close(): Promise<void> {
    await this.exclusive(() => {
      this.db.close();
    });
  }
}
