/**
 * Abstract warehouse backend interface.
 *
 * All implementations use raw SQL — no ORM. Statements built outside a backend
 * take no parameters; parameterized statements stay inside the backend because
 * placeholder syntax differs per engine.
 */
import type { CellValue, ColumnSpec, ColumnType, TableTarget } from "../core/types.js";

export type SqlRow = Record<string, unknown>;

/** Something that runs statements: the backend itself or an open transaction. */
export interface SqlExecutor {
  /** Execute a statement without parameters (DDL, INSERT ... SELECT). */
  execute(sql: string): Promise<void>;

  /** Run a SELECT without parameters and return all rows. */
  query(sql: string): Promise<SqlRow[]>;
}

export interface DatabaseBackend extends SqlExecutor {
  readonly dialect: "postgres" | "sqlite";

  /** `CREATE SCHEMA IF NOT EXISTS`, or the engine's equivalent. */
  ensureSchema(schema: string): Promise<void>;

  tableExists(target: TableTarget): Promise<boolean>;

  /** Column names in table order, empty when the table does not exist. */
  tableColumns(target: TableTarget, executor?: SqlExecutor): Promise<string[]>;

  /** `DROP TABLE IF EXISTS`, cascading to dependent views where supported. */
  dropTable(target: TableTarget, executor?: SqlExecutor): Promise<void>;

  /** SQL type used for a canonical column type. */
  sqlType(type: ColumnType): string;

  /** Insert rows in one transaction; returns the number of rows inserted. */
  insertBatch(
    target: TableTarget,
    columns: ColumnSpec[],
    rows: CellValue[][],
  ): Promise<number>;

  /** Execute `fn` inside a transaction on a dedicated connection. */
  transaction(fn: (tx: SqlExecutor) => Promise<void>): Promise<void>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
