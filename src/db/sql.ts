/**
 * Engine-neutral SQL builders. PostgreSQL and SQLite agree on double-quoted
 * identifiers, `schema.table` qualification and the statements used here.
 */
import type { ColumnSpec, TableTarget } from "../core/types.js";
import type { DatabaseBackend, SqlExecutor } from "./backend.js";

export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function quoteTarget(target: TableTarget): string {
  return `${quoteIdent(target.schema)}.${quoteIdent(target.name)}`;
}

export function columnList(columns: ReadonlyArray<{ name: string }>): string {
  return columns.map((c) => quoteIdent(c.name)).join(", ");
}

export function createTableSql(
  db: DatabaseBackend,
  target: TableTarget,
  columns: ColumnSpec[],
  ifNotExists = false,
): string {
  const defs = columns
    .map((c) => `${quoteIdent(c.name)} ${db.sqlType(c.type)}`)
    .join(", ");
  return `CREATE TABLE ${ifNotExists ? "IF NOT EXISTS " : ""}${quoteTarget(target)} (${defs})`;
}

export function renameTableSql(from: TableTarget, toName: string): string {
  return `ALTER TABLE ${quoteTarget(from)} RENAME TO ${quoteIdent(toName)}`;
}

export function addColumnSql(
  db: DatabaseBackend,
  target: TableTarget,
  column: ColumnSpec,
): string {
  return `ALTER TABLE ${quoteTarget(target)} ADD COLUMN ${quoteIdent(column.name)} ${db.sqlType(column.type)}`;
}

export function appendSelectSql(
  target: TableTarget,
  source: TableTarget,
  columns: ColumnSpec[],
): string {
  const cols = columnList(columns);
  return `INSERT INTO ${quoteTarget(target)} (${cols}) SELECT ${cols} FROM ${quoteTarget(source)}`;
}

export async function countRows(
  executor: SqlExecutor,
  target: TableTarget,
): Promise<number> {
  const rows = await executor.query(
    `SELECT COUNT(*) AS n FROM ${quoteTarget(target)}`,
  );
  return Number(rows[0]?.n ?? 0);
}
