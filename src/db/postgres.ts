/**
 * PostgreSQL warehouse backend using postgres-js.
 *
 * The client is a pool: concurrent units each get their own connection, and
 * every transaction runs on a dedicated one.
 */
import postgres from "postgres";
import type { Logger } from "pino";
import type { CellValue, ColumnSpec, ColumnType, TableTarget } from "../core/types.js";
import type { DatabaseBackend, SqlExecutor, SqlRow } from "./backend.js";
import { columnList, quoteIdent, quoteLiteral, quoteTarget } from "./sql.js";

/** Bind-parameter ceiling of the wire protocol. */
const MAX_PARAMETERS = 65_535;

export interface PostgresConnection {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  /** Pool size. */
  max?: number;
}

type Param = string | number | boolean | Date | null;

/** The driver does not serialize bigint; PostgreSQL casts the text form. */
function toParam(value: CellValue): Param {
  return typeof value === "bigint" ? value.toString() : value;
}

class PostgresExecutor implements SqlExecutor {
  constructor(private readonly sql: postgres.Sql | postgres.TransactionSql) {}

  async execute(sql: string): Promise<void> {
    await this.sql.unsafe(sql);
  }

  async query(sql: string): Promise<SqlRow[]> {
    const rows = await this.sql.unsafe(sql);
    return [...rows];
  }
}

/**
 * Client options for `connection`. Dates are sent as timestamptz and cast into
 * TIMESTAMP columns in the session time zone, so the session runs in UTC.
 */
export function clientOptions(connection: PostgresConnection, logger?: Logger): postgres.Options<{}> {
  return {
    host: connection.host,
    port: connection.port,
    username: connection.username,
    password: connection.password,
    database: connection.database,
    max: connection.max ?? 4,
    connection: { TimeZone: "UTC" },
    onnotice: (notice) => logger?.debug({ notice: notice.message }, "postgres notice"),
  };
}

export class PostgresBackend implements DatabaseBackend {
  readonly dialect = "postgres" as const;
  private sql: postgres.Sql;
  private executor: PostgresExecutor;

  constructor(connection: PostgresConnection, logger?: Logger) {
    this.sql = postgres(clientOptions(connection, logger));
    this.executor = new PostgresExecutor(this.sql);
  }

  async execute(sql: string): Promise<void> {
    await this.executor.execute(sql);
  }

  async query(sql: string): Promise<SqlRow[]> {
    return this.executor.query(sql);
  }

  async ensureSchema(schema: string): Promise<void> {
    await this.sql.unsafe(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)}`);
  }

  async tableExists(target: TableTarget): Promise<boolean> {
    const rows = await this.sql.unsafe(
      `SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`,
      [target.schema, target.name],
    );
    return rows.length > 0;
  }

  async tableColumns(target: TableTarget, executor?: SqlExecutor): Promise<string[]> {
    const rows = await (executor ?? this.executor).query(
      `SELECT column_name FROM information_schema.columns
       WHERE table_schema = ${quoteLiteral(target.schema)}
         AND table_name = ${quoteLiteral(target.name)}
       ORDER BY ordinal_position`,
    );
    return rows.map((r) => String(r.column_name));
  }

  async dropTable(target: TableTarget, executor?: SqlExecutor): Promise<void> {
    await (executor ?? this.executor).execute(
      `DROP TABLE IF EXISTS ${quoteTarget(target)} CASCADE`,
    );
  }

  sqlType(type: ColumnType): string {
    switch (type) {
      case "integer":
        return "BIGINT";
      case "float":
        return "DOUBLE PRECISION";
      case "timestamp":
        return "TIMESTAMP";
      case "boolean":
        return "BOOLEAN";
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

    const perStatement = Math.max(1, Math.floor(MAX_PARAMETERS / columns.length));
    const head = `INSERT INTO ${quoteTarget(target)} (${columnList(columns)}) VALUES `;

    await this.sql.begin(async (tx) => {
      for (let start = 0; start < rows.length; start += perStatement) {
        const chunk = rows.slice(start, start + perStatement);
        const params: Param[] = [];
        const tuples = chunk.map((row) => {
          const slots = columns.map((_, i) => {
            params.push(toParam(row[i] ?? null));
            return `$${params.length}`;
          });
          return `(${slots.join(", ")})`;
        });
        await tx.unsafe(head + tuples.join(", "), params);
      }
    });

    return rows.length;
  }

  async transaction(fn: (tx: SqlExecutor) => Promise<void>): Promise<void> {
    await this.sql.begin(async (tx) => {
      await fn(new PostgresExecutor(tx));
    });
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
