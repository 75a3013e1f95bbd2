/**
 * Configuration validation and backend factory.
 */
import { availableParallelism } from "node:os";
import type { Logger } from "pino";
import { z } from "zod";
import { ConfigError } from "./core/exceptions.js";
import { DEFAULT_SOURCE_URL } from "./core/unit.js";
import type { UnitOptions } from "./core/unit.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { DEFAULT_BATCH_SIZE } from "./stages/load.js";
import { DiskStorage } from "./storage/disk.js";
import type { StorageBackend } from "./storage/backend.js";
import { HttpTransport } from "./transport/http.js";
import type { Transport } from "./transport/transport.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

const RetryPolicySchema = (retries: number, delayMs: number) =>
  z
    .object({
      retries: z.number().int().min(0).max(10).default(retries),
      delayMs: z.number().int().min(0).default(delayMs),
      backoff: z.enum(["fixed", "linear"]).default("fixed"),
    })
    .default({});

const SchemaName = z
  .string()
  .regex(IDENTIFIER, "must be a plain SQL identifier")
  .default("staging");

const PostgresWarehouseSchema = z.object({
  provider: z.literal("postgres"),
  schema: SchemaName,
  config: z.object({
    host: z.string().min(1),
    port: z.number().int().positive().default(5432),
    username: z.string().min(1),
    password: z.string(),
    database: z.string().min(1),
  }),
});

const SqliteWarehouseSchema = z.object({
  provider: z.literal("sqlite"),
  schema: SchemaName,
  config: z.object({ path: z.string().min(1).default(":memory:") }).default({}),
});

export const ConfigSchema = z.object({
  dataDir: z.string().min(1).default("./data"),
  source: z.object({ baseUrl: z.string().url().default(DEFAULT_SOURCE_URL) }).default({}),
  artifactLayout: z.enum(["by-year", "flat"]).default("by-year"),
  partitioning: z.enum(["monthly", "yearly"]).default("monthly"),
  warehouse: z
    .discriminatedUnion("provider", [PostgresWarehouseSchema, SqliteWarehouseSchema])
    .default({ provider: "sqlite" }),
  load: z
    .object({ batchSize: z.number().int().positive().default(DEFAULT_BATCH_SIZE) })
    .default({}),
  workers: z
    .number()
    .int()
    .min(1)
    .max(64)
    .default(() => Math.min(4, availableParallelism())),
  retry: z
    .object({
      fetch: RetryPolicySchema(3, 1_000),
      load: RetryPolicySchema(3, 5_000),
    })
    .default({}),
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type IngestConfig = z.infer<typeof ConfigSchema>;

export function parseConfig(raw: unknown): IngestConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const detail = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// Environment
// ---------------------------------------------------------------------------

export type Env = Record<string, string | undefined>;

function num(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : Number.NaN;
}

function blank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Build the configuration from environment variables. `env` is passed in
 * explicitly; nothing here reads `process.env`.
 */
export function configFromEnv(env: Env): IngestConfig {
  const provider = blank(env.TRIP_WAREHOUSE) ?? "postgres";
  const retryDelay = num(env.TRIP_RETRY_DELAY_MS);

  const warehouse =
    provider === "sqlite"
      ? {
          provider,
          schema: blank(env.TRIP_SCHEMA),
          config: { path: blank(env.TRIP_SQLITE_PATH) },
        }
      : {
          provider,
          schema: blank(env.TRIP_SCHEMA),
          config: {
            host: env.PG_HOST,
            port: num(env.PG_PORT),
            username: env.PG_USERNAME,
            password: env.PG_PASSWORD,
            database: env.PG_DATABASE,
          },
        };

  return parseConfig({
    dataDir: blank(env.TRIP_DATA_DIR),
    source: { baseUrl: blank(env.TRIP_SOURCE_URL) },
    artifactLayout: blank(env.TRIP_ARTIFACT_LAYOUT),
    partitioning: blank(env.TRIP_PARTITIONING),
    warehouse,
    load: { batchSize: num(env.TRIP_BATCH_SIZE) },
    workers: num(env.TRIP_WORKERS),
    retry: {
      fetch: { retries: num(env.TRIP_FETCH_RETRIES), delayMs: retryDelay },
      load: { retries: num(env.TRIP_LOAD_RETRIES), delayMs: retryDelay },
    },
    logLevel: blank(env.LOG_LEVEL),
  });
}

// ---------------------------------------------------------------------------
// Top-level config → backends
// ---------------------------------------------------------------------------

export function unitOptions(config: IngestConfig): UnitOptions {
  return {
    baseUrl: config.source.baseUrl,
    schema: config.warehouse.schema,
    granularity: config.partitioning,
    layout: config.artifactLayout,
  };
}

export function buildDb(config: IngestConfig, logger?: Logger): DatabaseBackend {
  const wh = config.warehouse;
  switch (wh.provider) {
    case "sqlite":
      return new SQLiteBackend(wh.config.path);
    case "postgres":
      return new PostgresBackend({ ...wh.config, max: config.workers }, logger);
  }
}

export function buildBackends(
  config: IngestConfig,
  logger?: Logger,
): { storage: StorageBackend; db: DatabaseBackend; transport: Transport } {
  return {
    storage: new DiskStorage(config.dataDir),
    db: buildDb(config, logger),
    transport: new HttpTransport(),
  };
}
