#!/usr/bin/env node
/**
 * CLI entrypoint for trip-ingest.
 *
 * Usage:
 *   trip-ingest --year 2020
 *   trip-ingest --year 2019 --year 2020 --service green --granularity yearly
 *   trip-ingest --local-only --year 2020
 */
import { config as loadEnv } from "dotenv";
import { parseArgs } from "node:util";
import {
  TripIngest,
  UnsupportedServiceError,
  configFromEnv,
  describeError,
} from "./index.js";
import type { Env, RunSummary, Service } from "./index.js";
import { isService } from "./core/unit.js";

const USAGE = `
trip-ingest — load monthly taxi trip files into a warehouse

Usage:
  trip-ingest --year <yyyy> [--year <yyyy> ...] [options]
  trip-ingest --local-only [--year <yyyy> ...] [options]

Options:
  --year <yyyy>          Year to ingest (repeatable, or comma-separated)
  --service <name>       yellow | green (repeatable; default: both)
  --month <m>            Month 1-12 (repeatable; default: all)
  --granularity <g>      monthly | yearly tables   (env TRIP_PARTITIONING)
  --workers <n>          Concurrent units          (env TRIP_WORKERS)
  --data-dir <dir>       Artifact directory        (env TRIP_DATA_DIR)
  --schema <name>        Warehouse schema          (env TRIP_SCHEMA)
  --batch-size <n>       Rows per insert batch     (env TRIP_BATCH_SIZE)
  --sqlite <file>        Load into SQLite instead of PostgreSQL
  --reset                Drop the run's tables before loading
  --local-only           Load artifacts already on disk, no downloads
  --help                 Show this help
`.trim();

function list(values: string[] | undefined): string[] {
  return (values ?? []).flatMap((v) => v.split(",")).map((v) => v.trim()).filter(Boolean);
}

function integers(values: string[] | undefined, flag: string): number[] {
  return list(values).map((v) => {
    const n = Number(v);
    if (!Number.isInteger(n)) throw new Error(`--${flag} expects integers, got "${v}"`);
    return n;
  });
}

function services(values: string[] | undefined): Service[] {
  return list(values).map((v) => {
    if (!isService(v)) throw new UnsupportedServiceError(v);
    return v;
  });
}

function printSummary(summary: RunSummary): void {
  for (const o of summary.outcomes) {
    switch (o.status) {
      case "loaded":
        console.log(`  ${o.unit}  loaded ${o.rowsInserted} rows into ${o.table}`);
        break;
      case "skipped":
        console.log(`  ${o.unit}  skipped (${o.reason})`);
        break;
      case "failed":
        console.log(`  ${o.unit}  FAILED at ${o.stage} after ${o.attempts} attempt(s): ${o.error}`);
        break;
    }
  }
  console.log(
    `\n${summary.units} units: ${summary.loaded} loaded, ${summary.skipped} skipped, ` +
      `${summary.failed} failed; ${summary.rowsLoaded} rows loaded`,
  );
  if (summary.retryable.length > summary.failed) {
    console.log(
      "Month 1 of a yearly table failed; re-running it resets the table, " +
        "so the months loaded into that table are listed too.",
    );
  }
  if (summary.retryable.length > 0) {
    console.log(`Re-run to retry: ${summary.retryable.join(" ")}`);
  }
}

async function main(argv: string[]): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      year: { type: "string", multiple: true },
      service: { type: "string", multiple: true },
      month: { type: "string", multiple: true },
      granularity: { type: "string" },
      workers: { type: "string" },
      "data-dir": { type: "string" },
      schema: { type: "string" },
      "batch-size": { type: "string" },
      sqlite: { type: "string" },
      reset: { type: "boolean", default: false },
      "local-only": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const years = integers(values.year, "year");
  if (years.length === 0 && !values["local-only"]) {
    console.error(USAGE);
    return 1;
  }

  loadEnv();
  const env: Env = {
    ...process.env,
    TRIP_PARTITIONING: values.granularity ?? process.env.TRIP_PARTITIONING,
    TRIP_WORKERS: values.workers ?? process.env.TRIP_WORKERS,
    TRIP_DATA_DIR: values["data-dir"] ?? process.env.TRIP_DATA_DIR,
    TRIP_SCHEMA: values.schema ?? process.env.TRIP_SCHEMA,
    TRIP_BATCH_SIZE: values["batch-size"] ?? process.env.TRIP_BATCH_SIZE,
  };
  if (values.sqlite) {
    env.TRIP_WAREHOUSE = "sqlite";
    env.TRIP_SQLITE_PATH = values.sqlite;
  }

  const app = TripIngest.fromConfig(configFromEnv(env));
  try {
    const options = { reset: values.reset };
    const summary = values["local-only"]
      ? await app.ingestFromArtifacts({ years, services: services(values.service) }, options)
      : await app.ingest(
          { years, services: services(values.service), months: integers(values.month, "month") },
          options,
        );
    printSummary(summary);
    return summary.failed === 0 ? 0 : 1;
  } finally {
    await app.close();
  }
}

try {
  process.exitCode = await main(process.argv.slice(2));
} catch (err) {
  console.error(`trip-ingest: ${describeError(err)}`);
  process.exitCode = 1;
}
