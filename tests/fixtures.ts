/**
 * Shared test fixtures: synthetic trip files, an in-memory transport, a silent
 * logger and a pre-configured TripIngest.
 */
import { mkdtempSync, readFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { parquetWriteBuffer } from "hyparquet-writer";
import { pino } from "pino";
import type { Logger } from "pino";
import { z } from "zod";

import { parseConfig } from "../src/config.js";
import type { IngestConfig } from "../src/config.js";
import { TransientTransferError } from "../src/core/exceptions.js";
import type { UnitOptions } from "../src/core/unit.js";
import type { Service } from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { TripIngest } from "../src/index.js";
import { DiskStorage } from "../src/storage/disk.js";
import type { TransferSource, Transport } from "../src/transport/transport.js";

export const BASE_URL = "https://trips.test/trip-data";

export const UNIT_OPTIONS: UnitOptions = {
  baseUrl: BASE_URL,
  schema: "staging",
  granularity: "monthly",
  layout: "by-year",
};

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "trip-ingest-"));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}

// ---------------------------------------------------------------------------
// Synthetic trip files
// ---------------------------------------------------------------------------

const SourceColumns = z.record(
  z.array(
    z.object({
      name: z.string(),
      type: z.enum(["INT32", "TIMESTAMP", "DOUBLE", "STRING"]),
    }),
  ),
);

export const SOURCE_COLUMNS = SourceColumns.parse(
  JSON.parse(
    readFileSync(new URL("./fixtures/source-columns.json", import.meta.url), "utf-8"),
  ),
);

type SourceColumn = z.infer<typeof SourceColumns>[string][number];

function valueFor(column: SourceColumn, year: number, month: number, i: number): unknown {
  const pickup = Date.UTC(year, month - 1, 1 + (i % 28), i % 24, 0, 0);
  switch (column.name) {
    case "VendorID":
      return (i % 2) + 1;
    case "tpep_pickup_datetime":
    case "lpep_pickup_datetime":
      return new Date(pickup);
    case "tpep_dropoff_datetime":
    case "lpep_dropoff_datetime":
      return new Date(pickup + 15 * 60_000);
    case "passenger_count":
      return (i % 4) + 1;
    case "trip_distance":
      return 1.5 + i;
    case "PULocationID":
      return 100 + (i % 50);
    case "DOLocationID":
      return 200 + (i % 50);
    case "fare_amount":
      return 10 + i;
    case "total_amount":
      return 12 + i;
    case "store_and_fwd_flag":
      return "N";
  }
  switch (column.type) {
    case "INT32":
      return 1;
    case "DOUBLE":
      return 0.5;
    case "STRING":
      return "x";
    case "TIMESTAMP":
      return new Date(pickup);
  }
}

/**
 * Build a Parquet file shaped like a published trip file of `service`, with
 * `rows` trips in the given month.
 */
export function tripParquet(
  service: Service,
  year: number,
  month: number,
  rows: number,
  extra: SourceColumn[] = [],
): Uint8Array {
  const columns = [...(SOURCE_COLUMNS[service] ?? []), ...extra];
  const columnData = columns.map((column) => ({
    name: column.name,
    type: column.type,
    data: Array.from({ length: rows }, (_, i) => valueFor(column, year, month, i)),
  }));
  return new Uint8Array(parquetWriteBuffer({ columnData }));
}

export function sourceUrl(service: Service, year: number, month: number): string {
  return `${BASE_URL}/${service}_tripdata_${year}-${String(month).padStart(2, "0")}.parquet`;
}

// ---------------------------------------------------------------------------
// In-memory transport
// ---------------------------------------------------------------------------

export class FakeTransport implements Transport {
  readonly files = new Map<string, Uint8Array>();
  readonly failing = new Set<string>();
  /** Bytes served short of the advertised length, per URL. */
  readonly truncated = new Map<string, number>();
  calls: string[] = [];

  serve(url: string, bytes: Uint8Array): this {
    this.files.set(url, bytes);
    return this;
  }

  async open(url: string): Promise<TransferSource> {
    this.calls.push(url);
    if (this.failing.has(url)) {
      throw new TransientTransferError(url, "HTTP 503", 503);
    }
    const bytes = this.files.get(url);
    if (!bytes) {
      throw new TransientTransferError(url, "HTTP 404", 404);
    }
    const short = this.truncated.get(url) ?? 0;
    return {
      body: Readable.from([Buffer.from(bytes.subarray(0, bytes.length - short))]),
      length: bytes.length,
    };
  }
}

// ---------------------------------------------------------------------------
// Pre-configured application
// ---------------------------------------------------------------------------

export function testConfig(dataDir: string, overrides: Record<string, unknown> = {}): IngestConfig {
  return parseConfig({
    dataDir,
    source: { baseUrl: BASE_URL },
    warehouse: { provider: "sqlite", schema: "staging" },
    workers: 3,
    retry: {
      fetch: { retries: 1, delayMs: 0 },
      load: { retries: 1, delayMs: 0 },
    },
    logLevel: "silent",
    ...overrides,
  });
}

export function makeApp(
  dir: string,
  transport: FakeTransport,
  overrides: Record<string, unknown> = {},
): { app: TripIngest; db: SQLiteBackend; storage: DiskStorage } {
  const config = testConfig(dir, overrides);
  const db = new SQLiteBackend(":memory:");
  const storage = new DiskStorage(config.dataDir);
  const app = new TripIngest({ config, storage, db, transport, logger: silentLogger() });
  return { app, db, storage };
}
