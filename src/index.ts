/**
 * trip-ingest – incremental ETL of monthly taxi trip files into a warehouse.
 */
import type { Logger } from "pino";

import { buildBackends, unitOptions } from "./config.js";
import type { IngestConfig } from "./config.js";
import { loadPolicyFor } from "./core/naming.js";
import { BatchOrchestrator } from "./core/orchestrator.js";
import { discoverUnits } from "./core/planner.js";
import type { DiscoverFilter } from "./core/planner.js";
import type { IngestRequest, RunOptions, RunSummary } from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { createLogger } from "./logger.js";
import type { StorageBackend } from "./storage/backend.js";
import type { Transport } from "./transport/transport.js";

export { configFromEnv, parseConfig } from "./config.js";
export type { Env, IngestConfig } from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export { SERVICES } from "./core/types.js";
export { describeUnit, DEFAULT_SOURCE_URL } from "./core/unit.js";
export { tableNameFor, artifactFileName } from "./core/naming.js";
export { expandRequest, discoverUnits } from "./core/planner.js";
export { withRetry } from "./core/retry.js";
export type { RetryPolicy } from "./core/retry.js";
export { BatchOrchestrator } from "./core/orchestrator.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { PostgresBackend } from "./db/postgres.js";
export { DiskStorage } from "./storage/disk.js";
export { HttpTransport } from "./transport/http.js";
export { createLogger } from "./logger.js";

export class TripIngest {
  private config: IngestConfig;
  private storage: StorageBackend;
  private db: DatabaseBackend;
  private orchestrator: BatchOrchestrator;
  private logger: Logger;

  constructor(opts: {
    config: IngestConfig;
    storage: StorageBackend;
    db: DatabaseBackend;
    transport: Transport;
    logger?: Logger;
  }) {
    this.config = opts.config;
    this.storage = opts.storage;
    this.db = opts.db;
    this.logger = opts.logger ?? createLogger(opts.config.logLevel);
    this.orchestrator = new BatchOrchestrator({
      storage: opts.storage,
      db: opts.db,
      transport: opts.transport,
      logger: this.logger,
      units: unitOptions(opts.config),
      workers: opts.config.workers,
      pipeline: {
        policy: loadPolicyFor(opts.config.partitioning),
        batchSize: opts.config.load.batchSize,
        retry: opts.config.retry,
      },
    });
  }

  /** Construct with the disk store, HTTP transport and configured warehouse. */
  static fromConfig(config: IngestConfig, logger?: Logger): TripIngest {
    const log = logger ?? createLogger(config.logLevel);
    const backends = buildBackends(config, log);
    return new TripIngest({ config, ...backends, logger: log });
  }

  /** Fetch, transform and load every unit named by `request`. */
  async ingest(request: IngestRequest, options: RunOptions = {}): Promise<RunSummary> {
    return this.orchestrator.run(request, options);
  }

  /** Load whatever artifacts are already in the data directory, offline. */
  async ingestFromArtifacts(
    filter: DiscoverFilter = {},
    options: RunOptions = {},
  ): Promise<RunSummary> {
    const units = await discoverUnits(this.storage, filter, unitOptions(this.config));
    this.logger.info({ units: units.length }, "discovered local artifacts");
    return this.orchestrator.runUnits(units, options);
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
