/**
 * Per-unit pipeline runner: fetch → transform → load, strictly in order.
 */
import type { Logger } from "pino";
import type { FetchStage } from "../stages/fetch.js";
import type { LoadStage } from "../stages/load.js";
import type { TransformStage } from "../stages/transform.js";
import {
  FetchFailedException,
  LoadFailedException,
  StageFailedException,
  TransformFailedException,
  describeError,
} from "./exceptions.js";
import type { UnitLedger } from "./ledger.js";
import { RetryExhaustedError, withRetry } from "./retry.js";
import type { RetryHooks, RetryPolicy } from "./retry.js";
import type {
  CanonicalTable,
  FetchResult,
  LoadPolicy,
  LoadResult,
  StageName,
  TransformResult,
  UnitOfWork,
  UnitOutcome,
} from "./types.js";

export interface PipelineSettings {
  policy: LoadPolicy;
  batchSize: number;
  retry: { fetch: RetryPolicy; load: RetryPolicy };
  /** Injected delay, for tests. */
  sleep?: (ms: number) => Promise<void>;
}

export class ETLPipeline {
  private fetchStage: FetchStage;
  private transformStage: TransformStage;
  private loadStage: LoadStage;
  private ledger: UnitLedger;
  private settings: PipelineSettings;
  private logger: Logger;

  constructor(opts: {
    fetch: FetchStage;
    transform: TransformStage;
    load: LoadStage;
    ledger: UnitLedger;
    settings: PipelineSettings;
    logger: Logger;
  }) {
    this.fetchStage = opts.fetch;
    this.transformStage = opts.transform;
    this.loadStage = opts.load;
    this.ledger = opts.ledger;
    this.settings = opts.settings;
    this.logger = opts.logger;
  }

  private retryHooks(unit: UnitOfWork, stage: StageName): RetryHooks {
    return {
      sleep: this.settings.sleep,
      onRetry: (err, attempt, delayMs) =>
        this.logger.warn(
          { unit: unit.key, stage, attempt, delayMs, err: describeError(err) },
          "stage failed, retrying",
        ),
    };
  }

  /** Step 1: make the raw artifact exist locally. */
  async fetch(unit: UnitOfWork): Promise<FetchResult> {
    try {
      return await withRetry(
        () => this.fetchStage.fetch(unit),
        this.settings.retry.fetch,
        this.retryHooks(unit, "fetch"),
      );
    } catch (err) {
      const { attempts, cause } = unwrap(err);
      throw new FetchFailedException(unit.key, attempts, cause);
    }
  }

  /** Step 2: produce the canonical table. Not retried. */
  async transform(unit: UnitOfWork): Promise<TransformResult> {
    try {
      return await this.transformStage.transform(unit);
    } catch (err) {
      throw new TransformFailedException(unit.key, 1, err);
    }
  }

  /** Step 3: load the canonical rows into the unit's table. */
  async load(
    unit: UnitOfWork,
    table: CanonicalTable,
    reset: boolean,
  ): Promise<LoadResult> {
    try {
      return await withRetry(
        () =>
          this.loadStage.load(unit, table, {
            policy: this.settings.policy,
            batchSize: this.settings.batchSize,
            reset,
          }),
        this.settings.retry.load,
        this.retryHooks(unit, "load"),
      );
    } catch (err) {
      const { attempts, cause } = unwrap(err);
      throw new LoadFailedException(unit.key, attempts, cause);
    }
  }

  /**
   * Run the full pipeline for one unit and record every stage in the ledger.
   * Stage failures become a `failed` outcome; they are not rethrown.
   */
  async run(unit: UnitOfWork, opts: { reset?: boolean } = {}): Promise<UnitOutcome> {
    this.ledger.begin(unit);
    try {
      const fetched = await this.fetch(unit);
      this.ledger.mark(unit, "fetch", fetched.status);

      const transformed = await this.transform(unit);
      this.ledger.mark(unit, "transform", transformed.status);

      const loaded = await this.load(unit, transformed.table, opts.reset ?? true);
      if (loaded.status === "skipped") {
        this.ledger.mark(unit, "load", "skipped", { skipReason: loaded.reason });
      } else {
        this.ledger.mark(unit, "load", "done", {
          rowsInserted: loaded.rowsInserted,
          tableRows: loaded.tableRows,
        });
      }
    } catch (err) {
      if (!(err instanceof StageFailedException)) throw err;
      this.ledger.mark(unit, err.stage, "failed", {
        attempts: err.attempts,
        error: err.message,
      });
      this.logger.error({ unit: unit.key, stage: err.stage, err: err.message }, "unit failed");
    }
    return this.ledger.outcome(unit);
  }
}

function unwrap(err: unknown): { attempts: number; cause: unknown } {
  if (err instanceof RetryExhaustedError) {
    return { attempts: err.attempts, cause: err.cause };
  }
  return { attempts: 1, cause: err };
}
