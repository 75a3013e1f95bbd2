/**
 * Unit tests for configuration parsing.
 */
import { describe, test, expect } from "vitest";
import { configFromEnv, parseConfig, unitOptions } from "../src/config.js";
import { ConfigError } from "../src/core/exceptions.js";
import { DEFAULT_SOURCE_URL } from "../src/core/unit.js";

describe("parseConfig", () => {
  test("defaults", () => {
    const config = parseConfig({ workers: 2 });
    expect(config.dataDir).toBe("./data");
    expect(config.source.baseUrl).toBe(DEFAULT_SOURCE_URL);
    expect(config.artifactLayout).toBe("by-year");
    expect(config.partitioning).toBe("monthly");
    expect(config.warehouse).toEqual({
      provider: "sqlite",
      schema: "staging",
      config: { path: ":memory:" },
    });
    expect(config.load.batchSize).toBe(10_000);
    expect(config.retry).toEqual({
      fetch: { retries: 3, delayMs: 1_000, backoff: "fixed" },
      load: { retries: 3, delayMs: 5_000, backoff: "fixed" },
    });
    expect(config.logLevel).toBe("info");
  });

  test("default worker count is bounded", () => {
    const { workers } = parseConfig({});
    expect(workers).toBeGreaterThanOrEqual(1);
    expect(workers).toBeLessThanOrEqual(4);
  });

  test("rejects a schema that is not an identifier", () => {
    expect(() =>
      parseConfig({ warehouse: { provider: "sqlite", schema: "staging; drop" } }),
    ).toThrow(ConfigError);
  });

  test("rejects unknown partitioning", () => {
    expect(() => parseConfig({ partitioning: "weekly" })).toThrow(/partitioning/);
  });

  test("unitOptions", () => {
    const config = parseConfig({ partitioning: "yearly", artifactLayout: "flat" });
    expect(unitOptions(config)).toEqual({
      baseUrl: DEFAULT_SOURCE_URL,
      schema: "staging",
      granularity: "yearly",
      layout: "flat",
    });
  });
});

describe("configFromEnv", () => {
  test("postgres from PG_* variables", () => {
    const config = configFromEnv({
      PG_HOST: "localhost",
      PG_PORT: "5433",
      PG_USERNAME: "etl",
      PG_PASSWORD: "test-secret",
      PG_DATABASE: "trips",
      TRIP_SCHEMA: "raw",
      TRIP_WORKERS: "2",
      TRIP_BATCH_SIZE: "500",
      TRIP_LOAD_RETRIES: "5",
      TRIP_RETRY_DELAY_MS: "10",
    });
    expect(config.warehouse).toEqual({
      provider: "postgres",
      schema: "raw",
      config: {
        host: "localhost",
        port: 5433,
        username: "etl",
        password: "test-secret",
        database: "trips",
      },
    });
    expect(config.workers).toBe(2);
    expect(config.load.batchSize).toBe(500);
    expect(config.retry.load).toEqual({ retries: 5, delayMs: 10, backoff: "fixed" });
    expect(config.retry.fetch).toEqual({ retries: 3, delayMs: 10, backoff: "fixed" });
  });

  test("postgres without a host is a config error", () => {
    expect(() => configFromEnv({ PG_USERNAME: "etl", PG_DATABASE: "trips" })).toThrow(
      ConfigError,
    );
  });

  test("sqlite", () => {
    const config = configFromEnv({
      TRIP_WAREHOUSE: "sqlite",
      TRIP_SQLITE_PATH: "/tmp/trips.db",
      TRIP_PARTITIONING: "yearly",
      TRIP_WORKERS: "",
    });
    expect(config.warehouse).toEqual({
      provider: "sqlite",
      schema: "staging",
      config: { path: "/tmp/trips.db" },
    });
    expect(config.partitioning).toBe("yearly");
  });

  test("non-numeric values are rejected", () => {
    expect(() => configFromEnv({ TRIP_WAREHOUSE: "sqlite", TRIP_WORKERS: "many" })).toThrow(
      /workers/,
    );
  });
});
