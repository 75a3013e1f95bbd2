/**
 * Unit tests for request expansion and artifact discovery.
 */
import { describe, test, expect } from "vitest";
import { join } from "node:path";
import { InvalidUnitError } from "../src/core/exceptions.js";
import { discoverUnits, expandRequest } from "../src/core/planner.js";
import { DiskStorage } from "../src/storage/disk.js";
import { UNIT_OPTIONS, makeTmpDir } from "./fixtures.js";

describe("expandRequest", () => {
  test("defaults to every service and month", () => {
    const units = expandRequest({ years: [2020] }, UNIT_OPTIONS);
    expect(units).toHaveLength(24);
    expect(units.slice(0, 3).map((u) => u.key)).toEqual([
      "yellow:2020-01",
      "green:2020-01",
      "yellow:2020-02",
    ]);
  });

  test("orders by year, month, service and drops duplicates", () => {
    const units = expandRequest(
      { years: [2021, 2020, 2021], services: ["green", "yellow"], months: [2, 1, 2] },
      UNIT_OPTIONS,
    );
    expect(units.map((u) => u.key)).toEqual([
      "green:2020-01",
      "yellow:2020-01",
      "green:2020-02",
      "yellow:2020-02",
      "green:2021-01",
      "yellow:2021-01",
      "green:2021-02",
      "yellow:2021-02",
    ]);
  });

  test("requires a year", () => {
    expect(() => expandRequest({ years: [] }, UNIT_OPTIONS)).toThrow(InvalidUnitError);
  });

  test("rejects an invalid month", () => {
    expect(() => expandRequest({ years: [2020], months: [13] }, UNIT_OPTIONS)).toThrow(
      InvalidUnitError,
    );
  });
});

describe("discoverUnits", () => {
  test("finds raw and canonical artifacts in the configured layout", async () => {
    const storage = new DiskStorage(join(makeTmpDir(), "data"));
    await storage.write("yellow/2020/yellow_tripdata_2020-02.parquet.gz", "c");
    await storage.write("yellow/2020/yellow_tripdata_2020-01.parquet", "r");
    await storage.write("green/2021/green_tripdata_2021-03.parquet.gz", "c");
    await storage.write("green/2021/green_tripdata_2021-03.parquet", "r");
    await storage.write("yellow/yellow_tripdata_2019-05.parquet", "flat layout");
    await storage.write("yellow/2020/yellow_tripdata_2020-04.parquet.part", "partial");
    await storage.write("yellow/2020/notes.txt", "x");

    const units = await discoverUnits(storage, {}, UNIT_OPTIONS);
    expect(units.map((u) => u.key)).toEqual([
      "yellow:2020-01",
      "yellow:2020-02",
      "green:2021-03",
    ]);
  });

  test("filters by service and year", async () => {
    const storage = new DiskStorage(join(makeTmpDir(), "data"));
    await storage.write("yellow/2020/yellow_tripdata_2020-01.parquet.gz", "c");
    await storage.write("yellow/2021/yellow_tripdata_2021-01.parquet.gz", "c");
    await storage.write("green/2020/green_tripdata_2020-01.parquet.gz", "c");

    const units = await discoverUnits(storage, { services: ["yellow"], years: [2021] }, UNIT_OPTIONS);
    expect(units.map((u) => u.key)).toEqual(["yellow:2021-01"]);
  });
});
