/**
 * Unit tests for the transform stage.
 */
import { join } from "node:path";
import { describe, test, expect } from "vitest";
import { SchemaDriftError } from "../src/core/exceptions.js";
import { decodeCanonical } from "../src/core/parquet.js";
import { describeUnit } from "../src/core/unit.js";
import { TransformStage } from "../src/stages/transform.js";
import { DiskStorage } from "../src/storage/disk.js";
import { UNIT_OPTIONS, makeTmpDir, silentLogger, tripParquet } from "./fixtures.js";

function setup() {
  const storage = new DiskStorage(join(makeTmpDir(), "data"));
  const stage = new TransformStage(storage, silentLogger());
  const unit = describeUnit("green", 2020, 5, UNIT_OPTIONS);
  return { storage, stage, unit };
}

describe("TransformStage", () => {
  test("replaces the raw artifact with a canonical one", async () => {
    const { storage, stage, unit } = setup();
    await storage.write(unit.artifactKey, tripParquet("green", 2020, 5, 20));

    const result = await stage.transform(unit);

    expect(result.status).toBe("done");
    expect(result.table.rows).toHaveLength(20);
    expect(result.table.columns.map((c) => c.name).slice(0, 3)).toEqual([
      "vendorid",
      "pickup_datetime",
      "dropoff_datetime",
    ]);
    expect(await storage.exists(unit.artifactKey)).toBe(false);
    expect(await storage.exists(unit.canonicalKey)).toBe(true);
    expect(await storage.exists(`${unit.canonicalKey}.tmp`)).toBe(false);

    const stored = await decodeCanonical(await storage.read(unit.canonicalKey));
    expect(stored.columns).toEqual(result.table.columns);
    expect(stored.rows).toHaveLength(20);
  });

  test("second call reuses the canonical artifact", async () => {
    const { storage, stage, unit } = setup();
    await storage.write(unit.artifactKey, tripParquet("green", 2020, 5, 4));

    const first = await stage.transform(unit);
    const second = await stage.transform(unit);

    expect(second.status).toBe("skipped");
    expect(second.table).toEqual(first.table);
  });

  test("stray raw artifact beside a canonical one is removed", async () => {
    const { storage, stage, unit } = setup();
    const raw = tripParquet("green", 2020, 5, 4);
    await storage.write(unit.artifactKey, raw);
    await stage.transform(unit);
    await storage.write(unit.artifactKey, raw);

    const result = await stage.transform(unit);

    expect(result.status).toBe("skipped");
    expect(await storage.exists(unit.artifactKey)).toBe(false);
  });

  test("drifted schema fails and keeps the raw artifact", async () => {
    const { storage, stage, unit } = setup();
    await storage.write(
      unit.artifactKey,
      tripParquet("green", 2020, 5, 2, [{ name: "pickup_datetime", type: "TIMESTAMP" }]),
    );

    await expect(stage.transform(unit)).rejects.toThrow(SchemaDriftError);
    expect(await storage.exists(unit.artifactKey)).toBe(true);
    expect(await storage.exists(unit.canonicalKey)).toBe(false);
  });

  test("missing artifact", async () => {
    const { stage, unit } = setup();
    await expect(stage.transform(unit)).rejects.toThrow(/no artifact/);
  });
});
