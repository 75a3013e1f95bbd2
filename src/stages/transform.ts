/**
 * Transform stage: raw artifact → canonical artifact.
 */
import type { Logger } from "pino";
import { renameColumns } from "../core/columns.js";
import { decideTransform } from "../core/ledger.js";
import { decodeCanonical, encodeCanonical, readParquet } from "../core/parquet.js";
import type { TransformResult, UnitOfWork } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import { artifactState } from "./artifacts.js";

export class TransformStage {
  constructor(
    private readonly storage: StorageBackend,
    private readonly logger: Logger,
  ) {}

  /**
   * Normalize the raw artifact's columns and replace it with the gzip-wrapped
   * canonical artifact. An existing canonical artifact is decoded and reused,
   * and a raw artifact left beside it is removed.
   */
  async transform(unit: UnitOfWork): Promise<TransformResult> {
    const state = await artifactState(this.storage, unit);

    if (decideTransform(state) === "reuse") {
      const table = await decodeCanonical(await this.storage.read(unit.canonicalKey));
      if (state === "both") {
        await this.storage.delete(unit.artifactKey);
        this.logger.warn({ unit: unit.key }, "removed raw artifact left beside canonical one");
      }
      this.logger.info({ unit: unit.key, rows: table.rows.length }, "reusing canonical artifact");
      return { status: "skipped", reason: "canonical-present", table };
    }

    if (state === "absent") {
      throw new Error(`no artifact for ${unit.key} at ${unit.artifactKey}`);
    }

    const raw = await readParquet(await this.storage.read(unit.artifactKey));
    const table = renameColumns(raw);

    const tmpKey = `${unit.canonicalKey}.tmp`;
    await this.storage.write(tmpKey, encodeCanonical(table));
    await this.storage.rename(tmpKey, unit.canonicalKey);
    await this.storage.delete(unit.artifactKey);

    this.logger.info(
      { unit: unit.key, rows: table.rows.length, columns: table.columns.length },
      "wrote canonical artifact",
    );
    return { status: "done", table };
  }
}
