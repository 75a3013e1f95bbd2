/**
 * Fetch stage: make the unit's raw artifact exist locally, at most once.
 */
import type { Logger } from "pino";
import { TransientTransferError, describeError } from "../core/exceptions.js";
import { decideFetch } from "../core/ledger.js";
import type { FetchResult, UnitOfWork } from "../core/types.js";
import type { StorageBackend } from "../storage/backend.js";
import type { TransferSource, Transport } from "../transport/transport.js";
import { artifactState } from "./artifacts.js";

export class FetchStage {
  constructor(
    private readonly storage: StorageBackend,
    private readonly transport: Transport,
    private readonly logger: Logger,
  ) {}

  /**
   * Download `unit.sourceLocation` unless a raw or canonical artifact is
   * already present. The download lands in a `.part` file that is renamed
   * into place only once complete.
   */
  async fetch(unit: UnitOfWork): Promise<FetchResult> {
    const state = await artifactState(this.storage, unit);
    if (decideFetch(state) === "skip") {
      this.logger.info({ unit: unit.key, state }, "artifact present, skipping download");
      return { status: "skipped", reason: "artifact-present" };
    }

    const url = unit.sourceLocation;
    const partKey = `${unit.artifactKey}.part`;
    this.logger.info({ unit: unit.key, url }, "downloading");

    const source = await this.open(url);
    let bytes: number;
    try {
      bytes = await this.storage.writeStream(partKey, source.body);
    } catch (err) {
      await this.storage.delete(partKey);
      throw new TransientTransferError(url, describeError(err));
    }

    if (source.length !== null && bytes !== source.length) {
      await this.storage.delete(partKey);
      throw new TransientTransferError(
        url,
        `truncated download: ${bytes} of ${source.length} bytes`,
      );
    }

    await this.storage.rename(partKey, unit.artifactKey);
    this.logger.info({ unit: unit.key, bytes }, "download complete");
    return { status: "done", bytes };
  }

  private async open(url: string): Promise<TransferSource> {
    try {
      return await this.transport.open(url);
    } catch (err) {
      if (err instanceof TransientTransferError) throw err;
      throw new TransientTransferError(url, describeError(err));
    }
  }
}
