/**
 * Abstract transfer interface: how the bytes of a remote file are obtained.
 */
import type { Readable } from "node:stream";

export interface TransferSource {
  body: Readable;
  /** Announced size in bytes, when the server sends one. */
  length: number | null;
}

export interface Transport {
  /**
   * Open `url` for reading. Rejects with `TransientTransferError` when the
   * remote cannot serve it.
   */
  open(url: string): Promise<TransferSource>;
}
