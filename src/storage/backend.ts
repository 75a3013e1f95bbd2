/**
 * Abstract artifact storage interface. Keys are `/`-separated paths relative to
 * the store's root.
 */
import type { Readable } from "node:stream";

export interface StorageBackend {
  /** Write data to the given key, creating parent directories. */
  write(key: string, data: Uint8Array | string): Promise<void>;

  /** Stream `source` into the given key and return the number of bytes written. */
  writeStream(key: string, source: Readable): Promise<number>;

  /** Read data from the given key. */
  read(key: string): Promise<Uint8Array>;

  /** List all keys with the given prefix. */
  list(prefix: string): Promise<string[]>;

  /** Check if the key exists. */
  exists(key: string): Promise<boolean>;

  /** Move `from` onto `to`, replacing `to`. */
  rename(from: string, to: string): Promise<void>;

  /** Delete the given key. Missing keys are ignored. */
  delete(key: string): Promise<void>;
}
