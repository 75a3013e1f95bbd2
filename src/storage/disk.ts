/**
 * Local filesystem storage backend.
 */
import { createWriteStream } from "node:fs";
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { StorageBackend } from "./backend.js";

export class DiskStorage implements StorageBackend {
  readonly basePath: string;

  constructor(basePath: string) {
    this.basePath = resolve(basePath);
  }

  private resolve(key: string): string {
    return join(this.basePath, ...key.split("/"));
  }

  private async ensureParent(key: string): Promise<string> {
    const fullPath = this.resolve(key);
    await mkdir(dirname(fullPath), { recursive: true });
    return fullPath;
  }

  async write(key: string, data: Uint8Array | string): Promise<void> {
    const fullPath = await this.ensureParent(key);
    await writeFile(fullPath, data);
  }

  async writeStream(key: string, source: Readable): Promise<number> {
    const fullPath = await this.ensureParent(key);
    let bytes = 0;
    source.on("data", (chunk: Buffer | string) => {
      bytes += typeof chunk === "string" ? Buffer.byteLength(chunk) : chunk.length;
    });
    await pipeline(source, createWriteStream(fullPath));
    return bytes;
  }

  async read(key: string): Promise<Uint8Array> {
    return readFile(this.resolve(key));
  }

  async list(prefix: string): Promise<string[]> {
    const prefixPath = this.resolve(prefix);
    try {
      const s = await stat(prefixPath);
      if (s.isFile()) return [prefix];
    } catch {
      return [];
    }

    const keys: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = join(dir, entry.name);
        if (entry.isDirectory()) {
          await walk(full);
        } else if (entry.isFile()) {
          // Make key relative to basePath
          keys.push(full.slice(this.basePath.length + 1).split(sep).join("/"));
        }
      }
    };

    await walk(prefixPath);
    return keys.sort();
  }

  async exists(key: string): Promise<boolean> {
    try {
      const s = await stat(this.resolve(key));
      return s.isFile();
    } catch {
      return false;
    }
  }

  async rename(from: string, to: string): Promise<void> {
    const target = await this.ensureParent(to);
    await rename(this.resolve(from), target);
  }

  async delete(key: string): Promise<void> {
    await rm(this.resolve(key), { force: true });
  }
}
