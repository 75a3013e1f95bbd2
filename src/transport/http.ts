/**
 * HTTP(S) transport on the runtime's fetch.
 */
import { Readable } from "node:stream";
import { TransientTransferError, describeError } from "../core/exceptions.js";
import type { TransferSource, Transport } from "./transport.js";

export interface HttpTransportOptions {
  /** Abort a transfer, body included, that has not completed in time. */
  timeoutMs?: number;
  userAgent?: string;
}

export class HttpTransport implements Transport {
  private timeoutMs: number;
  private userAgent: string;

  constructor(opts: HttpTransportOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 15 * 60_000;
    this.userAgent = opts.userAgent ?? "trip-ingest";
  }

  async open(url: string): Promise<TransferSource> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "user-agent": this.userAgent },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new TransientTransferError(url, describeError(err));
    }

    if (!response.ok || !response.body) {
      throw new TransientTransferError(
        url,
        `HTTP ${response.status} ${response.statusText}`.trim(),
        response.status,
      );
    }

    const header = response.headers.get("content-length");
    const length = header !== null && /^\d+$/.test(header) ? Number(header) : null;
    return { body: Readable.fromWeb(response.body), length };
  }
}
