/* src/core/http-client.ts */

/**
 * HTTP transport for resumable transfers.
 * Issues ranged GET requests, follows redirects and reads bodies in fixed-size
 * chunks under a read timeout.
 */

import * as http from "node:http";
import * as https from "node:https";
import type { Readable } from "node:stream";
import { REQUEST_HEADERS, TIMEOUTS, TRANSFER_DEFAULTS } from "../constants";
import { abortReason } from "./clock";
import { classifyError, TransferError } from "./errors";
import type { RangeRequestOptions } from "./types";

export interface RangeResponse {
  statusCode: number;
  headers: http.IncomingHttpHeaders;
  /** URL that produced the response, after redirects */
  url: string;
  body: http.IncomingMessage;
}

export interface ContentRange {
  start: number;
  end: number;
  total: number | null;
}

export interface ReadOptions {
  timeout?: number;
  signal?: AbortSignal;
}

// ============================================================================
// HTTP CLIENT CLASS
// ============================================================================

export class HttpClient {
  private defaultTimeout: number;
  private maxRedirects: number;
  private silent: boolean;

  constructor(options?: { timeout?: number; maxRedirects?: number; silent?: boolean }) {
    this.defaultTimeout = options?.timeout ?? TIMEOUTS.REQUEST;
    this.maxRedirects = options?.maxRedirects ?? TRANSFER_DEFAULTS.MAX_REDIRECTS;
    this.silent = options?.silent ?? false;
  }

  get timeout(): number {
    return this.defaultTimeout;
  }

  /**
   * Open a GET starting at `offset`, following redirects.
   * Resolves once response headers arrive; the caller owns the body.
   */
  async openRange(url: string, options: RangeRequestOptions): Promise<RangeResponse> {
    let currentUrl = url;

    for (let redirects = 0; ; redirects++) {
      const response = await this.request(currentUrl, options);
      const statusCode = response.statusCode ?? 0;
      const location = response.headers.location;

      if (statusCode >= 300 && statusCode < 400 && location) {
        response.resume();
        if (redirects >= this.maxRedirects) {
          throw new TransferError("httpError", `Too many redirects (${redirects + 1}) for ${url}`, {
            statusCode,
          });
        }
        currentUrl = new URL(location, currentUrl).toString();
        if (!this.silent) {
          console.log(`[REDIRECT] Following redirect to: ${currentUrl}`);
        }
        continue;
      }

      return { statusCode, headers: response.headers, url: currentUrl, body: response };
    }
  }

  /**
   * Read a response body as fixed-size chunks (the last one may be shorter).
   * The timeout applies to each wait on the network only.
   */
  async *readChunks(
    body: Readable,
    chunkSize: number,
    options: ReadOptions = {}
  ): AsyncGenerator<Buffer, void, undefined> {
    const timeout = options.timeout ?? this.defaultTimeout;
    const iterator: AsyncIterator<unknown> = body[Symbol.asyncIterator]();
    let pending: Buffer[] = [];
    let pendingBytes = 0;

    try {
      for (;;) {
        const next = await this.nextWithTimeout(iterator, timeout, options.signal);
        if (next.done) break;

        const piece = toBuffer(next.value);
        pending.push(piece);
        pendingBytes += piece.length;

        while (pendingBytes >= chunkSize) {
          const joined = Buffer.concat(pending, pendingBytes);
          yield joined.subarray(0, chunkSize);
          const rest = joined.subarray(chunkSize);
          pending = rest.length > 0 ? [rest] : [];
          pendingBytes = rest.length;
        }
      }

      if (pendingBytes > 0) {
        yield Buffer.concat(pending, pendingBytes);
      }
    } finally {
      if (!body.readableEnded) {
        body.destroy();
      }
    }
  }

  private request(url: string, options: RangeRequestOptions): Promise<http.IncomingMessage> {
    const { offset, ifRange, signal } = options;
    const timeout = options.timeout ?? this.defaultTimeout;

    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const protocol = url.startsWith("https:") ? https : http;
      const headers: Record<string, string> = { ...REQUEST_HEADERS, ...options.headers };
      if (offset > 0) {
        headers.Range = `bytes=${offset}-`;
        if (ifRange) headers["If-Range"] = ifRange;
      }

      let settled = false;

      const onAbort = () => {
        if (signal) req.destroy(abortReason(signal));
      };

      const req = protocol.request(url, { method: "GET", headers, timeout }, (res) => {
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        // body reads are timed by readChunks
        req.setTimeout(0);
        resolve(res);
      });

      req.on("timeout", () => {
        req.destroy(new TransferError("network", `Request timeout after ${timeout}ms: ${url}`));
      });

      req.on("error", (error) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        if (signal?.aborted) {
          reject(abortReason(signal));
        } else {
          reject(classifyError(error));
        }
      });

      signal?.addEventListener("abort", onAbort, { once: true });
      req.end();
    });
  }

  private nextWithTimeout(
    iterator: AsyncIterator<unknown>,
    timeout: number,
    signal?: AbortSignal
  ): Promise<IteratorResult<unknown>> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const cleanup = () => {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const onAbort = () => {
        cleanup();
        if (signal) reject(abortReason(signal));
      };

      const timer = setTimeout(() => {
        cleanup();
        reject(new TransferError("network", `Read timeout after ${timeout}ms`));
      }, timeout);

      signal?.addEventListener("abort", onAbort, { once: true });

      iterator.next().then(
        (result) => {
          cleanup();
          resolve(result);
        },
        (error: unknown) => {
          cleanup();
          reject(signal?.aborted ? abortReason(signal) : classifyError(error));
        }
      );
    });
  }
}

// ============================================================================
// HEADER HELPERS
// ============================================================================

function toBuffer(value: unknown): Buffer {
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  return Buffer.from(String(value));
}

/**
 * Parse `Content-Range: bytes start-end/total`
 */
export function parseContentRange(header: string | undefined): ContentRange | null {
  if (!header) return null;
  const match = /^bytes\s+(\d+)-(\d+)\/(\d+|\*)$/i.exec(header.trim());
  if (!match) return null;
  return {
    start: Number(match[1]),
    end: Number(match[2]),
    total: match[3] === "*" ? null : Number(match[3]),
  };
}

/**
 * Total size from `Content-Range: bytes *\/total`, sent with 416 responses
 */
export function parseUnsatisfiedRange(header: string | undefined): number | null {
  if (!header) return null;
  const match = /^bytes\s+\*\/(\d+)$/i.exec(header.trim());
  return match ? Number(match[1]) : null;
}

export function parseContentLength(header: string | undefined): number | null {
  if (!header) return null;
  const length = Number.parseInt(header, 10);
  return Number.isNaN(length) || length < 0 ? null : length;
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

let httpClientInstance: HttpClient | null = null;

/**
 * Get the shared HttpClient instance
 */
export function getHttpClient(): HttpClient {
  if (!httpClientInstance) {
    httpClientInstance = new HttpClient();
  }
  return httpClientInstance;
}
