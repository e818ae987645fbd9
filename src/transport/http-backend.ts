/**
 * HTTP transfer backend built on the global fetch API
 */

import { openAsBlob } from "node:fs";
import * as path from "node:path";
import type { TransferBackend, TransferResponse } from "../types";
import { createLogger } from "../utils/logger";
import { RequestTimeoutError, TransportError } from "./errors";

const log = createLogger("http");

export const DEFAULT_REQUEST_TIMEOUT_MS = 10 * 60 * 1000;

export interface HttpBackendOptions {
  /** Abort each request after this many milliseconds */
  timeoutMs?: number;
  /** Override for tests */
  fetch?: typeof fetch;
}

/**
 * Strip credentials and query strings before a URL reaches a log line.
 * Webhook URLs carry their secret in the path, so only the origin is kept.
 */
export function redactUrl(url: string): string {
  try {
    return new URL(url).origin;
  } catch {
    return "<invalid url>";
  }
}

function isTimeout(error: unknown): boolean {
  return typeof error === "object" && error !== null && "name" in error && error.name === "TimeoutError";
}

export class HttpBackend implements TransferBackend {
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpBackendOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async postMultipart(url: string, filePath: string, fieldName = "file"): Promise<TransferResponse> {
    let blob: Blob;
    try {
      blob = await openAsBlob(filePath);
    } catch (error) {
      throw new TransportError(`Cannot read upload file: ${filePath}`, url, { cause: error });
    }

    const form = new FormData();
    form.append(fieldName, blob, path.basename(filePath));

    log.debug(`POST multipart ${redactUrl(url)} (${blob.size} bytes)`);
    return this.send(url, { method: "POST", body: form });
  }

  async postJson(url: string, payload: unknown): Promise<TransferResponse> {
    log.debug(`POST json ${redactUrl(url)}`);
    return this.send(url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(payload),
    });
  }

  private async send(url: string, init: RequestInit): Promise<TransferResponse> {
    let response: Response;
    let body: Buffer;
    try {
      response = await this.fetchImpl(url, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      if (isTimeout(error)) {
        throw new RequestTimeoutError(url, this.timeoutMs);
      }
      throw new TransportError(`Request failed: ${(error as Error).message}`, url, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new TransportError(`Unexpected HTTP status ${response.status}`, url, {
        status: response.status,
      });
    }

    log.debug(`${redactUrl(url)} responded ${response.status} (${body.length} bytes)`);
    return { status: response.status, body };
  }
}
