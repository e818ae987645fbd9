/**
 * Transport-layer errors. Every one of them means "this call failed";
 * the router collapses them into a boolean.
 */

export class TransportError extends Error {
  readonly status: number | undefined;

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, options);
    this.name = "TransportError";
    this.status = options?.status;
  }
}

export class RequestTimeoutError extends TransportError {
  constructor(url: string, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`, url);
    this.name = "RequestTimeoutError";
  }
}

export class ResponseFormatError extends TransportError {
  constructor(message: string, url: string, options?: { cause?: unknown }) {
    super(message, url, options);
    this.name = "ResponseFormatError";
  }
}
