/** Non-2xx response that survived the retry budget. */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    statusText: string,
  ) {
    super(`Request failed: ${status} ${statusText}`);
    this.name = "HttpError";
  }
}

/**
 * A provider told us to back off (HTTP 429). Escapes the enrichment
 * pipeline so a batch can pause and resume from its checkpoint.
 */
export class ProviderRateLimitError extends Error {
  constructor(readonly provider: string) {
    super(`${provider} rate limit reached`);
    this.name = "ProviderRateLimitError";
  }
}

export function isRateLimitError(err: unknown): err is ProviderRateLimitError {
  return err instanceof ProviderRateLimitError;
}

/** The request never produced a response: timeout, DNS or socket failure. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}
