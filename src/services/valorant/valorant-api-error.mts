export class ValorantApiError extends Error {
  readonly status: number;
  readonly url: string;
  /** Provider hint for when the next request may succeed, from retry-after or x-ratelimit-reset. */
  readonly retryAfterMs: number | undefined;

  constructor(status: number, url: string, retryAfterMs?: number, message?: string) {
    super(message ?? `Valorant API request failed with status ${status.toString()}`);

    this.name = "ValorantApiError";
    this.status = status;
    this.url = url;
    this.retryAfterMs = retryAfterMs;
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }

  get isServerError(): boolean {
    return this.status >= 500;
  }
}

/**
 * The provider answered but the body is not a shape we can read. Asking again returns the same body.
 */
export class ValorantPayloadError extends Error {
  constructor(message: string) {
    super(message);

    this.name = "ValorantPayloadError";
  }
}
