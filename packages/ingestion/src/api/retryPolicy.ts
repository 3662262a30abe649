export class TransportError extends Error {
  readonly method: string;
  readonly url: string;
  readonly attempts: number;
  readonly status: number | null;

  constructor(
    message: string,
    details: {
      method: string;
      url: string;
      attempts: number;
      status?: number | null;
      cause?: unknown;
    }
  ) {
    super(message, { cause: details.cause });
    this.name = "TransportError";
    this.method = details.method;
    this.url = details.url;
    this.attempts = details.attempts;
    this.status = details.status ?? null;
  }
}

export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`CRM API request timed out after ${timeoutMs}ms`);
    this.name = "RequestTimeoutError";
  }
}

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(
      body
        ? `CRM API request failed with status ${status}: ${body}`
        : `CRM API request failed with status ${status}`
    );
    this.name = "HttpStatusError";
    this.status = status;
  }
}

// Rate limiting gets the same fixed delay as any other transient failure.
export function isRetriableStatus(statusCode: number): boolean {
  return statusCode === 429 || statusCode >= 500;
}

export function isRetriableError(error: unknown): boolean {
  if (error instanceof RequestTimeoutError) {
    return true;
  }

  if (error instanceof HttpStatusError) {
    return isRetriableStatus(error.status);
  }

  if (error instanceof Error) {
    return error.name === "AbortError" || error.name === "TypeError";
  }

  return false;
}
