import { describe, expect, it } from "vitest";

import {
  HttpStatusError,
  RequestTimeoutError,
  TransportError,
  isRetriableError,
  isRetriableStatus
} from "../src/api/retryPolicy";

describe("isRetriableStatus", () => {
  it("marks 429 and 5xx as retriable", () => {
    expect(isRetriableStatus(429)).toBe(true);
    expect(isRetriableStatus(500)).toBe(true);
    expect(isRetriableStatus(503)).toBe(true);
  });

  it("marks other 4xx as non-retriable", () => {
    expect(isRetriableStatus(400)).toBe(false);
    expect(isRetriableStatus(401)).toBe(false);
    expect(isRetriableStatus(404)).toBe(false);
  });
});

describe("isRetriableError", () => {
  it("retries timeouts, network failures and transient statuses", () => {
    expect(isRetriableError(new RequestTimeoutError(100))).toBe(true);
    expect(isRetriableError(new TypeError("fetch failed"))).toBe(true);
    expect(isRetriableError(Object.assign(new Error("aborted"), { name: "AbortError" }))).toBe(
      true
    );
    expect(isRetriableError(new HttpStatusError(502, ""))).toBe(true);
  });

  it("does not retry client errors or unknown values", () => {
    expect(isRetriableError(new HttpStatusError(403, "forbidden"))).toBe(false);
    expect(isRetriableError(new Error("boom"))).toBe(false);
    expect(isRetriableError("boom")).toBe(false);
  });
});

describe("error types", () => {
  it("formats status errors with and without a body", () => {
    expect(new HttpStatusError(500, "oops").message).toBe(
      "CRM API request failed with status 500: oops"
    );
    expect(new HttpStatusError(503, "").message).toBe(
      "CRM API request failed with status 503"
    );
  });

  it("carries request details on transport errors", () => {
    const cause = new HttpStatusError(500, "");
    const error = new TransportError("gave up", {
      method: "GET",
      url: "http://crm.test/x",
      attempts: 5,
      cause
    });

    expect(error.name).toBe("TransportError");
    expect(error.status).toBeNull();
    expect(error.attempts).toBe(5);
    expect(error.cause).toBe(cause);
  });
});
