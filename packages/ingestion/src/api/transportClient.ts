import type { Logger } from "../logger";
import { silentLogger } from "../logger";
import {
  HttpStatusError,
  RequestTimeoutError,
  TransportError,
  isRetriableError
} from "./retryPolicy";

export type HttpMethod = "GET" | "POST";

export type QueryParams = Record<string, string | number | null | undefined>;

export interface TransportClient {
  request: (
    method: HttpMethod,
    path: string,
    params?: QueryParams
  ) => Promise<unknown>;
}

export interface TransportConfig {
  baseUrl: string;
  accessToken: string;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface AttemptEvent {
  attempt: number;
  method: HttpMethod;
  url: string;
  outcome: "success" | "retry" | "failure";
  status?: number;
  delayMs?: number;
  error?: string;
}

type FetchLike = typeof fetch;
type SleepLike = (ms: number) => Promise<void>;

export interface TransportClientDependencies {
  fetchImpl?: FetchLike;
  sleep?: SleepLike;
  logger?: Logger;
  onAttempt?: (event: AttemptEvent) => void;
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.endsWith("/") ? baseUrl : `${baseUrl}/`;
}

export function buildRequestUrl(
  baseUrl: string,
  path: string,
  params: QueryParams = {}
): URL {
  const relativePath = path.startsWith("/") ? path.slice(1) : path;
  const url = new URL(relativePath, normalizeBaseUrl(baseUrl));

  for (const [key, value] of Object.entries(params)) {
    if (value === null || value === undefined) {
      continue;
    }

    url.searchParams.set(key, String(value));
  }

  return url;
}

async function sleepFor(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

interface FetchedResponse {
  status: number;
  ok: boolean;
  body: string;
}

// The timer stays armed until the body has been read; a stalled body counts
// as a timeout like a stalled connect.
async function fetchWithTimeout(
  fetchImpl: FetchLike,
  requestUrl: URL,
  requestInit: RequestInit,
  timeoutMs: number
): Promise<FetchedResponse> {
  const controller = new AbortController();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timedOut = new Promise<never>((_resolve, reject) => {
    timeoutId = setTimeout(() => {
      reject(new RequestTimeoutError(timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  const exchange = async (): Promise<FetchedResponse> => {
    const response = await fetchImpl(requestUrl, {
      ...requestInit,
      signal: controller.signal
    });
    const body = await response.text();
    return { status: response.status, ok: response.ok, body };
  };

  try {
    return await Promise.race([exchange(), timedOut]);
  } finally {
    clearTimeout(timeoutId);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function parseJsonBody(body: string): unknown {
  if (body.length === 0) {
    return null;
  }

  const parsed: unknown = JSON.parse(body);
  return parsed;
}

export function createTransportClient(
  config: TransportConfig,
  dependencies: TransportClientDependencies = {}
): TransportClient {
  const fetchImpl = dependencies.fetchImpl ?? fetch;
  const sleep = dependencies.sleep ?? sleepFor;
  const logger = dependencies.logger ?? silentLogger;
  const onAttempt = dependencies.onAttempt;
  const maxAttempts = Math.max(1, config.maxRetries);

  return {
    async request(
      method: HttpMethod,
      path: string,
      params?: QueryParams
    ): Promise<unknown> {
      const url = buildRequestUrl(config.baseUrl, path, params);
      const requestInit: RequestInit = {
        method,
        headers: {
          Accept: "application/json",
          Authorization: `Bearer ${config.accessToken}`,
          "Content-Type": "application/json"
        }
      };

      let lastError: unknown = null;
      let lastStatus: number | null = null;

      for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
        logger.debug("crm request", { method, url: url.toString(), attempt });

        try {
          const response = await fetchWithTimeout(
            fetchImpl,
            url,
            requestInit,
            config.timeoutMs
          );

          if (!response.ok) {
            throw new HttpStatusError(response.status, response.body);
          }

          let payload: unknown;
          try {
            payload = parseJsonBody(response.body);
          } catch (parseError) {
            throw new TransportError(
              `CRM API returned invalid JSON for ${method} ${url.toString()}`,
              {
                method,
                url: url.toString(),
                attempts: attempt,
                status: response.status,
                cause: parseError
              }
            );
          }

          onAttempt?.({
            attempt,
            method,
            url: url.toString(),
            outcome: "success",
            status: response.status
          });
          return payload;
        } catch (error) {
          if (error instanceof TransportError) {
            throw error;
          }

          lastError = error;
          lastStatus = error instanceof HttpStatusError ? error.status : null;

          const retriable = isRetriableError(error);
          const hasAttemptsLeft = attempt < maxAttempts;

          if (!retriable || !hasAttemptsLeft) {
            onAttempt?.({
              attempt,
              method,
              url: url.toString(),
              outcome: "failure",
              status: lastStatus ?? undefined,
              error: errorMessage(error)
            });

            if (!retriable) {
              throw new TransportError(
                `CRM API request ${method} ${url.toString()} failed: ${errorMessage(error)}`,
                {
                  method,
                  url: url.toString(),
                  attempts: attempt,
                  status: lastStatus,
                  cause: error
                }
              );
            }

            break;
          }

          onAttempt?.({
            attempt,
            method,
            url: url.toString(),
            outcome: "retry",
            status: lastStatus ?? undefined,
            delayMs: config.retryDelayMs,
            error: errorMessage(error)
          });
          logger.warn("crm request failed, retrying", {
            method,
            url: url.toString(),
            attempt,
            maxAttempts,
            delayMs: config.retryDelayMs,
            error: errorMessage(error)
          });

          await sleep(config.retryDelayMs);
        }
      }

      logger.error("crm request failed, retries exhausted", {
        method,
        url: url.toString(),
        attempts: maxAttempts,
        error: errorMessage(lastError)
      });

      throw new TransportError(
        `CRM API request ${method} ${url.toString()} failed after ${maxAttempts} attempts: ${errorMessage(lastError)}`,
        {
          method,
          url: url.toString(),
          attempts: maxAttempts,
          status: lastStatus,
          cause: lastError
        }
      );
    }
  };
}
