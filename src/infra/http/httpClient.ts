import { err, ok, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  /**
   * Statuses other than 2xx that should still be returned as a response.
   */
  acceptStatuses?: number[];
  /** Caller-side cancellation, on top of the timeout. */
  signal?: AbortSignal;
};

export type HttpClientErrorCode =
  | "timeout"
  | "transport_error"
  | "non_success_status"
  | "invalid_json";

export type HttpClientError = {
  code: HttpClientErrorCode;
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

export type HttpBytesResponse = {
  status: number;
  bytes: Uint8Array;
  contentType: string;
  finalUrl: string;
};

export type HttpTextResponse = {
  status: number;
  text: string;
  contentType: string;
  finalUrl: string;
};

/**
 * Centralizes HTTP IO so adapters share one timeout, retry and status policy.
 */
export class HttpClient {
  async requestJson(
    request: HttpRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const response = await this.requestText(request);
    if (response.isErr()) {
      return err(response.error);
    }

    try {
      const parsed: unknown = JSON.parse(response.value.text);
      return ok(parsed);
    } catch (jsonError) {
      return err({
        code: "invalid_json",
        message: "HTTP response body was not valid JSON.",
        httpStatus: response.value.status,
        retryable: false,
        cause: jsonError,
      });
    }
  }

  async requestText(
    request: HttpRequest,
  ): Promise<Result<HttpTextResponse, HttpClientError>> {
    const response = await this.requestBytes(request);
    if (response.isErr()) {
      return err(response.error);
    }

    const { bytes, ...rest } = response.value;
    return ok({ ...rest, text: new TextDecoder().decode(bytes) });
  }

  /**
   * Executes the request with bounded retries for retryable failures.
   */
  async requestBytes(
    request: HttpRequest,
  ): Promise<Result<HttpBytesResponse, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest(
    request: HttpRequest,
  ): Promise<Result<HttpBytesResponse, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const cancel = () => controller.abort();
    if (request.signal?.aborted) {
      controller.abort();
    }
    request.signal?.addEventListener("abort", cancel, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
        redirect: "follow",
      });

      const accepted =
        response.ok || (request.acceptStatuses ?? []).includes(response.status);
      if (!accepted) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      const bytes = new Uint8Array(await response.arrayBuffer());
      return ok({
        status: response.status,
        bytes,
        contentType: response.headers.get("content-type") ?? "",
        finalUrl: response.url || request.url,
      });
    } catch (error) {
      const isTimeoutError =
        error instanceof Error && error.name === "AbortError";

      if (isTimeoutError && request.signal?.aborted) {
        return err({
          code: "transport_error",
          message: "HTTP request cancelled.",
          retryable: false,
          cause: error,
        });
      }

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", cancel);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

const mapHttpCode = (error: HttpClientError): AppBoundaryError["code"] => {
  if (error.httpStatus === 429) {
    return "rate_limited";
  }

  if (error.httpStatus === 401 || error.httpStatus === 403) {
    return "auth_invalid";
  }

  if (error.httpStatus === 404) {
    return "not_found";
  }

  if (error.code === "timeout") {
    return "timeout";
  }

  if (error.code === "invalid_json") {
    return "invalid_json";
  }

  if (error.code === "transport_error") {
    return "transport_error";
  }

  return "provider_error";
};

/**
 * Lifts an HTTP failure into the boundary taxonomy with adapter provenance.
 */
export const toBoundaryError = (
  source: AppBoundarySource,
  provider: string,
  error: HttpClientError,
): AppBoundaryError => ({
  source,
  code: mapHttpCode(error),
  provider,
  message: error.message,
  retryable: error.retryable,
  httpStatus: error.httpStatus,
  cause: error.cause,
});
