import { err, ok, type Result } from "neverthrow";

export type HttpJsonRequest = {
  url: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

/**
 * Centralizes HTTP JSON GETs so provider adapters share one timeout, retry and status policy.
 * Bodies come back as `unknown`; typing them is the schema validator's job.
 */
export class HttpJsonClient {
  async getJson(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const maxAttempts = request.retries + 1;
    let lastFailure: HttpClientError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      lastFailure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!lastFailure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err(
      lastFailure ?? {
        code: "transport_error",
        message: "HTTP request exhausted retry attempts.",
        retryable: false,
      },
    );
  }

  private buildUrl(request: HttpJsonRequest): string {
    const url = new URL(request.url);
    Object.entries(request.query ?? {}).forEach(([key, value]) => {
      url.searchParams.set(key, value);
    });
    return url.toString();
  }

  private async performRequest(
    request: HttpJsonRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(this.buildUrl(request), {
        method: "GET",
        headers: { accept: "application/json", ...request.headers },
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      try {
        const body: unknown = await response.json();
        return ok(body);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
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
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
