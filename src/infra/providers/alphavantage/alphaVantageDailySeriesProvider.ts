import { err, ok, type Result } from "neverthrow";
import {
  ConfigurationError,
  type RateLimitError,
  type TransportError,
} from "../../../core/entities/appError";
import type {
  DailySeriesProviderPort,
  DailySeriesRequest,
} from "../../../core/ports/inboundPorts";
import { HttpJsonClient } from "../../http/httpJsonClient";

/**
 * Calls Alpha Vantage TIME_SERIES_DAILY and maps HTTP faults into the pipeline's error taxonomy.
 */
export class AlphaVantageDailySeriesProvider implements DailySeriesProviderPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly retries = 0,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new ConfigurationError(
        "ALPHA_VANTAGE_API_KEY is required to fetch daily series.",
      );
    }
  }

  async fetchDailySeries(
    request: DailySeriesRequest,
  ): Promise<Result<unknown, TransportError | RateLimitError>> {
    const response = await this.httpClient.getJson({
      url: new URL("/query", this.baseUrl).toString(),
      query: {
        function: "TIME_SERIES_DAILY",
        symbol: request.symbol,
        apikey: this.apiKey,
        outputsize: request.outputSize,
      },
      timeoutMs: this.timeoutMs,
      retries: this.retries,
      retryDelayMs: 250,
    });

    if (response.isOk()) {
      return ok(response.value);
    }

    const failure = response.error;
    if (failure.httpStatus === 429) {
      return err({
        kind: "rate_limited",
        stage: "extract",
        symbol: request.symbol,
        message: "Alpha Vantage rate limit reached (HTTP 429).",
        retryable: true,
        httpStatus: failure.httpStatus,
        cause: failure.cause,
      });
    }

    return err({
      kind: "transport_error",
      stage: "extract",
      symbol: request.symbol,
      code: failure.code,
      message: `Alpha Vantage request failed: ${failure.message}`,
      retryable: failure.retryable,
      httpStatus: failure.httpStatus,
      cause: failure.cause,
    });
  }
}
