import type { Result } from "neverthrow";
import type { RateLimitError, TransportError } from "../entities/appError";
import type { OutputSize } from "../entities/priceBar";

export type DailySeriesRequest = {
  symbol: string;
  outputSize: OutputSize;
};

/**
 * Fetches one symbol's decoded daily series body. The body stays untyped until the schema validator has seen it.
 */
export interface DailySeriesProviderPort {
  fetchDailySeries(
    request: DailySeriesRequest,
  ): Promise<Result<unknown, TransportError | RateLimitError>>;
}
