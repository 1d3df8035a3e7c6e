import { err, ok, type Result } from "neverthrow";
import type {
  ExtractionError,
  RateLimitError,
  SchemaValidationError,
} from "../../core/entities/appError";
import type {
  OutputSize,
  RawArtifactHandle,
} from "../../core/entities/priceBar";
import type { DailySeriesProviderPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  FetchStateRepositoryPort,
  RawSnapshotStorePort,
} from "../../core/ports/outboundPorts";
import {
  detectProviderNotice,
  parseTimeSeriesResponse,
  type ProviderNotice,
} from "../../core/validation/timeSeriesSchema";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";
import { toIsoDate } from "../../shared/time/dateUtils";

export type ExtractionOptions = {
  seriesKey: string;
  timeZone?: string;
};

/**
 * Keeps provider IO at the pipeline edge: nothing reaches the snapshot store before it passes schema validation.
 */
export class ExtractionService {
  private readonly logger: Logger;

  constructor(
    private readonly provider: DailySeriesProviderPort,
    private readonly snapshotStore: RawSnapshotStorePort,
    private readonly fetchStateRepo: FetchStateRepositoryPort,
    private readonly clock: ClockPort,
    private readonly options: ExtractionOptions,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ stage: "extract" });
  }

  async ensureSchema(): Promise<void> {
    await this.fetchStateRepo.ensureSchema();
  }

  /**
   * A symbol that has fetched successfully before only needs the recent window.
   */
  async resolveOutputSize(symbol: string): Promise<OutputSize> {
    const state = await this.fetchStateRepo.get(symbol);
    return state ? "compact" : "full";
  }

  /**
   * Fetches, validates and snapshots one symbol. Expected failures come back as errors so the caller can skip
   * downstream work for this symbol; store outages still throw.
   */
  async extract(
    symbol: string,
  ): Promise<Result<RawArtifactHandle, ExtractionError>> {
    const outputSize = await this.resolveOutputSize(symbol);
    const log = this.logger.child({ symbol, outputSize });

    log.info("Fetching daily series");

    const response = await this.provider.fetchDailySeries({
      symbol,
      outputSize,
    });
    if (response.isErr()) {
      return err(response.error);
    }

    const payload = response.value;
    const notice = detectProviderNotice(payload, this.options.seriesKey);
    if (notice) {
      return err(this.fromNotice(symbol, notice));
    }

    const validated = parseTimeSeriesResponse(
      payload,
      symbol,
      this.options.seriesKey,
    );
    if (validated.isErr()) {
      return err(validated.error);
    }

    const now = this.clock.now();
    const fetchedOn = toIsoDate(now, this.options.timeZone);
    const written = await this.snapshotStore.write({
      symbol,
      fetchedOn,
      payload,
    });

    if (written.isErr()) {
      return err({
        kind: "snapshot_storage",
        stage: "extract",
        symbol,
        path: written.error.path,
        message: written.error.message,
        retryable: true,
        cause: written.error.cause,
      });
    }

    await this.fetchStateRepo.record({
      symbol,
      lastFetchedOn: fetchedOn,
      lastOutputSize: outputSize,
      updatedAt: now,
    });

    const tradingDayCount = Object.keys(validated.value.series).length;
    log.info(
      { path: written.value, tradingDayCount },
      "Saved raw daily series snapshot",
    );

    return ok({
      symbol,
      path: written.value,
      fetchedOn,
      outputSize,
      tradingDayCount,
    });
  }

  private fromNotice(
    symbol: string,
    notice: ProviderNotice,
  ): RateLimitError | SchemaValidationError {
    if (notice.kind === "rate_limit") {
      return {
        kind: "rate_limited",
        stage: "extract",
        symbol,
        message: `API rate limit reached: ${notice.message}`,
        retryable: true,
      };
    }

    return {
      kind: "schema_validation",
      stage: "extract",
      symbol,
      message: `Provider rejected the request: ${notice.message}`,
      retryable: false,
      issues: [
        {
          path: `[${JSON.stringify(notice.field)}]`,
          expected: `"${this.options.seriesKey}" field`,
          received: "provider error message",
          message: notice.message,
        },
      ],
    };
  }
}
