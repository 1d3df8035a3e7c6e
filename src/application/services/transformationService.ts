import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { TransformError } from "../../core/entities/appError";
import type {
  NormalizedRow,
  RawArtifactHandle,
} from "../../core/entities/priceBar";
import type {
  ClockPort,
  RawSnapshotStorePort,
} from "../../core/ports/outboundPorts";
import {
  isPlainObject,
  toFiniteNumber,
  toSafeInteger,
} from "../../core/validation/numeric";
import {
  formatPath,
  isIsoTradingDate,
  PRICE_BAR_FIELDS,
} from "../../core/validation/timeSeriesSchema";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";

const priceField = z.unknown().transform((value, ctx) => {
  const parsed = toFiniteNumber(value);
  if (parsed === null) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Expected a numeric price",
    });
    return z.NEVER;
  }
  return parsed;
});

// Volume is coerced leniently: an unparseable value becomes null and the row is kept.
const snapshotBarSchema = z.object({
  [PRICE_BAR_FIELDS.open]: priceField,
  [PRICE_BAR_FIELDS.high]: priceField,
  [PRICE_BAR_FIELDS.low]: priceField,
  [PRICE_BAR_FIELDS.close]: priceField,
  [PRICE_BAR_FIELDS.volume]: z.unknown().transform(toSafeInteger),
});

/**
 * (close - open) / open * 100, or null when open is zero or the result is not finite.
 */
export const dailyChangePercentage = (
  open: number,
  close: number,
): number | null => {
  if (open === 0) {
    return null;
  }

  const change = ((close - open) / open) * 100;
  return Number.isFinite(change) ? change : null;
};

/**
 * Turns a persisted raw snapshot into normalized rows. Re-reads the file rather than trusting memory
 * so a snapshot corrupted between stages is caught here.
 */
export class TransformationService {
  private readonly logger: Logger;

  constructor(
    private readonly snapshotStore: RawSnapshotStorePort,
    private readonly clock: ClockPort,
    private readonly seriesKey: string,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ stage: "transform" });
  }

  async transform(
    artifact: RawArtifactHandle,
    symbol: string,
  ): Promise<Result<NormalizedRow[], TransformError>> {
    const read = await this.snapshotStore.read(artifact.path);
    if (read.isErr()) {
      return err(
        this.transformError(
          symbol,
          artifact.path,
          read.error.message,
          read.error.cause,
        ),
      );
    }

    const payload = read.value;
    const rawSeries = isPlainObject(payload) ? payload[this.seriesKey] : undefined;
    if (!isPlainObject(rawSeries)) {
      return err(
        this.transformError(
          symbol,
          artifact.path,
          `Snapshot has no "${this.seriesKey}" mapping.`,
        ),
      );
    }

    // One timestamp for the whole call, not a wall-clock read per row.
    const extractionTimestamp = this.clock.now();
    const rows: NormalizedRow[] = [];

    for (const [date, rawBar] of Object.entries(rawSeries)) {
      if (!isIsoTradingDate(date)) {
        return err(
          this.transformError(
            symbol,
            artifact.path,
            `Snapshot key ${JSON.stringify(date)} is not an ISO trading date.`,
          ),
        );
      }

      const bar = snapshotBarSchema.safeParse(rawBar);
      if (!bar.success) {
        const issue = bar.error.issues.at(0);
        const where = formatPath([this.seriesKey, date, ...(issue?.path ?? [])]);
        return err(
          this.transformError(
            symbol,
            artifact.path,
            `Unexpected bar at ${where}: ${issue?.message ?? "invalid value"}.`,
            bar.error,
          ),
        );
      }

      const open = bar.data[PRICE_BAR_FIELDS.open];
      const close = bar.data[PRICE_BAR_FIELDS.close];

      rows.push({
        symbol,
        date,
        open,
        high: bar.data[PRICE_BAR_FIELDS.high],
        low: bar.data[PRICE_BAR_FIELDS.low],
        close,
        volume: bar.data[PRICE_BAR_FIELDS.volume],
        dailyChangePercentage: dailyChangePercentage(open, close),
        extractionTimestamp,
      });
    }

    this.logger.info(
      { symbol, path: artifact.path, rowCount: rows.length },
      "Transformed daily series snapshot",
    );

    return ok(rows);
  }

  private transformError(
    symbol: string,
    path: string,
    reason: string,
    cause?: unknown,
  ): TransformError {
    return {
      kind: "transform_error",
      stage: "transform",
      symbol,
      path,
      message: `Could not transform snapshot for ${symbol}: ${reason}`,
      retryable: false,
      cause,
    };
  }
}
