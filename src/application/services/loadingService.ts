import { err, ok, type Result } from "neverthrow";
import type { LoadRejectedError } from "../../core/entities/appError";
import type { NormalizedRow } from "../../core/entities/priceBar";
import type { DailyPriceRepositoryPort } from "../../core/ports/outboundPorts";
import { logger as rootLogger, type Logger } from "../../shared/logger/logger";

export type LoadOutcome = {
  status: "empty" | "loaded";
  submitted: number;
  inserted: number;
};

/**
 * Owns the destination schema and the insert-or-ignore write. Rows the store refuses fail only their symbol;
 * store outages propagate as PersistenceError.
 */
export class LoadingService {
  private readonly logger: Logger;

  constructor(
    private readonly priceRepo: DailyPriceRepositoryPort,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ stage: "load" });
  }

  async ensureSchema(): Promise<void> {
    await this.priceRepo.ensureSchema();
    this.logger.debug("Table stock_daily_data is ready");
  }

  /**
   * Reports submitted vs newly inserted so callers can observe real new-data volume.
   */
  async load(
    symbol: string,
    rows: NormalizedRow[],
  ): Promise<Result<LoadOutcome, LoadRejectedError>> {
    if (rows.length === 0) {
      this.logger.info({ symbol }, "No data to load");
      return ok({ status: "empty", submitted: 0, inserted: 0 });
    }

    const written = await this.priceRepo.insertIgnoringDuplicates(rows);
    if (written.isErr()) {
      return err({
        kind: "load_rejected",
        stage: "load",
        symbol,
        sqlState: written.error.sqlState,
        message: `Store rejected rows for ${symbol}: ${written.error.message}`,
        retryable: false,
        cause: written.error.cause,
      });
    }

    this.logger.info(
      { symbol, submitted: rows.length, inserted: written.value },
      "Loaded daily rows",
    );

    return ok({ status: "loaded", submitted: rows.length, inserted: written.value });
  }
}
