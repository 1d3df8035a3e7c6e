import { asc, eq, sql } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import { err, ok, type Result } from "neverthrow";
import { PersistenceError } from "../../core/entities/appError";
import type {
  NormalizedRow,
  SymbolFetchState,
} from "../../core/entities/priceBar";
import type {
  DailyPriceRepositoryPort,
  FetchStateRepositoryPort,
  RowRejection,
} from "../../core/ports/outboundPorts";
import {
  type StockDailyDataInsert,
  stockDailyDataTable,
  symbolFetchStateTable,
} from "./schema";

// Keeps each statement well under the 65535 bind-parameter limit.
const INSERT_CHUNK_SIZE = 1_000;

// 22xxx data exception, 23xxx integrity constraint violation.
const ROW_REJECTION_SQLSTATE = /^2[23][0-9A-Z]{3}$/;

/**
 * SQLSTATE of a server error caused by the submitted rows, or null for connection and server faults.
 */
export const rowRejectionState = (error: unknown): string | null => {
  if (!(error instanceof Error) || !("code" in error)) {
    return null;
  }

  const { code } = error;
  return typeof code === "string" && ROW_REJECTION_SQLSTATE.test(code)
    ? code
    : null;
};

/**
 * Store faults are run-fatal, so every driver error that escapes leaves the repository as a PersistenceError.
 */
const withPersistenceError = async <T>(
  operation: string,
  action: () => Promise<T>,
): Promise<T> => {
  try {
    return await action();
  } catch (error) {
    if (error instanceof PersistenceError) {
      throw error;
    }
    throw new PersistenceError(
      `Store operation '${operation}' failed: ${
        error instanceof Error ? error.message : String(error)
      }`,
      error,
    );
  }
};

const toInsertRow = (row: NormalizedRow): StockDailyDataInsert => ({
  symbol: row.symbol,
  date: row.date,
  openPrice: row.open,
  highPrice: row.high,
  lowPrice: row.low,
  closePrice: row.close,
  volume: row.volume,
  dailyChangePercentage: row.dailyChangePercentage,
  extractionTimestamp: row.extractionTimestamp,
});

/**
 * Appends daily bars with insert-or-ignore semantics; the (symbol, date) unique index is the only dedupe mechanism.
 */
export class PostgresDailyPriceRepository implements DailyPriceRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async ensureSchema(): Promise<void> {
    await withPersistenceError("ensure stock_daily_data", async () => {
      await this.db.execute(sql`
        CREATE TABLE IF NOT EXISTS stock_daily_data (
          id serial PRIMARY KEY,
          symbol text NOT NULL,
          date date NOT NULL,
          open_price double precision NOT NULL,
          high_price double precision NOT NULL,
          low_price double precision NOT NULL,
          close_price double precision NOT NULL,
          volume bigint,
          daily_change_percentage double precision,
          extraction_timestamp timestamp with time zone NOT NULL
        )
      `);
      await this.db.execute(sql`
        CREATE UNIQUE INDEX IF NOT EXISTS stock_daily_data_symbol_date_uidx
        ON stock_daily_data (symbol, date)
      `);
    });
  }

  /**
   * Never updates an existing record; the returned count covers only rows the store did not already hold.
   */
  async insertIgnoringDuplicates(
    rows: NormalizedRow[],
  ): Promise<Result<number, RowRejection>> {
    if (rows.length === 0) return ok(0);

    return withPersistenceError(
      "insert stock_daily_data",
      async (): Promise<Result<number, RowRejection>> => {
        try {
          const inserted = await this.insertChunks(rows);
          return ok(inserted);
        } catch (error) {
          const sqlState = rowRejectionState(error);
          if (sqlState === null) {
            throw error;
          }
          return err({
            sqlState,
            message: error instanceof Error ? error.message : String(error),
            cause: error,
          });
        }
      },
    );
  }

  private insertChunks(rows: NormalizedRow[]): Promise<number> {
    return this.db.transaction(async (tx) => {
      let inserted = 0;

      for (let start = 0; start < rows.length; start += INSERT_CHUNK_SIZE) {
        const chunk = rows.slice(start, start + INSERT_CHUNK_SIZE);
        const written = await tx
          .insert(stockDailyDataTable)
          .values(chunk.map(toInsertRow))
          .onConflictDoNothing({
            target: [stockDailyDataTable.symbol, stockDailyDataTable.date],
          })
          .returning({ id: stockDailyDataTable.id });

        inserted += written.length;
      }

      return inserted;
    });
  }
}

/**
 * Holds the last successful fetch per symbol, which decides compact vs full on the next run.
 */
export class PostgresFetchStateRepository implements FetchStateRepositoryPort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async ensureSchema(): Promise<void> {
    await withPersistenceError("ensure symbol_fetch_state", async () => {
      await this.db.execute(sql`
        CREATE TABLE IF NOT EXISTS symbol_fetch_state (
          symbol text PRIMARY KEY,
          last_fetched_on date NOT NULL,
          last_output_size text NOT NULL,
          updated_at timestamp with time zone NOT NULL
        )
      `);
    });
  }

  async get(symbol: string): Promise<SymbolFetchState | null> {
    const [row] = await withPersistenceError("read symbol_fetch_state", () =>
      this.db
        .select()
        .from(symbolFetchStateTable)
        .where(eq(symbolFetchStateTable.symbol, symbol))
        .limit(1),
    );

    return row ?? null;
  }

  async record(state: SymbolFetchState): Promise<void> {
    await withPersistenceError("write symbol_fetch_state", () =>
      this.db
        .insert(symbolFetchStateTable)
        .values(state)
        .onConflictDoUpdate({
          target: symbolFetchStateTable.symbol,
          set: {
            lastFetchedOn: sql`excluded.last_fetched_on`,
            lastOutputSize: sql`excluded.last_output_size`,
            updatedAt: sql`excluded.updated_at`,
          },
        }),
    );
  }

  async list(): Promise<SymbolFetchState[]> {
    return withPersistenceError("list symbol_fetch_state", () =>
      this.db
        .select()
        .from(symbolFetchStateTable)
        .orderBy(asc(symbolFetchStateTable.symbol)),
    );
  }
}
