import type { Result } from "neverthrow";
import type {
  NormalizedRow,
  SymbolFetchState,
} from "../entities/priceBar";

export type RowRejection = {
  sqlState: string;
  message: string;
  cause?: unknown;
};

export interface DailyPriceRepositoryPort {
  ensureSchema(): Promise<void>;
  /**
   * Returns how many rows were newly written; rows whose (symbol, date) already exists are skipped.
   * Rows the store refuses as data come back as an error; an unavailable store throws PersistenceError.
   */
  insertIgnoringDuplicates(
    rows: NormalizedRow[],
  ): Promise<Result<number, RowRejection>>;
}

export interface FetchStateRepositoryPort {
  ensureSchema(): Promise<void>;
  get(symbol: string): Promise<SymbolFetchState | null>;
  record(state: SymbolFetchState): Promise<void>;
  list(): Promise<SymbolFetchState[]>;
}

export type SnapshotWriteRequest = {
  symbol: string;
  fetchedOn: string;
  payload: unknown;
};

export type SnapshotStoreError = {
  code: "write_failed" | "not_found" | "read_failed" | "invalid_json";
  path: string;
  message: string;
  cause?: unknown;
};

export interface RawSnapshotStorePort {
  write(request: SnapshotWriteRequest): Promise<Result<string, SnapshotStoreError>>;
  read(path: string): Promise<Result<unknown, SnapshotStoreError>>;
}

export interface ClockPort {
  now(): Date;
}
