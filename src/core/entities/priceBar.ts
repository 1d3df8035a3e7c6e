export type OutputSize = "compact" | "full";

/**
 * One trading day's observation for one symbol, after schema validation.
 */
export type PriceBar = {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/**
 * Validated provider payload: ISO trading date to price bar, in source order.
 */
export type TimeSeriesResponse = {
  readonly symbol: string;
  readonly series: Readonly<Record<string, Readonly<PriceBar>>>;
};

export type NormalizedRow = {
  symbol: string;
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number | null;
  dailyChangePercentage: number | null;
  extractionTimestamp: Date;
};

/**
 * Points at the raw snapshot written by one successful extraction.
 */
export type RawArtifactHandle = {
  symbol: string;
  path: string;
  fetchedOn: string;
  outputSize: OutputSize;
  tradingDayCount: number;
};

/**
 * Remembers the last successful fetch per symbol so the next run can request only the recent window.
 */
export type SymbolFetchState = {
  symbol: string;
  lastFetchedOn: string;
  lastOutputSize: OutputSize;
  updatedAt: Date;
};
