import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type {
  SchemaIssue,
  SchemaValidationError,
} from "../entities/appError";
import type { PriceBar, TimeSeriesResponse } from "../entities/priceBar";
import {
  describeValue,
  isPlainObject,
  toFiniteNumber,
  toSafeInteger,
} from "./numeric";

export const DEFAULT_SERIES_KEY = "Time Series (Daily)";

/**
 * Field names of one day's bar in the provider payload. External contract, not ours to rename.
 */
export const PRICE_BAR_FIELDS = {
  open: "1. open",
  high: "2. high",
  low: "3. low",
  close: "4. close",
  volume: "5. volume",
} as const;

// Calendar-aware: 2026-02-30 and 2026-13-01 are rejected, 2024-02-29 is not.
const tradingDateKey = z.string().date("Expected an ISO trading date key");

export const isIsoTradingDate = (value: string): boolean =>
  tradingDateKey.safeParse(value).success;

const RATE_LIMIT_FIELDS = ["Information", "Note"] as const;
const PROVIDER_ERROR_FIELD = "Error Message";

const numericField = (expected: "number" | "integer") =>
  z.unknown().transform((value, ctx) => {
    const parsed =
      expected === "integer" ? toSafeInteger(value) : toFiniteNumber(value);

    if (parsed === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message:
          expected === "integer" ? "Expected an integer" : "Expected a number",
        params: { expected },
      });
      return z.NEVER;
    }

    return parsed;
  });

const priceBarSchema = z
  .object({
    [PRICE_BAR_FIELDS.open]: numericField("number"),
    [PRICE_BAR_FIELDS.high]: numericField("number"),
    [PRICE_BAR_FIELDS.low]: numericField("number"),
    [PRICE_BAR_FIELDS.close]: numericField("number"),
    [PRICE_BAR_FIELDS.volume]: numericField("integer"),
  })
  .transform(
    (raw): PriceBar => ({
      open: raw[PRICE_BAR_FIELDS.open],
      high: raw[PRICE_BAR_FIELDS.high],
      low: raw[PRICE_BAR_FIELDS.low],
      close: raw[PRICE_BAR_FIELDS.close],
      volume: raw[PRICE_BAR_FIELDS.volume],
    }),
  );

const dailySeriesSchema = z
  .record(
    tradingDateKey,
    priceBarSchema,
  )
  .refine((series) => Object.keys(series).length > 0, {
    message: "Time series must contain at least one trading day",
    params: { expected: "non-empty mapping" },
  });

export const formatPath = (segments: ReadonlyArray<string | number>): string =>
  segments.length === 0
    ? "$"
    : segments
        .map((segment) =>
          typeof segment === "number" ? `[${segment}]` : `[${JSON.stringify(segment)}]`,
        )
        .join("");

const valueAt = (
  root: unknown,
  path: ReadonlyArray<string | number>,
): unknown => {
  let current: unknown = root;
  for (const segment of path) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[String(segment)];
  }
  return current;
};

const toSchemaIssue = (
  issue: z.ZodIssue,
  seriesKey: string,
  rawSeries: unknown,
): SchemaIssue => {
  const path = formatPath([seriesKey, ...issue.path]);

  if (issue.code === z.ZodIssueCode.invalid_type) {
    return {
      path,
      expected: issue.expected,
      received: issue.received,
      message: issue.message,
    };
  }

  if (issue.code === z.ZodIssueCode.invalid_string) {
    return {
      path,
      expected: "ISO date (YYYY-MM-DD)",
      received: describeValue(issue.path.at(-1)),
      message: issue.message,
    };
  }

  const expected: unknown =
    issue.code === z.ZodIssueCode.custom ? issue.params?.expected : undefined;

  return {
    path,
    expected: typeof expected === "string" ? expected : issue.message,
    received: describeValue(valueAt(rawSeries, issue.path)),
    message: issue.message,
  };
};

const schemaError = (
  symbol: string,
  issues: SchemaIssue[],
): SchemaValidationError => {
  const first = issues.at(0);
  const summary = first ? ` First issue at ${first.path}: ${first.message}.` : "";

  return {
    kind: "schema_validation",
    stage: "extract",
    symbol,
    message: `Daily series payload for ${symbol} failed validation with ${issues.length} issue(s).${summary}`,
    retryable: false,
    issues,
  };
};

/**
 * Checks an untyped provider body against the daily series contract and returns an immutable typed response.
 */
export const parseTimeSeriesResponse = (
  payload: unknown,
  symbol: string,
  seriesKey: string = DEFAULT_SERIES_KEY,
): Result<TimeSeriesResponse, SchemaValidationError> => {
  if (!isPlainObject(payload)) {
    return err(
      schemaError(symbol, [
        {
          path: "$",
          expected: "object",
          received: describeValue(payload),
          message: "Response body must be a JSON object",
        },
      ]),
    );
  }

  const rawSeries = payload[seriesKey];
  if (rawSeries === undefined) {
    return err(
      schemaError(symbol, [
        {
          path: formatPath([seriesKey]),
          expected: "mapping of trading date to price bar",
          received: "undefined",
          message: `Response is missing the "${seriesKey}" field`,
        },
      ]),
    );
  }

  const parsed = dailySeriesSchema.safeParse(rawSeries);
  if (!parsed.success) {
    return err(
      schemaError(
        symbol,
        parsed.error.issues.map((issue) =>
          toSchemaIssue(issue, seriesKey, rawSeries),
        ),
      ),
    );
  }

  return ok(
    Object.freeze({
      symbol,
      series: Object.freeze(parsed.data),
    }),
  );
};

export type ProviderNotice = {
  kind: "rate_limit" | "provider_error";
  field: string;
  message: string;
};

/**
 * Recognizes informational bodies the provider sends in place of a series (quota notices, rejected calls).
 */
export const detectProviderNotice = (
  payload: unknown,
  seriesKey: string = DEFAULT_SERIES_KEY,
): ProviderNotice | null => {
  if (!isPlainObject(payload) || seriesKey in payload) {
    return null;
  }

  for (const field of RATE_LIMIT_FIELDS) {
    const value = payload[field];
    if (typeof value === "string" && value.trim()) {
      return { kind: "rate_limit", field, message: value.trim() };
    }
  }

  const errorMessage = payload[PROVIDER_ERROR_FIELD];
  if (typeof errorMessage === "string" && errorMessage.trim()) {
    return {
      kind: "provider_error",
      field: PROVIDER_ERROR_FIELD,
      message: errorMessage.trim(),
    };
  }

  return null;
};
