import { describe, expect, it } from "vitest";
import { dailySeriesPayload } from "../../__tests__/support/inMemoryStores";
import {
  detectProviderNotice,
  parseTimeSeriesResponse,
} from "./timeSeriesSchema";

const validBar = {
  "1. open": "150.0000",
  "2. high": "155.2500",
  "3. low": "149.1000",
  "4. close": "153.0000",
  "5. volume": "51234567",
};

describe("parseTimeSeriesResponse", () => {
  it("returns typed bars in source order from provider string values", () => {
    const payload = dailySeriesPayload("AAPL", {
      "2026-03-03": { open: "151.5", high: "154", low: "150", close: "152", volume: "1000" },
      "2026-03-02": { open: "150", high: "155.25", low: "149.1", close: "153", volume: "2000" },
    });

    const result = parseTimeSeriesResponse(payload, "AAPL");

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.symbol).toBe("AAPL");
    expect(Object.keys(result.value.series)).toEqual(["2026-03-03", "2026-03-02"]);
    expect(result.value.series["2026-03-02"]).toEqual({
      open: 150,
      high: 155.25,
      low: 149.1,
      close: 153,
      volume: 2000,
    });
  });

  it("ignores extra per-day fields", () => {
    const result = parseTimeSeriesResponse(
      {
        "Time Series (Daily)": {
          "2026-03-02": { ...validBar, "6. dividend amount": "0.0000" },
        },
      },
      "AAPL",
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    expect(result.value.series["2026-03-02"]).toEqual({
      open: 150,
      high: 155.25,
      low: 149.1,
      close: 153,
      volume: 51234567,
    });
  });

  it("rejects a payload missing the time series field", () => {
    const result = parseTimeSeriesResponse({ "Meta Data": {} }, "AAPL");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.kind).toBe("schema_validation");
    expect(result.error.issues).toEqual([
      {
        path: '["Time Series (Daily)"]',
        expected: "mapping of trading date to price bar",
        received: "undefined",
        message: 'Response is missing the "Time Series (Daily)" field',
      },
    ]);
    expect(result.error.message).toBe(
      'Daily series payload for AAPL failed validation with 1 issue(s). First issue at ["Time Series (Daily)"]: Response is missing the "Time Series (Daily)" field.',
    );
  });

  it("honours a configured series key", () => {
    const result = parseTimeSeriesResponse(
      { "Weekly Time Series": { "2026-03-02": validBar } },
      "AAPL",
      "Weekly Time Series",
    );

    expect(result.isOk()).toBe(true);
  });

  it("rejects a non-numeric price field with the offending path", () => {
    const result = parseTimeSeriesResponse(
      {
        "Time Series (Daily)": {
          "2026-03-02": { ...validBar, "1. open": "n/a" },
        },
      },
      "MSFT",
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.issues).toEqual([
      {
        path: '["Time Series (Daily)"]["2026-03-02"]["1. open"]',
        expected: "number",
        received: 'string "n/a"',
        message: "Expected a number",
      },
    ]);
  });

  it("rejects a missing or fractional volume", () => {
    const { "5. volume": _volume, ...withoutVolume } = validBar;
    const result = parseTimeSeriesResponse(
      {
        "Time Series (Daily)": {
          "2026-03-02": withoutVolume,
          "2026-03-03": { ...validBar, "5. volume": "12.5" },
        },
      },
      "MSFT",
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.issues).toEqual([
      {
        path: '["Time Series (Daily)"]["2026-03-02"]["5. volume"]',
        expected: "integer",
        received: "undefined",
        message: "Expected an integer",
      },
      {
        path: '["Time Series (Daily)"]["2026-03-03"]["5. volume"]',
        expected: "integer",
        received: 'string "12.5"',
        message: "Expected an integer",
      },
    ]);
  });

  it("treats an empty mapping as malformed rather than zero data", () => {
    const result = parseTimeSeriesResponse({ "Time Series (Daily)": {} }, "GOOG");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.issues).toEqual([
      {
        path: '["Time Series (Daily)"]',
        expected: "non-empty mapping",
        received: "object",
        message: "Time series must contain at least one trading day",
      },
    ]);
  });

  it("rejects date keys that are not ISO dates", () => {
    const result = parseTimeSeriesResponse(
      { "Time Series (Daily)": { "03/02/2026": validBar } },
      "GOOG",
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.issues).toContainEqual({
      path: '["Time Series (Daily)"]["03/02/2026"]',
      expected: "ISO date (YYYY-MM-DD)",
      received: 'string "03/02/2026"',
      message: "Expected an ISO trading date key",
    });
  });

  it("rejects date keys that are not real calendar days", () => {
    const result = parseTimeSeriesResponse(
      { "Time Series (Daily)": { "2026-02-30": validBar, "2026-13-01": validBar } },
      "GOOG",
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.issues).toHaveLength(2);
    expect(result.error.issues).toContainEqual({
      path: '["Time Series (Daily)"]["2026-02-30"]',
      expected: "ISO date (YYYY-MM-DD)",
      received: 'string "2026-02-30"',
      message: "Expected an ISO trading date key",
    });
    expect(result.error.issues).toContainEqual({
      path: '["Time Series (Daily)"]["2026-13-01"]',
      expected: "ISO date (YYYY-MM-DD)",
      received: 'string "2026-13-01"',
      message: "Expected an ISO trading date key",
    });
  });

  it("accepts a leap day", () => {
    const result = parseTimeSeriesResponse(
      { "Time Series (Daily)": { "2024-02-29": validBar } },
      "GOOG",
    );

    expect(result.isOk()).toBe(true);
  });

  it("rejects hexadecimal numbers", () => {
    const result = parseTimeSeriesResponse(
      { "Time Series (Daily)": { "2026-03-02": { ...validBar, "2. high": "0x10" } } },
      "GOOG",
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.issues).toEqual([
      {
        path: '["Time Series (Daily)"]["2026-03-02"]["2. high"]',
        expected: "number",
        received: 'string "0x10"',
        message: "Expected a number",
      },
    ]);
  });

  it("rejects a body that is not an object", () => {
    const result = parseTimeSeriesResponse([], "GOOG");

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected validation error");
    }
    expect(result.error.issues).toEqual([
      {
        path: "$",
        expected: "object",
        received: "array",
        message: "Response body must be a JSON object",
      },
    ]);
  });
});

describe("detectProviderNotice", () => {
  it("classifies an Information body as a rate limit", () => {
    expect(
      detectProviderNotice({
        Information: " Our standard API rate limit is 25 requests per day. ",
      }),
    ).toEqual({
      kind: "rate_limit",
      field: "Information",
      message: "Our standard API rate limit is 25 requests per day.",
    });
  });

  it("classifies a Note body as a rate limit", () => {
    expect(detectProviderNotice({ Note: "Call frequency exceeded." })).toEqual({
      kind: "rate_limit",
      field: "Note",
      message: "Call frequency exceeded.",
    });
  });

  it("classifies an Error Message body as a provider error", () => {
    expect(
      detectProviderNotice({ "Error Message": "Invalid API call." }),
    ).toEqual({
      kind: "provider_error",
      field: "Error Message",
      message: "Invalid API call.",
    });
  });

  it("ignores bodies that carry the series field", () => {
    expect(
      detectProviderNotice({
        Information: "extra",
        "Time Series (Daily)": { "2026-03-02": validBar },
      }),
    ).toBeNull();
  });
});
