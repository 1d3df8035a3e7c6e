import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  dailySeriesPayload,
  fixedClock,
  InMemoryDailyPriceRepository,
  InMemoryFetchStateRepository,
} from "../../__tests__/support/inMemoryStores";
import { AlphaVantageDailySeriesProvider } from "../../infra/providers/alphavantage/alphaVantageDailySeriesProvider";
import { FileRawSnapshotStore } from "../../infra/storage/fileRawSnapshotStore";
import { EtlPipelineService } from "./etlPipelineService";
import { ExtractionService } from "./extractionService";
import { LoadingService } from "./loadingService";
import { TransformationService } from "./transformationService";

const SERIES_KEY = "Time Series (Daily)";
const originalFetch = globalThis.fetch;

/**
 * Runs the real provider, file snapshot store and stage services against an in-process HTTP stub.
 */
describe("Pipeline integration", () => {
  let directory = "";
  const requestedUrls: string[] = [];

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "daily-etl-"));
    requestedUrls.length = 0;
    globalThis.fetch = async (input) => {
      const url = new URL(String(input));
      requestedUrls.push(url.toString());
      const symbol = url.searchParams.get("symbol") ?? "";
      return new Response(
        JSON.stringify(
          dailySeriesPayload(symbol, {
            "2026-03-03": { open: 150, high: 155, low: 148, close: 153, volume: 51000 },
            "2026-03-02": { open: 100, high: 106, low: 99, close: 105, volume: 48000 },
          }),
        ),
        { status: 200, headers: { "content-type": "application/json" } },
      );
    };
  });

  afterEach(async () => {
    globalThis.fetch = originalFetch;
    await rm(directory, { recursive: true, force: true });
  });

  const buildPipeline = () => {
    const clock = fixedClock("2026-03-04T00:30:00.000Z");
    const snapshots = new FileRawSnapshotStore(join(directory, "raw_data"));
    const fetchStates = new InMemoryFetchStateRepository();
    const priceRepo = new InMemoryDailyPriceRepository();
    const provider = new AlphaVantageDailySeriesProvider(
      "https://www.alphavantage.co",
      "test-key",
      1_000,
    );

    const pipeline = new EtlPipelineService(
      {
        extraction: new ExtractionService(provider, snapshots, fetchStates, clock, {
          seriesKey: SERIES_KEY,
        }),
        transformation: new TransformationService(snapshots, clock, SERIES_KEY),
        loading: new LoadingService(priceRepo),
      },
      ["AAPL"],
      clock,
    );

    return { pipeline, priceRepo, fetchStates };
  };

  it("fetches, snapshots, normalizes and loads a symbol end to end", async () => {
    const { pipeline, priceRepo, fetchStates } = buildPipeline();

    const report = await pipeline.run();

    const snapshotPath = join(directory, "raw_data", "AAPL_2026-03-04.json");
    expect(report.outcomes).toEqual([
      {
        symbol: "AAPL",
        status: "loaded",
        outputSize: "full",
        snapshotPath,
        submitted: 2,
        inserted: 2,
      },
    ]);
    expect(requestedUrls).toEqual([
      "https://www.alphavantage.co/query?function=TIME_SERIES_DAILY&symbol=AAPL&apikey=test-key&outputsize=full",
    ]);

    const snapshot: unknown = JSON.parse(await readFile(snapshotPath, "utf8"));
    expect(snapshot).toMatchObject({ "Meta Data": { "2. Symbol": "AAPL" } });

    const row = priceRepo.find("AAPL", "2026-03-02");
    expect(row).toMatchObject({
      open: 100,
      high: 106,
      low: 99,
      close: 105,
      volume: 48000,
    });
    expect(row?.dailyChangePercentage).toBeCloseTo(5, 10);
    expect(fetchStates.states.get("AAPL")?.lastOutputSize).toBe("full");
  });

  it("switches to compact and inserts nothing on an unchanged rerun", async () => {
    const { pipeline, priceRepo } = buildPipeline();

    await pipeline.run();
    const rerun = await pipeline.run();

    expect(rerun.insertedTotal).toBe(0);
    expect(requestedUrls.at(-1)).toContain("outputsize=compact");
    expect(priceRepo.rows.size).toBe(2);
  });
});
