import { ExtractionService } from "../services/extractionService";
import { TransformationService } from "../services/transformationService";
import { LoadingService } from "../services/loadingService";
import { EtlPipelineService } from "../services/etlPipelineService";
import type { AppConfig } from "../../shared/config/env";
import { createDb } from "../../infra/db/client";
import {
  PostgresDailyPriceRepository,
  PostgresFetchStateRepository,
} from "../../infra/db/repositories";
import { AlphaVantageDailySeriesProvider } from "../../infra/providers/alphavantage/alphaVantageDailySeriesProvider";
import { FileRawSnapshotStore } from "../../infra/storage/fileRawSnapshotStore";
import { SystemClock } from "../../infra/system/systemPorts";

/**
 * Single composition root: every adapter gets its settings from the config value built at startup.
 */
export const createRuntime = (config: AppConfig) => {
  const { db, close } = createDb(config.postgresUrl);
  const clock = new SystemClock();

  const priceRepo = new PostgresDailyPriceRepository(db);
  const fetchStateRepo = new PostgresFetchStateRepository(db);
  const snapshotStore = new FileRawSnapshotStore(config.rawDataDir);

  const provider = new AlphaVantageDailySeriesProvider(
    config.alphaVantage.baseUrl,
    config.alphaVantage.apiKey,
    config.alphaVantage.timeoutMs,
    config.alphaVantage.retries,
  );

  const extraction = new ExtractionService(
    provider,
    snapshotStore,
    fetchStateRepo,
    clock,
    {
      seriesKey: config.alphaVantage.seriesKey,
      timeZone: config.timezone,
    },
  );
  const transformation = new TransformationService(
    snapshotStore,
    clock,
    config.alphaVantage.seriesKey,
  );
  const loading = new LoadingService(priceRepo);

  const pipeline = new EtlPipelineService(
    { extraction, transformation, loading },
    config.symbols,
    clock,
  );

  return {
    pipeline,
    fetchStateRepo,
    close,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
