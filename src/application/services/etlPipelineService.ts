import {
  isEtlFatalError,
  type PipelineStage,
  type SymbolFailure,
} from "../../core/entities/appError";
import type { OutputSize } from "../../core/entities/priceBar";
import type { ClockPort } from "../../core/ports/outboundPorts";
import {
  logger as rootLogger,
  type Logger,
  toErrorDetails,
} from "../../shared/logger/logger";
import type { ExtractionService } from "./extractionService";
import type { LoadingService } from "./loadingService";
import type { TransformationService } from "./transformationService";

export type SymbolOutcome =
  | {
      symbol: string;
      status: "loaded" | "empty";
      outputSize: OutputSize;
      snapshotPath: string;
      submitted: number;
      inserted: number;
    }
  | {
      symbol: string;
      status: "failed";
      failure: SymbolFailure;
    };

export type PipelineRunReport = {
  startedAt: Date;
  finishedAt: Date;
  outcomes: SymbolOutcome[];
  insertedTotal: number;
  failedSymbols: string[];
};

type PipelineStages = {
  extraction: Pick<ExtractionService, "ensureSchema" | "extract">;
  transformation: Pick<TransformationService, "transform">;
  loading: Pick<LoadingService, "ensureSchema" | "load">;
};

/**
 * Sequences extract, transform and load per symbol. A symbol's failure ends only that symbol;
 * configuration and store outages end the run.
 */
export class EtlPipelineService {
  private readonly logger: Logger;

  constructor(
    private readonly stages: PipelineStages,
    private readonly symbols: readonly string[],
    private readonly clock: ClockPort,
    logger: Logger = rootLogger,
  ) {
    this.logger = logger.child({ component: "pipeline" });
  }

  async run(): Promise<PipelineRunReport> {
    const startedAt = this.clock.now();
    this.logger.info({ symbols: this.symbols }, "Starting ETL pipeline");

    await this.stages.loading.ensureSchema();
    await this.stages.extraction.ensureSchema();

    const outcomes: SymbolOutcome[] = [];
    // Sequential on purpose: the provider's per-minute quota is shared by every symbol.
    for (const symbol of this.symbols) {
      outcomes.push(await this.runSymbol(symbol));
    }

    const report: PipelineRunReport = {
      startedAt,
      finishedAt: this.clock.now(),
      outcomes,
      insertedTotal: outcomes.reduce(
        (total, outcome) =>
          outcome.status === "failed" ? total : total + outcome.inserted,
        0,
      ),
      failedSymbols: outcomes
        .filter((outcome) => outcome.status === "failed")
        .map((outcome) => outcome.symbol),
    };

    this.logger.info(
      {
        insertedTotal: report.insertedTotal,
        failedSymbols: report.failedSymbols,
        durationMs: report.finishedAt.getTime() - startedAt.getTime(),
      },
      "ETL pipeline finished",
    );

    return report;
  }

  private async runSymbol(symbol: string): Promise<SymbolOutcome> {
    let stage: PipelineStage = "extract";

    try {
      const artifact = await this.stages.extraction.extract(symbol);
      if (artifact.isErr()) {
        return this.failed(artifact.error);
      }

      stage = "transform";
      const rows = await this.stages.transformation.transform(
        artifact.value,
        symbol,
      );
      if (rows.isErr()) {
        return this.failed(rows.error);
      }

      stage = "load";
      const loaded = await this.stages.loading.load(symbol, rows.value);
      if (loaded.isErr()) {
        return this.failed(loaded.error);
      }

      this.logger.info(
        {
          symbol,
          outputSize: artifact.value.outputSize,
          submitted: loaded.value.submitted,
          inserted: loaded.value.inserted,
        },
        "Symbol processed",
      );

      return {
        symbol,
        status: loaded.value.status,
        outputSize: artifact.value.outputSize,
        snapshotPath: artifact.value.path,
        submitted: loaded.value.submitted,
        inserted: loaded.value.inserted,
      };
    } catch (error) {
      if (isEtlFatalError(error)) {
        throw error;
      }

      return this.failed({
        kind: "unexpected_error",
        stage,
        symbol,
        message: error instanceof Error ? error.message : String(error),
        retryable: false,
        cause: error,
      });
    }
  }

  private failed(failure: SymbolFailure): SymbolOutcome {
    const context = {
      symbol: failure.symbol,
      stage: failure.stage,
      kind: failure.kind,
      retryable: failure.retryable,
      reason: failure.message,
    };

    switch (failure.kind) {
      case "rate_limited":
        this.logger.warn(
          { ...context, httpStatus: failure.httpStatus },
          "Symbol throttled by provider; skipped this run",
        );
        break;
      case "transport_error":
        this.logger.error(
          { ...context, code: failure.code, httpStatus: failure.httpStatus },
          "Symbol fetch failed; skipped this run",
        );
        break;
      case "schema_validation":
        this.logger.error(
          { ...context, issues: failure.issues },
          "Symbol payload failed validation; skipped this run",
        );
        break;
      case "snapshot_storage":
      case "transform_error":
        this.logger.error(
          { ...context, path: failure.path },
          "Symbol snapshot unusable; skipped this run",
        );
        break;
      case "load_rejected":
        this.logger.error(
          { ...context, sqlState: failure.sqlState },
          "Symbol rows rejected by the store; skipped this run",
        );
        break;
      case "unexpected_error":
        this.logger.error(
          { ...context, error: toErrorDetails(failure.cause) },
          "Symbol failed unexpectedly; skipped this run",
        );
        break;
    }

    return { symbol: failure.symbol, status: "failed", failure };
  }
}
