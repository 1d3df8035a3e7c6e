import { Command } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type {
  PipelineRunReport,
  SymbolOutcome,
} from "../application/services/etlPipelineService";
import {
  type AppConfig,
  describeConfig,
  loadAppConfig,
} from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";
import { DailyPipelineScheduler } from "./dailyScheduler";

const formatOutcome = (outcome: SymbolOutcome): string => {
  if (outcome.status === "failed") {
    const failure = outcome.failure;
    return `- ${outcome.symbol}: failed [${failure.kind}] at ${failure.stage}${failure.retryable ? " (retry later)" : ""}: ${failure.message}`;
  }

  return `- ${outcome.symbol}: ${outcome.status} (${outcome.outputSize}) submitted=${outcome.submitted}, inserted=${outcome.inserted}`;
};

/**
 * Formats a run report into a compact terminal summary, one line per symbol.
 */
export const formatRunReport = (report: PipelineRunReport): string => {
  const lines: string[] = [];

  lines.push(
    `ETL run ${report.startedAt.toISOString()} -> ${report.finishedAt.toISOString()}`,
  );
  report.outcomes.forEach((outcome) => lines.push(formatOutcome(outcome)));
  lines.push(`New rows: ${report.insertedTotal}`);
  lines.push(
    `Failed symbols: ${report.failedSymbols.length > 0 ? report.failedSymbols.join(", ") : "none"}`,
  );

  return lines.join("\n");
};

/**
 * Defines a single command surface so one-shot and scheduled runs share the same wiring.
 */
export const buildCli = (loadConfig: () => AppConfig = () => loadAppConfig()) => {
  const cli = new Command();
  cli
    .name("daily-price-etl")
    .description("Daily equity price ETL: Alpha Vantage -> Postgres");

  cli
    .command("run")
    .description("Run one ETL pass over every configured symbol, then exit")
    .action(async () => {
      const config = loadConfig();
      const runtime = createRuntime(config);

      try {
        const report = await runtime.pipeline.run();
        console.log(formatRunReport(report));
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("schedule")
    .description("Run the ETL pass on the configured cron schedule")
    .option("--run-now", "Run one pass immediately, then wait for the trigger")
    .action(async (opts: { runNow?: boolean }) => {
      const config = loadConfig();
      const runtime = createRuntime(config);
      const scheduler = new DailyPipelineScheduler(
        runtime.pipeline,
        config.scheduleCron,
        config.timezone,
      );

      const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
        logger.info({ signal }, "Stopping scheduler");
        scheduler.stop();
        await runtime.close();
        process.exit(0);
      };

      (["SIGINT", "SIGTERM"] as const).forEach((signal) => {
        process.once(signal, () => {
          shutdown(signal).catch((error) => {
            logger.error({ error: toErrorDetails(error) }, "Shutdown failed");
            process.exit(1);
          });
        });
      });

      scheduler.start();
      logger.info(
        { cron: config.scheduleCron, timezone: config.timezone ?? "UTC" },
        "Scheduler started. Waiting for the scheduled time",
      );

      if (opts.runNow) {
        const report = await scheduler.tick();
        if (report) {
          console.log(formatRunReport(report));
        }
      }
    });

  cli
    .command("status")
    .description("Report configuration and per-symbol fetch state")
    .action(async () => {
      const config = loadConfig();
      const runtime = createRuntime(config);

      try {
        await runtime.fetchStateRepo.ensureSchema();
        const fetchStates = await runtime.fetchStateRepo.list();
        const bySymbol = new Map(
          fetchStates.map((state) => [state.symbol, state]),
        );

        logger.info(
          {
            config: describeConfig(config),
            symbols: config.symbols.map((symbol) => {
              const state = bySymbol.get(symbol);
              return {
                symbol,
                nextOutputSize: state ? "compact" : "full",
                lastFetchedOn: state?.lastFetchedOn ?? null,
                lastOutputSize: state?.lastOutputSize ?? null,
              };
            }),
          },
          "Runtime status",
        );
      } finally {
        await runtime.close();
      }
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
