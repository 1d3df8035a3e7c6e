import * as cron from "node-cron";
import {
  ConfigurationError,
  isEtlFatalError,
} from "../core/entities/appError";
import type { PipelineRunReport } from "../application/services/etlPipelineService";
import {
  logger as rootLogger,
  type Logger,
  toErrorDetails,
} from "../shared/logger/logger";

type RunnablePipeline = {
  run(): Promise<PipelineRunReport>;
};

/**
 * Calls the pipeline on a cron cadence. It holds no pipeline state of its own: a trigger that fires while
 * a pass is still running is skipped, and a failed pass is logged and left for the next trigger.
 */
export class DailyPipelineScheduler {
  private task: cron.ScheduledTask | null = null;
  private running = false;
  private readonly logger: Logger;

  constructor(
    private readonly pipeline: RunnablePipeline,
    private readonly cronExpression: string,
    private readonly timezone?: string,
    logger: Logger = rootLogger,
  ) {
    if (!cron.validate(cronExpression)) {
      throw new ConfigurationError(
        `Invalid schedule cron expression '${cronExpression}'.`,
      );
    }
    this.logger = logger.child({ component: "scheduler" });
  }

  start(): void {
    if (this.task) {
      return;
    }

    this.task = cron.schedule(
      this.cronExpression,
      () => {
        void this.tick();
      },
      { timezone: this.timezone },
    );
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Never rejects. Returns null when the trigger was skipped or the pass failed.
   */
  async tick(): Promise<PipelineRunReport | null> {
    if (this.running) {
      this.logger.warn("Previous ETL run still in progress; trigger skipped");
      return null;
    }

    this.running = true;
    try {
      return await this.pipeline.run();
    } catch (error) {
      this.logger.error(
        {
          fatal: isEtlFatalError(error),
          error: toErrorDetails(error),
        },
        "Scheduled ETL run failed",
      );
      return null;
    } finally {
      this.running = false;
    }
  }
}
