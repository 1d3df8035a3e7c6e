import { runCli } from "./cli/main";
import { isEtlFatalError } from "./core/entities/appError";
import { logger, toErrorDetails } from "./shared/logger/logger";

runCli(process.argv).catch((error) => {
  logger.error(
    {
      code: isEtlFatalError(error) ? error.code : undefined,
      error: toErrorDetails(error),
    },
    "ETL command failed",
  );
  process.exit(1);
});
