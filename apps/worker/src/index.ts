import {
  APP_NAME,
  APP_VERSION,
  configureLogger,
  createRootCauseAnalyzer,
  getErrorCode,
} from "@faultline/shared";
import { env } from "./lib/env";
import { buildAppConfig } from "./lib/config";
import { StsCredentialProvider } from "./clients/sts-credentials";
import { SlsQueryClient } from "./clients/sls-query-client";
import { readCases } from "./cases/reader";
import { runCases } from "./cases/runner";
import { writeOutputs } from "./cases/writer";

const config = buildAppConfig(env);
const logger = configureLogger({ level: config.logLevel });

logger.info(`Starting ${APP_NAME} Worker v${APP_VERSION}`);

async function main() {
  const credentials = new StsCredentialProvider(config.sts, {
    logger: logger.child("faultline:sts"),
  });
  const queryClient = new SlsQueryClient(credentials, {
    retry: config.queryRetry,
    logger: logger.child("faultline:sls"),
  });
  const analyzer = createRootCauseAnalyzer({
    queryClient,
    config: config.analysis,
    logger,
  });

  // Fail early on bad credentials, but keep going: each case reports its own failure
  try {
    await credentials.getValidCredentials();
  } catch (error) {
    logger.warn("Credential check failed, continuing", {
      code: getErrorCode(error),
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const controller = new AbortController();
  const handleShutdown = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, stopping`);
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  process.once("SIGINT", handleShutdown);
  process.once("SIGTERM", handleShutdown);

  const { cases, skipped } = await readCases(config.runner.inputFile, logger);
  logger.info("Loaded cases", {
    inputFile: config.runner.inputFile,
    cases: cases.length,
    skipped: skipped.length,
  });

  const { outputs, summary } = await runCases(analyzer, cases, {
    maxRootCauses: config.runner.maxRootCauses,
    signal: controller.signal,
    logger: logger.child("faultline:runner"),
  });

  await writeOutputs(config.runner.outputFile, outputs);
  logger.info("Results written", { outputFile: config.runner.outputFile, ...summary });

  process.exitCode = summary.aborted ? 130 : 0;
}

main().catch((error) => {
  logger.error("Worker failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
