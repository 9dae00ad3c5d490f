import "dotenv/config";
import { USAGE, UsageError, parseArgs, type CliCommand } from "./cli-args";
import {
  EXECUTION_CONSTANTS,
  Logger,
  RunError,
  runCityListing,
  runCrawl,
  runSucceeded,
} from "./core";
import { getAdapter } from "./sites/registry";

/**
 * First signal cancels the run; walkers wind down and the output is still
 * written. A second signal, or a run that does not stop in time, exits hard.
 */
function installShutdown(controller: AbortController): void {
  let received = 0;
  const shutdown = (signal: NodeJS.Signals) => {
    received++;
    if (received > 1) {
      Logger.warn(`Second ${signal}, exiting now`);
      process.exit(1);
    }
    Logger.info("Graceful shutdown initiated", { signal });
    controller.abort();
    setTimeout(() => {
      Logger.warn(`Forced exit after ${EXECUTION_CONSTANTS.FORCED_EXIT_MS}ms`);
      process.exit(1);
    }, EXECUTION_CONSTANTS.FORCED_EXIT_MS).unref();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

async function execute(
  cmd: Exclude<CliCommand, { command: "help" }>,
  signal: AbortSignal,
): Promise<number> {
  const adapter = getAdapter(cmd.site);

  if (cmd.command === "cities") {
    const report = await runCityListing({
      adapter,
      pacing: cmd.pacing,
      outputPath: cmd.outputPath,
      signal,
    });
    Logger.info(`✅ ${report.written} cities written to ${report.outputPath}`);
    return 0;
  }

  const report = await runCrawl({
    adapter,
    cityId: cmd.cityId,
    categories: cmd.categories,
    outputPath: cmd.outputPath,
    pacing: cmd.pacing,
    fetchDetails: cmd.fetchDetails,
    cityLookup: cmd.cityLookup,
    signal,
  });
  if (!runSucceeded(report)) {
    Logger.error("❌ No category completed", undefined, {
      city: report.city.id,
      output: report.outputPath,
    });
    return 1;
  }
  return 0;
}

async function main(): Promise<number> {
  let cmd: CliCommand;
  try {
    cmd = parseArgs(process.argv.slice(2));
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    Logger.error(`❌ ${e.message}`);
    Logger.info(USAGE);
    return 1;
  }
  if (cmd.command === "help") {
    Logger.info(USAGE);
    return 0;
  }

  const controller = new AbortController();
  installShutdown(controller);
  try {
    return await execute(cmd, controller.signal);
  } catch (e) {
    if (!(e instanceof RunError)) throw e;
    Logger.error(`❌ ${e.message}`, e.cause);
    return 1;
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    Logger.error("❌ Unexpected failure", e);
    process.exitCode = 1;
  });
