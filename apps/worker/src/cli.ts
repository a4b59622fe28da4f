import "dotenv/config";

import { captureError, errorMessage, flushSentry, initSentry, logger } from "@shortloop/shared";

import { EXIT_FATAL, executeCommand, parseCliArgs, USAGE, type CliCommand } from "./commands";
import { loadWorkerConfig } from "./config";
import { verifyWorkerEnvironment } from "./lib/envCheck";
import { WorkerRuntime } from "./runtime";

async function main(): Promise<number> {
  let cli: CliCommand;
  try {
    cli = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`${errorMessage(error)}\n${USAGE}`);
    return EXIT_FATAL;
  }

  initSentry("worker");

  try {
    const runtime = new WorkerRuntime(loadWorkerConfig());
    if (cli.command === "run") {
      await verifyWorkerEnvironment(runtime.config);
    }
    return await executeCommand(cli, runtime);
  } catch (error) {
    captureError(error, { command: cli.command });
    logger.error("cli_failed", { service: "worker", command: cli.command, error: errorMessage(error) });
    return EXIT_FATAL;
  }
}

main()
  .then(async (code) => {
    await flushSentry();
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_FATAL;
  });
