import { errorMessage, isFatalStoreError, isStoreCorruptError, logger } from "@shortloop/shared";

import type { RunSummary } from "./scheduler/scheduler";
import type { WorkerRuntime } from "./runtime";

export const EXIT_ADVANCED = 0;
export const EXIT_FATAL = 1;
export const EXIT_IDLE = 2;

export const USAGE = `
Usage: shortloop <command> [options]

Commands:
  run [--skip-discovery] [--max-items N]   Discover new sources, then advance the pipeline once
  discover                                 Record new sources from the channel only
  status [--top N]                         Print tracked items and today's quota usage as JSON

Exit codes (run):
  0  work advanced
  2  nothing eligible
  1  fatal store or configuration error
`;

export type CliCommand =
  | { command: "run"; skipDiscovery: boolean; maxItems?: number }
  | { command: "discover" }
  | { command: "status"; top?: number }
  | { command: "help" };

function positiveInt(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || !Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} expects a positive integer, got ${raw ?? "nothing"}`);
  }
  return value;
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    return { command: "help" };
  }

  if (command === "run") {
    let skipDiscovery = false;
    let maxItems: number | undefined;
    for (let i = 0; i < rest.length; i++) {
      const arg = rest[i];
      if (arg === "--skip-discovery") {
        skipDiscovery = true;
      } else if (arg === "--max-items") {
        maxItems = positiveInt(arg, rest[i + 1]);
        i += 1;
      } else {
        throw new Error(`Unknown option for run: ${arg}`);
      }
    }
    return { command: "run", skipDiscovery, maxItems };
  }

  if (command === "discover") {
    if (rest.length > 0) throw new Error(`discover takes no options, got ${rest.join(" ")}`);
    return { command: "discover" };
  }

  if (command === "status") {
    if (rest.length === 0) return { command: "status" };
    if (rest[0] === "--top" && rest.length === 2) {
      return { command: "status", top: positiveInt("--top", rest[1]) };
    }
    throw new Error(`Unknown option for status: ${rest.join(" ")}`);
  }

  throw new Error(`Unknown command: ${command}`);
}

export function exitCodeFor(summary: RunSummary): number {
  switch (summary.outcome) {
    case "advanced":
      return EXIT_ADVANCED;
    case "idle":
      return EXIT_IDLE;
    case "fatal":
      return EXIT_FATAL;
  }
}

/**
 * Executes a parsed command and returns the process exit code. Output for
 * the operator goes to `print`; everything else is logged.
 */
export async function executeCommand(
  cli: CliCommand,
  runtime: WorkerRuntime,
  print: (text: string) => void = (text) => console.log(text),
): Promise<number> {
  switch (cli.command) {
    case "help":
      print(USAGE);
      return EXIT_ADVANCED;

    case "discover": {
      const summary = await runtime.discover();
      print(JSON.stringify(summary ?? { skipped: "no source channel configured" }, null, 2));
      return EXIT_ADVANCED;
    }

    case "status": {
      const report = await runtime.status(cli.top);
      print(JSON.stringify(report, null, 2));
      return EXIT_ADVANCED;
    }

    case "run": {
      let summary: RunSummary;
      try {
        summary = await runPipeline(cli, runtime);
      } catch (error) {
        await runtime.notifier.runAborted(errorMessage(error));
        throw error;
      }

      await runtime.notifier.runFinished(summary);
      print(JSON.stringify(summary, null, 2));
      return exitCodeFor(summary);
    }
  }
}

async function runPipeline(cli: Extract<CliCommand, { command: "run" }>, runtime: WorkerRuntime): Promise<RunSummary> {
  const scheduler = runtime.createScheduler();

  if (!cli.skipDiscovery) {
    try {
      await runtime.discover();
    } catch (error) {
      // A store that cannot be read will fail the run below as well.
      if (isFatalStoreError(error) || (isStoreCorruptError(error) && error.itemId === undefined)) {
        throw error;
      }
      logger.error("discovery_failed", { service: "worker", error: errorMessage(error) });
    }
  }

  return scheduler.runOnce(cli.maxItems);
}
