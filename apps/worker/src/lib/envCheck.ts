import { logger } from "@shortloop/shared";

import type { WorkerConfig } from "../config";
import { CommandFailedError, runCommand, type CommandRunner } from "../services/process";

export type WorkerEnvStatus = {
  ok: boolean;
  ffmpegOk: boolean;
  ffprobeOk: boolean;
  ytDlpOk: boolean;
  missingEnv: string[];
};

async function binaryAvailable(runner: CommandRunner, command: string, versionFlag: string): Promise<boolean> {
  try {
    await runner(command, [versionFlag], { timeoutMs: 5000 });
    return true;
  } catch (error) {
    // Anything but "not found" means the binary exists.
    return !(error instanceof CommandFailedError && error.reason === "not_found");
  }
}

/**
 * Verifies the worker environment: the settings each configured
 * collaborator needs, and the external binaries the default stages spawn.
 * Missing binaries are reported but do not make the environment unusable;
 * the stage that needs one fails on its own.
 */
export async function verifyWorkerEnvironment(
  config: WorkerConfig,
  runner: CommandRunner = runCommand,
): Promise<WorkerEnvStatus> {
  const missingEnv: string[] = [];
  if (config.tracking.backend === "supabase") {
    if (!config.tracking.supabaseUrl) missingEnv.push("SUPABASE_URL");
    if (!config.tracking.supabaseServiceRoleKey) missingEnv.push("SUPABASE_SERVICE_ROLE_KEY");
  }
  if (!config.publish.accessToken) {
    missingEnv.push("YOUTUBE_ACCESS_TOKEN");
  }

  const [ffmpegOk, ffprobeOk, ytDlpOk] = await Promise.all([
    binaryAvailable(runner, "ffmpeg", "-version"),
    binaryAvailable(runner, "ffprobe", "-version"),
    binaryAvailable(runner, "yt-dlp", "--version"),
  ]);

  const status: WorkerEnvStatus = {
    ok: missingEnv.length === 0,
    ffmpegOk,
    ffprobeOk,
    ytDlpOk,
    missingEnv,
  };

  if (status.ok && ffmpegOk && ffprobeOk && ytDlpOk) {
    logger.info("worker_env_ok", { service: "worker" });
  } else {
    logger.warn("worker_env_problem", { service: "worker", ...status });
  }

  return status;
}
