import { EnvSchema } from "@shortloop/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { buildWorkerConfig } from "../../src/config";
import { verifyWorkerEnvironment } from "../../src/lib/envCheck";
import { CommandFailedError, type CommandResult } from "../../src/services/process";
import { silenceLogs } from "../helpers";

describe("verifyWorkerEnvironment", () => {
  beforeEach(() => {
    silenceLogs();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns ok when settings and binaries are present", async () => {
    const config = buildWorkerConfig(EnvSchema.parse({ YOUTUBE_ACCESS_TOKEN: "test-secret" }));
    const runner = vi.fn<[command: string], Promise<CommandResult>>(async () => ({ stdout: "version 1", stderr: "" }));

    const status = await verifyWorkerEnvironment(config, runner);

    expect(status).toEqual({ ok: true, ffmpegOk: true, ffprobeOk: true, ytDlpOk: true, missingEnv: [] });
    expect(runner.mock.calls.map(([command]) => command)).toEqual(["ffmpeg", "ffprobe", "yt-dlp"]);
  });

  it("reports missing settings for the configured backend and binaries that are not installed", async () => {
    const config = buildWorkerConfig(EnvSchema.parse({ TRACKING_BACKEND: "supabase" }));
    const runner = vi.fn(async (command: string): Promise<CommandResult> => {
      if (command === "yt-dlp") throw new CommandFailedError(command, "not_found");
      if (command === "ffprobe") throw new CommandFailedError(command, "exit_code", { exitCode: 1 });
      return { stdout: "", stderr: "" };
    });

    const status = await verifyWorkerEnvironment(config, runner);

    expect(status).toEqual({
      ok: false,
      ffmpegOk: true,
      ffprobeOk: true,
      ytDlpOk: false,
      missingEnv: ["SUPABASE_URL", "SUPABASE_SERVICE_ROLE_KEY", "YOUTUBE_ACCESS_TOKEN"],
    });
  });
});
