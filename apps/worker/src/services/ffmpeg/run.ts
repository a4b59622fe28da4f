import { z } from "zod";

import { runCommand, type CommandRunner } from "../process";

const ProbeSchema = z.object({
  format: z.object({
    duration: z.coerce.number().positive(),
  }),
});

export async function runFFmpeg(args: string[], runner: CommandRunner = runCommand): Promise<void> {
  await runner("ffmpeg", args);
}

/**
 * Container duration in seconds, as reported by ffprobe.
 */
export async function probeDurationSeconds(inputPath: string, runner: CommandRunner = runCommand): Promise<number> {
  const { stdout } = await runner(
    "ffprobe",
    ["-v", "error", "-show_entries", "format=duration", "-of", "json", inputPath],
    { timeoutMs: 60_000 },
  );

  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new Error(`ffprobe returned invalid JSON for ${inputPath}`, { cause: error });
  }

  const parsed = ProbeSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`ffprobe reported no duration for ${inputPath}`);
  }
  return parsed.data.format.duration;
}
