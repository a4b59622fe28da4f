import { promises as fs } from "node:fs";
import { dirname } from "node:path";

import { logger } from "@shortloop/shared";

import { CommandFailedError, runCommand, type CommandRunner } from "../process";

const FORMAT = "bestvideo[ext=mp4]+bestaudio[ext=m4a]/best[ext=mp4]/best";

/** Messages yt-dlp prints for videos that will never become downloadable. */
const UNAVAILABLE_PATTERNS = [
  /video unavailable/i,
  /private video/i,
  /has been removed/i,
  /account .* terminated/i,
  /not available in your country/i,
  /members-only/i,
];

export interface DownloadResult {
  localPath: string;
  sizeBytes: number;
  /** The file was already present from an earlier attempt */
  reused: boolean;
}

export function isUnavailableVideoError(error: unknown): boolean {
  if (!(error instanceof CommandFailedError)) return false;
  return UNAVAILABLE_PATTERNS.some((pattern) => pattern.test(error.stderrTail));
}

async function nonEmptySize(path: string): Promise<number | null> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile() && stats.size > 0 ? stats.size : null;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Downloads a YouTube video to `targetPath` using yt-dlp.
 *
 * Writes to a sibling `.partial.mp4` path first and renames on success, so an
 * existing `targetPath` is always a complete download and is reused.
 */
export async function downloadYouTubeVideo(
  youtubeUrl: string,
  targetPath: string,
  runner: CommandRunner = runCommand,
): Promise<DownloadResult> {
  const existing = await nonEmptySize(targetPath);
  if (existing !== null) {
    logger.info("youtube_download_reused", { service: "worker", url: youtubeUrl, localPath: targetPath });
    return { localPath: targetPath, sizeBytes: existing, reused: true };
  }

  await fs.mkdir(dirname(targetPath), { recursive: true });
  const stem = targetPath.replace(/\.mp4$/i, "");
  const partialPath = `${stem}.partial.mp4`;

  logger.info("youtube_download_start", { service: "worker", url: youtubeUrl, localPath: targetPath });

  await runner("yt-dlp", [
    "--no-playlist",
    "--no-progress",
    "--format",
    FORMAT,
    "--merge-output-format",
    "mp4",
    "--output",
    `${stem}.partial.%(ext)s`,
    youtubeUrl,
  ]);

  const sizeBytes = await nonEmptySize(partialPath);
  if (sizeBytes === null) {
    throw new Error(`yt-dlp finished but ${partialPath} is missing or empty`);
  }
  await fs.rename(partialPath, targetPath);

  logger.info("youtube_download_success", { service: "worker", url: youtubeUrl, localPath: targetPath, sizeBytes });
  return { localPath: targetPath, sizeBytes, reused: false };
}
