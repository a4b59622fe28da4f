import { join } from "node:path";

import { permanentFailure, transientFailure } from "@shortloop/shared";

import { runCommand, type CommandRunner } from "../services/process";
import { downloadYouTubeVideo, isUnavailableVideoError } from "../services/youtube/download";
import type { FetchExecutor, FetchInput, FetchOutput } from "./types";

export interface YtDlpFetchOptions {
  workDir: string;
  runner?: CommandRunner;
}

/** File name used for an item's artifacts; ids are not trusted as path segments. */
export function safeFileStem(id: string): string {
  return id.replace(/[^A-Za-z0-9_-]/g, "_");
}

/**
 * Downloads the source video into `<workDir>/downloads/<id>.mp4`. The
 * artifact ref is the local path.
 */
export class YtDlpFetchExecutor implements FetchExecutor {
  readonly stage = "fetch" as const;
  private readonly workDir: string;
  private readonly runner: CommandRunner;

  constructor(options: YtDlpFetchOptions) {
    this.workDir = options.workDir;
    this.runner = options.runner ?? runCommand;
  }

  async execute(input: FetchInput): Promise<FetchOutput> {
    const targetPath = join(this.workDir, "downloads", `${safeFileStem(input.id)}.mp4`);
    try {
      const result = await downloadYouTubeVideo(input.sourceUrl, targetPath, this.runner);
      return { artifactRef: result.localPath };
    } catch (error) {
      if (isUnavailableVideoError(error)) {
        throw permanentFailure(`Source ${input.sourceUrl} is unavailable`, error);
      }
      throw transientFailure(
        `Download of ${input.sourceUrl} failed: ${error instanceof Error ? error.message : String(error)}`,
        error,
      );
    }
  }
}
