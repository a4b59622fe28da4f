import { promises as fs } from "node:fs";
import { join } from "node:path";

import {
  logger,
  permanentFailure,
  planSegments,
  transientFailure,
  type Segment,
  type SegmentPlanOptions,
} from "@shortloop/shared";

import { buildSegmentCommand } from "../services/ffmpeg/build-commands";
import { probeDurationSeconds, runFFmpeg } from "../services/ffmpeg/run";
import { CommandFailedError, runCommand, type CommandRunner } from "../services/process";
import { safeFileStem } from "./fetch";
import type { TransformExecutor, TransformInput } from "./types";

export interface FfmpegTransformOptions {
  workDir: string;
  plan: SegmentPlanOptions;
  fontFile?: string;
  runner?: CommandRunner;
}

async function exists(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile() && stats.size > 0;
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return false;
    }
    throw error;
  }
}

/**
 * Splits the fetched source into vertical parts under
 * `<workDir>/segments/<id>/part<N>.mp4`. Parts already rendered by an
 * earlier attempt are kept.
 */
export class FfmpegTransformExecutor implements TransformExecutor {
  readonly stage = "transform" as const;
  private readonly workDir: string;
  private readonly plan: SegmentPlanOptions;
  private readonly fontFile?: string;
  private readonly runner: CommandRunner;

  constructor(options: FfmpegTransformOptions) {
    this.workDir = options.workDir;
    this.plan = options.plan;
    this.fontFile = options.fontFile;
    this.runner = options.runner ?? runCommand;
  }

  async execute(input: TransformInput): Promise<Segment[]> {
    if (!(await exists(input.sourceArtifactRef))) {
      throw permanentFailure(`Source artifact ${input.sourceArtifactRef} is missing`);
    }

    let duration: number;
    try {
      duration = await probeDurationSeconds(input.sourceArtifactRef, this.runner);
    } catch (error) {
      if (error instanceof CommandFailedError && error.reason !== "exit_code") {
        throw transientFailure(`ffprobe could not run: ${error.message}`, error);
      }
      throw permanentFailure(`Cannot read duration of ${input.sourceArtifactRef}`, error);
    }

    const planned = planSegments(duration, this.plan);
    if (planned.length === 0) {
      throw permanentFailure(`Source ${input.item.id} is too short to split (${duration}s)`);
    }

    const outDir = join(this.workDir, "segments", safeFileStem(input.item.id));
    await fs.mkdir(outDir, { recursive: true });

    const segments: Segment[] = [];
    for (const part of planned) {
      const outPath = join(outDir, `part${part.index}.mp4`);

      if (await exists(outPath)) {
        logger.info("segment_render_reused", { service: "worker", itemId: input.item.id, part: part.index });
      } else {
        const partialPath = join(outDir, `part${part.index}.partial.mp4`);
        const { args } = buildSegmentCommand(input.sourceArtifactRef, partialPath, {
          start: part.sourceRange.start,
          duration: part.sourceRange.duration,
          label: `Part ${part.index}`,
          fontFile: this.fontFile,
        });
        try {
          await runFFmpeg(args, this.runner);
        } catch (error) {
          throw transientFailure(`Rendering part ${part.index} of ${input.item.id} failed`, error);
        }
        await fs.rename(partialPath, outPath);
      }

      segments.push({ index: part.index, sourceRange: part.sourceRange, localArtifactRef: outPath });
    }

    return segments;
  }
}
