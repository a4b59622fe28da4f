import { permanentFailure, quotaFailure, transientFailure } from "@shortloop/shared";

import { YouTubeApiError, type YouTubeClient } from "../services/youtube/client";
import type { PublishExecutor, PublishInput, PublishOutput } from "./types";

export const MAX_TITLE_LENGTH = 100;
const SHORTS_TAG = " #Shorts";

/**
 * "<title> - Part N #Shorts", with the source title shortened so the
 * whole string fits the platform's title limit.
 */
export function buildPublishTitle(title: string, partIndex: number): string {
  const label = ` - Part ${partIndex}`;
  const available = MAX_TITLE_LENGTH - label.length - SHORTS_TAG.length;
  const base = title.trim();
  const shortened = base.length > available ? `${base.slice(0, Math.max(0, available - 3)).trimEnd()}...` : base;
  return `${shortened}${label}${SHORTS_TAG}`;
}

export function buildPublishDescription(
  item: Pick<PublishInput["item"], "title" | "sourceUrl">,
  partIndex: number,
  totalParts: number,
): string {
  return `${item.title}\n\nPart ${partIndex} of ${totalParts}\nFull video: ${item.sourceUrl}\n\n#Shorts`;
}

/**
 * Maps upload errors onto stage failures: a spent upload quota is `quota`,
 * anything the client will not retry is permanent. That includes an upload
 * that succeeded without returning a video id, which must not be sent again.
 */
export function classifyPublishError(error: unknown): Error {
  if (error instanceof YouTubeApiError) {
    if (error.quotaExhausted) {
      return quotaFailure(error.message, error);
    }
    if (!error.retryable) {
      return permanentFailure(error.message, error);
    }
    return transientFailure(error.message, error);
  }
  return transientFailure(error instanceof Error ? error.message : String(error), error);
}

export interface YouTubePublishOptions {
  visibility?: "public" | "unlisted" | "private";
  tags?: string[];
}

export class YouTubePublishExecutor implements PublishExecutor {
  readonly stage = "publish" as const;
  private readonly client: Pick<YouTubeClient, "uploadShort">;
  private readonly options: YouTubePublishOptions;

  constructor(client: Pick<YouTubeClient, "uploadShort">, options: YouTubePublishOptions = {}) {
    this.client = client;
    this.options = options;
  }

  async execute({ item, segment }: PublishInput): Promise<PublishOutput> {
    try {
      const { videoId } = await this.client.uploadShort({
        filePath: segment.localArtifactRef,
        title: buildPublishTitle(item.title, segment.index),
        description: buildPublishDescription(item, segment.index, item.segments.length),
        tags: this.options.tags,
        visibility: this.options.visibility,
      });
      return { remoteId: videoId };
    } catch (error) {
      throw classifyPublishError(error);
    }
  }
}
