import { readFile, stat } from "node:fs/promises";

import { withRetry } from "@shortloop/shared";
import { z } from "zod";

export interface UploadShortParams {
  filePath: string;
  title: string;
  description?: string;
  tags?: string[];
  visibility?: "public" | "unlisted" | "private";
}

export interface UploadShortResult {
  videoId: string;
}

/** Error reasons YouTube uses when a project or channel is out of quota. */
const QUOTA_REASONS = new Set(["quotaExceeded", "uploadLimitExceeded", "dailyLimitExceeded"]);

const ApiErrorBodySchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

const VideoResourceSchema = z.object({ id: z.string().min(1) });

/**
 * Custom error class for YouTube API errors
 */
export class YouTubeApiError extends Error {
  readonly status: number;
  readonly reason?: string;
  readonly retryable: boolean;
  /** The request was refused because the daily upload quota is spent */
  readonly quotaExhausted: boolean;

  constructor(
    message: string,
    status: number,
    options?: {
      reason?: string;
      retryable?: boolean;
    },
  ) {
    super(message);
    this.name = "YouTubeApiError";
    this.status = status;
    this.reason = options?.reason;
    this.quotaExhausted = options?.reason !== undefined && QUOTA_REASONS.has(options.reason);
    // Determine if error is retryable based on status code
    this.retryable = this.quotaExhausted
      ? false
      : (options?.retryable ?? (status >= 500 || status === 429 || status === 408));
  }
}

/**
 * Builds a YouTubeApiError from a non-2xx response, reading the reason code
 * from the standard Google error body when there is one.
 */
export async function errorFromResponse(response: Response, context: string): Promise<YouTubeApiError> {
  const text = await response.text().catch(() => "");
  let reason: string | undefined;
  let message = text || response.statusText;

  try {
    const parsed = ApiErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      reason = parsed.data.error.errors?.[0]?.reason;
      message = parsed.data.error.message ?? message;
    }
  } catch {
    // Body is not JSON; the raw text is the message.
  }

  return new YouTubeApiError(`${context}: ${response.status} ${message}`, response.status, { reason });
}

/**
 * YouTube client for uploading videos using YouTube Data API v3
 * Implements resumable upload protocol for video uploads
 */
export class YouTubeClient {
  private readonly accessToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryBaseDelayMs: number;

  constructor(config: { accessToken: string; baseUrl?: string; timeoutMs?: number; retryBaseDelayMs?: number }) {
    const token = config.accessToken.trim();
    if (!token) {
      throw new Error("YouTube access token is required");
    }

    this.accessToken = token;
    this.baseUrl = config.baseUrl ?? "https://www.googleapis.com";
    // Default timeout: 10 minutes for video uploads (YouTube can be slow)
    this.timeoutMs = config.timeoutMs ?? 10 * 60 * 1000;
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 500;
  }

  /**
   * Upload a YouTube Short
   * 1. Initialize resumable upload session (get upload URL)
   * 2. Upload video file to the resumable URL (returns video ID)
   */
  async uploadShort(params: UploadShortParams): Promise<UploadShortResult> {
    return withRetry(
      "youtube.uploadShort",
      async () => {
        const uploadUrl = await this.initResumableUpload(params);
        const { id: videoId } = await this.uploadFile(uploadUrl, params.filePath);
        return { videoId };
      },
      {
        maxAttempts: 3,
        baseDelayMs: this.retryBaseDelayMs,
        maxDelayMs: 10_000,
        retryableError: (error) => error instanceof YouTubeApiError && error.retryable,
      },
    );
  }

  /**
   * Step 1: Initialize resumable upload session
   * Returns the resumable upload URL
   */
  private async initResumableUpload(params: UploadShortParams): Promise<string> {
    const fileStats = await stat(params.filePath);

    const metadata = {
      snippet: {
        title: params.title,
        description: params.description ?? "",
        tags: params.tags ?? [],
        categoryId: "22", // People & Blogs category (commonly used for Shorts)
      },
      status: {
        privacyStatus: params.visibility ?? "public",
        selfDeclaredMadeForKids: false,
      },
    };

    const url = `${this.baseUrl}/upload/youtube/v3/videos?uploadType=resumable&part=snippet,status`;

    const response = await this.request(url, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        "Content-Type": "application/json",
        "X-Upload-Content-Type": "video/*",
        "X-Upload-Content-Length": fileStats.size.toString(),
      },
      body: JSON.stringify(metadata),
    });

    if (!response.ok) {
      throw await errorFromResponse(response, "YouTube init upload failed");
    }

    const location = response.headers.get("location");
    if (!location) {
      throw new YouTubeApiError("YouTube init upload failed: missing Location header", 500, { retryable: true });
    }

    return location;
  }

  /**
   * Step 2: Upload video file to resumable URL
   * Returns the video resource from the final response
   */
  private async uploadFile(uploadUrl: string, filePath: string): Promise<{ id: string }> {
    const fileData = await readFile(filePath);

    const response = await this.request(uploadUrl, {
      method: "PUT",
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        "Content-Type": "video/*",
        "Content-Length": fileData.byteLength.toString(),
      },
      body: fileData,
    });

    if (!response.ok) {
      throw await errorFromResponse(response, "YouTube file upload failed");
    }

    const body: unknown = await response.json().catch(() => ({}));
    const video = VideoResourceSchema.safeParse(body);
    if (!video.success) {
      throw new YouTubeApiError("YouTube upload completed but video ID not found in response", 500, {
        retryable: false,
      });
    }

    return { id: video.data.id };
  }

  /**
   * fetch with a timeout; network failures become retryable API errors.
   */
  private async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new YouTubeApiError("YouTube request timeout", 408, { retryable: true });
      }
      throw new YouTubeApiError(
        `YouTube request failed: ${error instanceof Error ? error.message : String(error)}`,
        500,
        { retryable: true },
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
