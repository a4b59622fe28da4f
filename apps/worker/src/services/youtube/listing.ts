import { z } from "zod";

import type { DiscoveryCandidate } from "@shortloop/shared";

import { runCommand, type CommandRunner } from "../process";

const PlaylistEntrySchema = z.object({
  id: z.string().min(1),
  title: z.string().nullish(),
  url: z.string().nullish(),
  view_count: z.number().nullish(),
});

const PlaylistSchema = z.object({
  entries: z.array(z.unknown()).default([]),
});

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${encodeURIComponent(videoId)}`;
}

/** Appends /videos to a bare channel URL so the upload tab is listed. */
export function channelVideosUrl(channelUrl: string): string {
  const trimmed = channelUrl.replace(/\/+$/, "");
  return /\/(videos|streams|shorts|playlist)(\?|$)/.test(trimmed) || trimmed.includes("list=")
    ? trimmed
    : `${trimmed}/videos`;
}

/**
 * Parses `yt-dlp --dump-single-json` output into discovery candidates.
 * Entries without an id are skipped; priority is the view count.
 */
export function parsePlaylistJson(stdout: string): DiscoveryCandidate[] {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new Error("yt-dlp returned invalid JSON", { cause: error });
  }

  const playlist = PlaylistSchema.safeParse(json);
  if (!playlist.success) {
    throw new Error("yt-dlp output has no entries list");
  }

  const candidates: DiscoveryCandidate[] = [];
  for (const raw of playlist.data.entries) {
    const entry = PlaylistEntrySchema.safeParse(raw);
    if (!entry.success) continue;
    const { id, title, url, view_count } = entry.data;
    candidates.push({
      id,
      title: title ?? id,
      sourceUrl: url && /^https?:\/\//.test(url) ? url : watchUrl(id),
      priority: view_count ?? 0,
    });
  }
  return candidates;
}

export async function listChannelVideos(
  channelUrl: string,
  limit: number,
  runner: CommandRunner = runCommand,
): Promise<DiscoveryCandidate[]> {
  const { stdout } = await runner(
    "yt-dlp",
    ["--flat-playlist", "--dump-single-json", "--playlist-end", String(limit), channelVideosUrl(channelUrl)],
    { timeoutMs: 5 * 60 * 1000 },
  );
  return parsePlaylistJson(stdout);
}
