export interface SegmentRenderOptions {
  /** Offset into the source, in seconds */
  start: number;
  /** Segment length, in seconds */
  duration: number;
  /** Burned into the top of the frame, e.g. "Part 2" */
  label?: string;
  width?: number;
  height?: number;
  fps?: number;
  crf?: number;
  preset?: string;
  audioBitrateK?: number;
  fontFile?: string;
  loudnorm?: {
    I: number;
    TP: number;
    LRA: number;
  };
}

const DEFAULT_WIDTH = 1080;
const DEFAULT_HEIGHT = 1920;
const DEFAULT_FPS = 30;
const DEFAULT_CRF = 20;
const DEFAULT_PRESET = "veryfast";
const DEFAULT_AUDIO_BITRATE = 160;
const DEFAULT_LOUDNORM = { I: -16, TP: -1.5, LRA: 11 };

/**
 * Cuts one segment out of the source and reframes it to vertical: the frame
 * is scaled to fit over a blurred, cropped copy of itself.
 */
export function buildSegmentCommand(
  inputPath: string,
  outPath: string,
  opts: SegmentRenderOptions,
): {
  args: string[];
  filtergraph: string;
} {
  const width = opts.width ?? DEFAULT_WIDTH;
  const height = opts.height ?? DEFAULT_HEIGHT;
  const fps = opts.fps ?? DEFAULT_FPS;
  const crf = opts.crf ?? DEFAULT_CRF;
  const preset = opts.preset ?? DEFAULT_PRESET;
  const audioBitrate = opts.audioBitrateK ?? DEFAULT_AUDIO_BITRATE;
  const loudnorm = opts.loudnorm ?? DEFAULT_LOUDNORM;

  const filterParts: string[] = [];
  filterParts.push(
    `[0:v]scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},` +
      "boxblur=luma_radius=20:luma_power=1:chroma_radius=10[bg]",
  );
  filterParts.push(`[0:v]scale=${width}:-2:force_original_aspect_ratio=decrease[fg]`);

  if (opts.label) {
    filterParts.push("[bg][fg]overlay=(W-w)/2:(H-h)/2[base]");
    filterParts.push(`[base]${buildDrawText(opts.label, opts.fontFile)}[out]`);
  } else {
    filterParts.push("[bg][fg]overlay=(W-w)/2:(H-h)/2[out]");
  }

  const filtergraph = filterParts.join(";");
  const args: string[] = [
    "-hide_banner",
    "-y",
    "-ss",
    formatTime(opts.start),
    "-i",
    inputPath,
    "-t",
    formatTime(Math.max(0, opts.duration)),
    "-filter_complex",
    filtergraph,
    "-map",
    "[out]",
    "-map",
    "0:a?",
    "-c:v",
    "libx264",
    "-preset",
    preset,
    "-crf",
    String(crf),
    "-r",
    String(fps),
    "-movflags",
    "+faststart",
    "-c:a",
    "aac",
    "-b:a",
    `${audioBitrate}k`,
    "-af",
    buildLoudnorm(loudnorm),
    "-f",
    "mp4",
    outPath,
  ];

  return { args, filtergraph };
}

function buildDrawText(label: string, fontFile?: string): string {
  const font = fontFile ? `fontfile=${escapeFilterValue(fontFile)}:` : "";
  return (
    `drawtext=${font}text=${escapeFilterValue(label)}:fontcolor=white:fontsize=64:` +
    "borderw=4:bordercolor=black:x=(w-text_w)/2:y=h*0.08"
  );
}

function buildLoudnorm(values: { I: number; TP: number; LRA: number }): string {
  return `loudnorm=I=${values.I}:TP=${values.TP}:LRA=${values.LRA}`;
}

/** Quotes a value for use inside a filtergraph option. */
export function escapeFilterValue(value: string): string {
  const normalized = value.replace(/\\/g, "/");
  const escapedColon = normalized.replace(/:/g, "\\:");
  const escapedQuotes = escapedColon.replace(/'/g, "\\'");
  return `'${escapedQuotes}'`;
}

function formatTime(value: number): string {
  return value.toFixed(3);
}
