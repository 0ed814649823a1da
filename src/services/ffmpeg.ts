import ffprobeStatic from "ffprobe-static";
import { spawn } from "child_process";
import * as fs from "fs/promises";
import path from "path";
import { TranscoderError } from "../lib/errors";

const ffprobePath = ffprobeStatic.path;

export interface AudioSpan {
  startSeconds: number;
  endSeconds: number;
}

export interface MuxOptions {
  framePattern: string;
  audioPath: string;
  fps: number;
  outputPath: string;
}

/**
 * Boundary to the external transcoder. Everything the compile step needs
 * from ffmpeg goes through these four calls, so tests can swap in a fake.
 */
export interface Transcoder {
  trimAudio(inputPath: string, outputPath: string, span: AudioSpan): Promise<void>;
  muxImageSequence(options: MuxOptions): Promise<void>;
  concat(manifestPath: string, outputPath: string): Promise<void>;
  probeDuration(filePath: string): Promise<number>;
}

function run(
  bin: string,
  args: string[],
): Promise<{ stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    const p = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"] });
    let out = "";
    let err = "";
    p.stdout.on("data", (d) => (out += d.toString()));
    p.stderr.on("data", (d) => (err += d.toString()));
    p.on("error", (e) => {
      reject(new TranscoderError(path.basename(bin), null, e.message));
    });
    p.on("close", (code) => {
      if (code === 0) {
        resolve({ stdout: out, stderr: err });
        return;
      }
      reject(new TranscoderError(path.basename(bin), code, err || out));
    });
  });
}

export function formatSeconds(seconds: number): string {
  return Math.max(0, seconds).toFixed(3);
}

export function trimAudioArgs(
  inputPath: string,
  outputPath: string,
  span: AudioSpan,
): string[] {
  return [
    "-y",
    "-i",
    inputPath,
    "-ss",
    formatSeconds(span.startSeconds),
    "-to",
    formatSeconds(span.endSeconds),
    "-c",
    "copy",
    "-hide_banner",
    "-loglevel",
    "error",
    outputPath,
  ];
}

export function muxArgs(options: MuxOptions): string[] {
  return [
    "-y",
    "-r",
    String(options.fps),
    "-i",
    options.framePattern,
    "-i",
    options.audioPath,
    "-c:v",
    "libx264",
    "-c:a",
    "aac",
    "-vf",
    "pad=ceil(iw/2)*2:ceil(ih/2)*2",
    "-pix_fmt",
    "yuv420p",
    "-crf",
    "23",
    "-r",
    String(options.fps),
    "-shortest",
    "-hide_banner",
    "-loglevel",
    "error",
    options.outputPath,
  ];
}

export function concatArgs(manifestPath: string, outputPath: string): string[] {
  return [
    "-y",
    "-f",
    "concat",
    "-safe",
    "0",
    "-i",
    manifestPath,
    "-c",
    "copy",
    "-hide_banner",
    "-loglevel",
    "error",
    outputPath,
  ];
}

function escapeManifestPath(p: string): string {
  return p.replace(/'/g, "'\\''");
}

export function buildConcatManifest(clipPaths: string[]): string {
  return clipPaths.map((p) => `file '${escapeManifestPath(p)}'\n`).join("");
}

export async function writeConcatManifest(
  manifestPath: string,
  clipPaths: string[],
): Promise<void> {
  await fs.writeFile(manifestPath, buildConcatManifest(clipPaths), "utf8");
}

async function ensureOutput(command: string, outputPath: string): Promise<void> {
  try {
    await fs.stat(outputPath);
  } catch {
    throw new TranscoderError(command, 0, `expected output ${outputPath} was not written`);
  }
}

export class FfmpegTranscoder implements Transcoder {
  constructor(private readonly ffmpegPath: string) {}

  async trimAudio(
    inputPath: string,
    outputPath: string,
    span: AudioSpan,
  ): Promise<void> {
    await run(this.ffmpegPath, trimAudioArgs(inputPath, outputPath, span));
    await ensureOutput("ffmpeg trim", outputPath);
  }

  async muxImageSequence(options: MuxOptions): Promise<void> {
    await run(this.ffmpegPath, muxArgs(options));
    await ensureOutput("ffmpeg mux", options.outputPath);
  }

  async concat(manifestPath: string, outputPath: string): Promise<void> {
    await run(this.ffmpegPath, concatArgs(manifestPath, outputPath));
    await ensureOutput("ffmpeg concat", outputPath);
  }

  async probeDuration(filePath: string): Promise<number> {
    const { stdout } = await run(ffprobePath, [
      "-v",
      "error",
      "-show_entries",
      "format=duration",
      "-of",
      "json",
      filePath,
    ]);
    const parsed: unknown = JSON.parse(stdout);
    return readDuration(parsed);
  }
}

function readDuration(parsed: unknown): number {
  if (typeof parsed !== "object" || parsed === null || !("format" in parsed)) {
    return 0;
  }
  const format = parsed.format;
  if (typeof format !== "object" || format === null || !("duration" in format)) {
    return 0;
  }
  const duration = Number(format.duration);
  return Number.isFinite(duration) ? duration : 0;
}
