/**
 * Frame Extractor
 *
 * Samples still frames from a video with ffprobe/ffmpeg child processes and
 * returns them as base64 JPEG.
 *
 * @module
 */

import { spawn } from "node:child_process";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ErrorCode, VideoError, errorMessage } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("frame-extractor");

// =============================================================================
// Types
// =============================================================================

export interface FrameData {
  frameNumber: number;
  timestampSec: number;
  imageBase64: string;
  width: number;
  height: number;
}

export interface VideoInfo {
  fps: number;
  totalFrames: number;
  durationSec: number;
  width: number;
  height: number;
}

export interface FrameSamplingOptions {
  /** Frames to keep per second of video */
  fps: number;
  maxFrames: number;
}

export interface FrameSample {
  frameNumber: number;
  timestampSec: number;
}

export interface ProcessOutput {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs a command to completion. Rejects only when it cannot be started.
 */
export type ProcessRunner = (command: string, args: string[]) => Promise<ProcessOutput>;

export const runProcess: ProcessRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args);
    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });
    child.on("error", reject);
    child.on("close", (code) => resolve({ code, stdout, stderr }));
  });

// =============================================================================
// ffprobe
// =============================================================================

const FfprobeOutputSchema = z.object({
  streams: z
    .array(
      z.object({
        codec_type: z.string().optional(),
        width: z.number().optional(),
        height: z.number().optional(),
        r_frame_rate: z.string().optional(),
        avg_frame_rate: z.string().optional(),
        nb_frames: z.string().optional(),
        duration: z.string().optional(),
      })
    )
    .default([]),
  format: z.object({ duration: z.string().optional() }).optional(),
});

/**
 * "30000/1001" or "25" to frames per second; 0 when unparseable
 */
export function parseFrameRate(rate: string | undefined): number {
  if (!rate) return 0;
  const [numerator, denominator] = rate.split("/");
  const num = Number(numerator);
  if (denominator === undefined) return Number.isFinite(num) ? num : 0;
  const den = Number(denominator);
  return den > 0 && Number.isFinite(num) ? num / den : 0;
}

/**
 * Reads the first video stream out of `ffprobe -print_format json` output
 */
export function parseFfprobeOutput(stdout: string, filePath: string): VideoInfo {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch (error) {
    throw new VideoError(`Failed to parse ffprobe output: ${errorMessage(error)}`, ErrorCode.VIDEO_DECODE_FAILED, {
      filePath,
    });
  }

  const parsed = FfprobeOutputSchema.safeParse(json);
  const stream = parsed.success ? parsed.data.streams.find((s) => s.codec_type === "video") : undefined;
  if (!parsed.success || !stream) {
    throw new VideoError(`No video stream found in ${filePath}`, ErrorCode.VIDEO_DECODE_FAILED, { filePath });
  }

  const fps = parseFrameRate(stream.avg_frame_rate) || parseFrameRate(stream.r_frame_rate);
  const durationSec = Number(parsed.data.format?.duration ?? stream.duration ?? 0) || 0;
  const counted = Number(stream.nb_frames);
  const totalFrames = Number.isInteger(counted) && counted > 0 ? counted : Math.round(durationSec * fps);

  return {
    fps,
    totalFrames,
    durationSec: durationSec || (fps > 0 ? totalFrames / fps : 0),
    width: stream.width ?? 0,
    height: stream.height ?? 0,
  };
}

// =============================================================================
// Sampling
// =============================================================================

/**
 * Every `floor(videoFps / fps)`-th frame from the start, at most `maxFrames`
 */
export function planFrameSamples(info: VideoInfo, options: FrameSamplingOptions): FrameSample[] {
  if (info.totalFrames <= 0 || options.maxFrames <= 0) return [];

  const sourceFps = info.fps > 0 ? info.fps : 1;
  const interval = Math.max(1, Math.floor(options.fps > 0 ? sourceFps / options.fps : sourceFps));

  const samples: FrameSample[] = [];
  for (let frame = 0; frame < info.totalFrames && samples.length < options.maxFrames; frame += interval) {
    samples.push({ frameNumber: frame, timestampSec: frame / sourceFps });
  }
  return samples;
}

// =============================================================================
// Extractor
// =============================================================================

export class FrameExtractor {
  constructor(private readonly run: ProcessRunner = runProcess) {}

  async getVideoInfo(filePath: string): Promise<VideoInfo> {
    this.assertExists(filePath);

    const output = await this.exec("ffprobe", [
      "-v", "quiet",
      "-print_format", "json",
      "-show_format",
      "-show_streams",
      filePath,
    ], filePath);

    if (output.code !== 0) {
      throw new VideoError(`Could not open video file: ${filePath}`, ErrorCode.VIDEO_DECODE_FAILED, { filePath });
    }
    return parseFfprobeOutput(output.stdout, filePath);
  }

  async extractFrames(filePath: string, options: FrameSamplingOptions): Promise<FrameData[]> {
    const info = await this.getVideoInfo(filePath);
    const samples = planFrameSamples(info, options);
    logger.debug({ filePath, fps: info.fps, durationSec: info.durationSec, samples: samples.length }, "Sampling frames");

    const workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "scenegraph-frames-"));
    try {
      const frames: FrameData[] = [];
      for (const sample of samples) {
        frames.push(await this.extractFrame(filePath, sample, info, workDir));
      }
      return frames;
    } finally {
      await fs.promises.rm(workDir, { recursive: true, force: true });
    }
  }

  private async extractFrame(
    filePath: string,
    sample: FrameSample,
    info: VideoInfo,
    workDir: string
  ): Promise<FrameData> {
    const outputPath = path.join(workDir, `frame_${String(sample.frameNumber).padStart(6, "0")}.jpg`);
    const output = await this.exec("ffmpeg", [
      "-v", "error",
      "-ss", sample.timestampSec.toFixed(3),
      "-i", filePath,
      "-frames:v", "1",
      "-q:v", "3",
      "-y", outputPath,
    ], filePath);

    if (output.code !== 0 || !fs.existsSync(outputPath)) {
      throw new VideoError(
        `Frame extraction failed at ${sample.timestampSec.toFixed(1)}s: ${output.stderr.trim()}`,
        ErrorCode.VIDEO_DECODE_FAILED,
        { filePath }
      );
    }

    const image = await fs.promises.readFile(outputPath);
    return {
      frameNumber: sample.frameNumber,
      timestampSec: sample.timestampSec,
      imageBase64: image.toString("base64"),
      width: info.width,
      height: info.height,
    };
  }

  private assertExists(filePath: string): void {
    if (!fs.existsSync(filePath)) {
      throw new VideoError(`Video file not found: ${filePath}`, ErrorCode.VIDEO_NOT_FOUND, { filePath });
    }
  }

  private async exec(command: string, args: string[], filePath: string): Promise<ProcessOutput> {
    try {
      return await this.run(command, args);
    } catch (error) {
      throw new VideoError(
        `${command} could not be started; install ffmpeg to extract frames (${errorMessage(error)})`,
        ErrorCode.VIDEO_FFMPEG_UNAVAILABLE,
        { filePath }
      );
    }
  }
}
