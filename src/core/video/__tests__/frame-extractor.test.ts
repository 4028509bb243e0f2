/**
 * Frame Extractor Tests
 *
 * ffprobe/ffmpeg are replaced by a fake process runner.
 */

import { describe, it, expect, beforeAll, afterAll } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ErrorCode } from "../../errors.js";
import {
  FrameExtractor,
  parseFfprobeOutput,
  parseFrameRate,
  planFrameSamples,
  type ProcessRunner,
  type VideoInfo,
} from "../frame-extractor.js";

const VIDEO: VideoInfo = { fps: 30, totalFrames: 300, durationSec: 10, width: 640, height: 480 };

describe("parseFrameRate", () => {
  it("parses fractions and plain numbers", () => {
    expect(parseFrameRate("25/1")).toBe(25);
    expect(parseFrameRate("30000/1001")).toBeCloseTo(29.97, 2);
    expect(parseFrameRate("24")).toBe(24);
  });

  it("returns 0 for missing or degenerate rates", () => {
    expect(parseFrameRate(undefined)).toBe(0);
    expect(parseFrameRate("0/0")).toBe(0);
    expect(parseFrameRate("abc")).toBe(0);
  });
});

describe("parseFfprobeOutput", () => {
  it("reads the first video stream", () => {
    const info = parseFfprobeOutput(
      JSON.stringify({
        streams: [
          { codec_type: "audio" },
          { codec_type: "video", width: 1920, height: 1080, avg_frame_rate: "25/1", nb_frames: "250" },
        ],
        format: { duration: "10.000000" },
      }),
      "clip.mp4"
    );

    expect(info).toEqual({ fps: 25, totalFrames: 250, durationSec: 10, width: 1920, height: 1080 });
  });

  it("derives the frame count from the duration", () => {
    const info = parseFfprobeOutput(
      JSON.stringify({ streams: [{ codec_type: "video", r_frame_rate: "25/1" }], format: { duration: "4" } }),
      "clip.mp4"
    );

    expect(info.totalFrames).toBe(100);
  });

  it("rejects output without a video stream", () => {
    expect(() => parseFfprobeOutput('{"streams": [{"codec_type": "audio"}]}', "song.mp3")).toThrow(
      "No video stream found in song.mp3"
    );
    expect(() => parseFfprobeOutput("not json", "clip.mp4")).toThrow(/Failed to parse ffprobe output/);
  });
});

describe("planFrameSamples", () => {
  it("takes every floor(videoFps / fps)-th frame", () => {
    expect(planFrameSamples(VIDEO, { fps: 0.5, maxFrames: 5 })).toEqual([
      { frameNumber: 0, timestampSec: 0 },
      { frameNumber: 60, timestampSec: 2 },
      { frameNumber: 120, timestampSec: 4 },
      { frameNumber: 180, timestampSec: 6 },
      { frameNumber: 240, timestampSec: 8 },
    ]);
  });

  it("stops at maxFrames", () => {
    expect(planFrameSamples(VIDEO, { fps: 1, maxFrames: 3 }).map((s) => s.frameNumber)).toEqual([0, 30, 60]);
  });

  it("samples consecutive frames when asked for more than the video has", () => {
    expect(planFrameSamples(VIDEO, { fps: 60, maxFrames: 3 }).map((s) => s.frameNumber)).toEqual([0, 1, 2]);
  });

  it("returns the first frame of a short clip", () => {
    const short: VideoInfo = { ...VIDEO, totalFrames: 10 };
    expect(planFrameSamples(short, { fps: 0.5, maxFrames: 5 })).toEqual([{ frameNumber: 0, timestampSec: 0 }]);
  });

  it("returns nothing for an empty video", () => {
    expect(planFrameSamples({ ...VIDEO, totalFrames: 0 }, { fps: 0.5, maxFrames: 5 })).toEqual([]);
  });
});

describe("FrameExtractor", () => {
  let tempDir: string;
  let videoPath: string;

  beforeAll(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "frame-extractor-test-"));
    videoPath = path.join(tempDir, "clip.mp4");
    await fs.promises.writeFile(videoPath, "placeholder");
  });

  afterAll(async () => {
    await fs.promises.rm(tempDir, { recursive: true, force: true });
  });

  const probeOutput = JSON.stringify({
    streams: [{ codec_type: "video", width: 320, height: 240, avg_frame_rate: "10/1", nb_frames: "50" }],
    format: { duration: "5" },
  });

  it("extracts sampled frames as base64", async () => {
    const calls: string[] = [];
    const run: ProcessRunner = async (command, args) => {
      calls.push(command);
      if (command === "ffprobe") return { code: 0, stdout: probeOutput, stderr: "" };
      const outputPath = args[args.length - 1] ?? "";
      await fs.promises.writeFile(outputPath, "jpeg");
      return { code: 0, stdout: "", stderr: "" };
    };

    const frames = await new FrameExtractor(run).extractFrames(videoPath, { fps: 0.5, maxFrames: 5 });

    expect(calls).toEqual(["ffprobe", "ffmpeg", "ffmpeg", "ffmpeg"]);
    expect(frames.map((f) => f.frameNumber)).toEqual([0, 20, 40]);
    expect(frames[1]).toEqual({
      frameNumber: 20,
      timestampSec: 2,
      imageBase64: Buffer.from("jpeg").toString("base64"),
      width: 320,
      height: 240,
    });
  });

  it("fails on a missing file before running anything", async () => {
    const run: ProcessRunner = async () => {
      throw new Error("should not run");
    };

    await expect(new FrameExtractor(run).getVideoInfo(path.join(tempDir, "missing.mp4"))).rejects.toMatchObject({
      code: ErrorCode.VIDEO_NOT_FOUND,
    });
  });

  it("reports a missing ffprobe binary", async () => {
    const run: ProcessRunner = async () => {
      throw new Error("spawn ffprobe ENOENT");
    };

    await expect(new FrameExtractor(run).getVideoInfo(videoPath)).rejects.toMatchObject({
      code: ErrorCode.VIDEO_FFMPEG_UNAVAILABLE,
    });
  });

  it("reports a frame that could not be decoded", async () => {
    const run: ProcessRunner = async (command) =>
      command === "ffprobe"
        ? { code: 0, stdout: probeOutput, stderr: "" }
        : { code: 1, stdout: "", stderr: "Invalid data found\n" };

    await expect(new FrameExtractor(run).extractFrames(videoPath, { fps: 1, maxFrames: 1 })).rejects.toThrow(
      "Frame extraction failed at 0.0s: Invalid data found"
    );
  });
});
