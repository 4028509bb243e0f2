/**
 * Vision Analyzer
 *
 * Sends sampled frames and the current schema to a vision-capable model and
 * parses its reply into an AnalysisResult.
 *
 * @module
 */

import { ErrorCode, AnalysisError } from "../errors.js";
import type { IModelProvider } from "../models/interfaces/IModel.js";
import type { FrameData } from "../video/frame-extractor.js";
import { createLogger } from "../../utils/logger.js";
import type { AnalysisResult } from "./models.js";
import { parseAnalysisResponse } from "./parser.js";
import { frameLabel, generateSceneAnalysisPrompt } from "./prompts/scene-analysis-prompts.js";

const logger = createLogger("vision-analyzer");

export interface VisionAnalyzerOptions {
  modelId: string;
  maxTokens?: number;
}

export class VisionAnalyzer {
  constructor(
    private readonly provider: IModelProvider,
    private readonly options: VisionAnalyzerOptions
  ) {}

  /**
   * Creates the model client; fails on missing credentials
   */
  async prepare(): Promise<void> {
    await this.provider.initialize();
  }

  /**
   * @param currentSchema - null or empty for the first scene
   */
  async analyzeFrames(frames: readonly FrameData[], currentSchema: string | null): Promise<AnalysisResult> {
    if (frames.length === 0) {
      throw new AnalysisError("No frames to analyze", ErrorCode.ANALYSIS_NO_FRAMES);
    }

    await this.provider.initialize();

    const prompt = generateSceneAnalysisPrompt(currentSchema);
    logger.debug({ modelId: this.options.modelId, frames: frames.length, prompt }, "Requesting scene analysis");

    const response = await this.provider.complete(this.options.modelId, {
      prompt,
      images: frames.map((frame, index) => ({
        data: frame.imageBase64,
        mediaType: "image/jpeg" as const,
        label: frames.length > 1 ? frameLabel(index, frame.timestampSec) : undefined,
      })),
      parameters: { maxTokens: this.options.maxTokens ?? 4096 },
    });

    logger.debug(
      { finishReason: response.finishReason, usage: response.usage, content: response.content },
      "Scene analysis received"
    );
    return parseAnalysisResponse(response.content);
  }

  async analyzeImage(imageBase64: string, currentSchema: string | null): Promise<AnalysisResult> {
    return this.analyzeFrames(
      [{ frameNumber: 0, timestampSec: 0, imageBase64, width: 0, height: 0 }],
      currentSchema
    );
  }
}
