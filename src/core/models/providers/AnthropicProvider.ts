/**
 * Anthropic Model Provider
 *
 * Claude models through @anthropic-ai/sdk. Images go in as base64 content
 * blocks ahead of the text prompt.
 */

import Anthropic from "@anthropic-ai/sdk";
import { ConfigurationError, ErrorCode, LLMError, errorMessage } from "../../errors.js";
import type { IModelProvider, ModelRequest, ModelResponse, ModelVendor } from "../interfaces/IModel.js";
import { createLogger } from "../../../utils/logger.js";

const logger = createLogger("anthropic-provider");

export interface AnthropicProviderOptions {
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
}

// =============================================================================
// Anthropic Provider Implementation
// =============================================================================

export class AnthropicProvider implements IModelProvider {
  readonly vendorId: ModelVendor = "anthropic";

  private client: Anthropic | null = null;
  private readonly apiKey: string | undefined;

  constructor(options: AnthropicProviderOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
  }

  async initialize(): Promise<void> {
    if (this.client) return;
    logger.debug("Initializing Anthropic provider");

    if (!this.apiKey) {
      throw new ConfigurationError(
        "ANTHROPIC_API_KEY environment variable is required",
        ErrorCode.CONFIG_MISSING_CREDENTIALS
      );
    }

    this.client = new Anthropic({ apiKey: this.apiKey });
    logger.info("Anthropic provider initialized");
  }

  isReady(): boolean {
    return this.client !== null;
  }

  async complete(modelId: string, request: ModelRequest): Promise<ModelResponse> {
    if (!this.client) {
      throw new LLMError("Anthropic provider not initialized", ErrorCode.LLM_INFERENCE_FAILED, {
        model: modelId,
      });
    }

    const startTime = Date.now();
    const content: Array<Anthropic.TextBlockParam | Anthropic.ImageBlockParam> = [
      ...(request.images ?? []).flatMap((image) => {
        const blocks: Array<Anthropic.TextBlockParam | Anthropic.ImageBlockParam> = [
          { type: "image", source: { type: "base64", media_type: image.mediaType, data: image.data } },
        ];
        if (image.label) blocks.push({ type: "text", text: image.label });
        return blocks;
      }),
      { type: "text", text: request.prompt },
    ];

    try {
      const response = await this.client.messages.create({
        model: modelId,
        max_tokens: request.parameters?.maxTokens ?? 4096,
        messages: [{ role: "user", content }],
        system: request.systemPrompt,
        temperature: request.parameters?.temperature,
        stop_sequences: request.parameters?.stopSequences,
      });

      const text = response.content
        .map((block) => (block.type === "text" ? block.text : ""))
        .join("");
      const inputTokens = response.usage.input_tokens;
      const outputTokens = response.usage.output_tokens;

      logger.debug({ modelId, inputTokens, outputTokens }, "Completion received");

      return {
        content: text,
        finishReason: this.mapFinishReason(response.stop_reason),
        usage: {
          inputTokens,
          outputTokens,
          totalTokens: inputTokens + outputTokens,
        },
        latencyMs: Date.now() - startTime,
        modelId,
      };
    } catch (error) {
      logger.error({ modelId, err: errorMessage(error) }, "Anthropic completion failed");
      throw new LLMError(`Model request failed: ${errorMessage(error)}`, ErrorCode.LLM_INFERENCE_FAILED, {
        model: modelId,
      });
    }
  }

  async shutdown(): Promise<void> {
    this.client = null;
  }

  private mapFinishReason(reason: string | null): ModelResponse["finishReason"] {
    switch (reason) {
      case "max_tokens":
        return "length";
      case "tool_use":
        return "function_call";
      default:
        return "stop";
    }
  }
}

export function createAnthropicProvider(options: AnthropicProviderOptions = {}): AnthropicProvider {
  return new AnthropicProvider(options);
}
