/**
 * AnthropicProvider Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { ConfigurationError, LLMError } from "../../errors.js";
import { AnthropicProvider } from "../providers/AnthropicProvider.js";

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock("@anthropic-ai/sdk", () => ({
  default: class {
    messages = { create };
  },
}));

describe("AnthropicProvider", () => {
  beforeEach(() => {
    create.mockReset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("requires an API key", async () => {
    vi.stubEnv("ANTHROPIC_API_KEY", "");
    const provider = new AnthropicProvider();

    await expect(provider.initialize()).rejects.toBeInstanceOf(ConfigurationError);
    expect(provider.isReady()).toBe(false);
  });

  it("refuses completions before initialization", async () => {
    const provider = new AnthropicProvider({ apiKey: "test-key" });

    await expect(provider.complete("test-model", { prompt: "hi" })).rejects.toBeInstanceOf(LLMError);
  });

  it("sends images with their labels ahead of the prompt", async () => {
    create.mockResolvedValue({
      content: [
        { type: "text", text: "{" },
        { type: "text", text: "}" },
      ],
      usage: { input_tokens: 3, output_tokens: 4 },
      stop_reason: "end_turn",
    });
    const provider = new AnthropicProvider({ apiKey: "test-key" });
    await provider.initialize();

    const response = await provider.complete("test-model", {
      prompt: "Describe the scene",
      images: [
        { data: "AAA", mediaType: "image/jpeg", label: "[Frame 1 at 0.0s]" },
        { data: "BBB", mediaType: "image/jpeg" },
      ],
      parameters: { maxTokens: 100 },
    });

    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({
        model: "test-model",
        max_tokens: 100,
        messages: [
          {
            role: "user",
            content: [
              { type: "image", source: { type: "base64", media_type: "image/jpeg", data: "AAA" } },
              { type: "text", text: "[Frame 1 at 0.0s]" },
              { type: "image", source: { type: "base64", media_type: "image/jpeg", data: "BBB" } },
              { type: "text", text: "Describe the scene" },
            ],
          },
        ],
      })
    );
    expect(response.content).toBe("{}");
    expect(response.finishReason).toBe("stop");
    expect(response.usage).toEqual({ inputTokens: 3, outputTokens: 4, totalTokens: 7 });
  });

  it("maps truncated replies to length", async () => {
    create.mockResolvedValue({
      content: [{ type: "text", text: "{" }],
      usage: { input_tokens: 1, output_tokens: 1 },
      stop_reason: "max_tokens",
    });
    const provider = new AnthropicProvider({ apiKey: "test-key" });
    await provider.initialize();

    expect((await provider.complete("test-model", { prompt: "x" })).finishReason).toBe("length");
  });

  it("wraps API failures in LLMError", async () => {
    create.mockRejectedValue(new Error("overloaded"));
    const provider = new AnthropicProvider({ apiKey: "test-key" });
    await provider.initialize();

    await expect(provider.complete("test-model", { prompt: "x" })).rejects.toThrow("Model request failed: overloaded");
  });
});
