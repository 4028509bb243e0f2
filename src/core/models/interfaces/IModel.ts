/**
 * Model Abstraction Interfaces
 *
 * What the vision analyzer and the query translator need from an LLM:
 * one completion per call, with optional images.
 */

// =============================================================================
// Model Types
// =============================================================================

export type ModelVendor = "anthropic";

export type ImageMediaType = "image/jpeg" | "image/png" | "image/gif" | "image/webp";

export interface ModelImage {
  /** Base64-encoded bytes */
  data: string;
  mediaType: ImageMediaType;
  /** Text sent right after the image */
  label?: string;
}

export interface ModelParameters {
  temperature?: number;
  maxTokens?: number;
  stopSequences?: string[];
}

// =============================================================================
// Request/Response Types
// =============================================================================

export interface ModelRequest {
  prompt: string;
  systemPrompt?: string;
  parameters?: ModelParameters;
  /** Sent before the prompt, in order */
  images?: ModelImage[];
}

export interface ModelResponse {
  content: string;
  finishReason: "stop" | "length" | "function_call" | "content_filter" | "error";
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  latencyMs: number;
  modelId: string;
}

// =============================================================================
// Model Provider Interface
// =============================================================================

export interface IModelProvider {
  readonly vendorId: ModelVendor;

  /**
   * Verify credentials and create the client
   */
  initialize(): Promise<void>;

  isReady(): boolean;

  /**
   * Generate a completion
   */
  complete(modelId: string, request: ModelRequest): Promise<ModelResponse>;

  shutdown(): Promise<void>;
}
