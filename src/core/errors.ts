/**
 * Error Classes for Scenegraph
 * Structured error handling with error codes
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
  // Configuration errors (1xxx)
  CONFIG_INVALID = "E1000",
  CONFIG_MISSING_CREDENTIALS = "E1001",

  // Analysis errors (2xxx)
  ANALYSIS_PARSE_FAILED = "E2000",
  ANALYSIS_NO_FRAMES = "E2001",

  // Graph errors (3xxx)
  GRAPH_CONNECTION_FAILED = "E3000",
  GRAPH_QUERY_FAILED = "E3001",
  GRAPH_AUTH_FAILED = "E3003",
  GRAPH_DATABASE_NOT_FOUND = "E3004",

  // Migration errors (4xxx)
  MIGRATION_FAILED = "E4000",
  MIGRATION_INITIAL_SCHEMA_FAILED = "E4001",

  // Video errors (5xxx)
  VIDEO_NOT_FOUND = "E5000",
  VIDEO_FFMPEG_UNAVAILABLE = "E5001",
  VIDEO_DECODE_FAILED = "E5002",

  // LLM errors (6xxx)
  LLM_INFERENCE_FAILED = "E6000",

  // Query errors (7xxx)
  QUERY_VALIDATION_FAILED = "E7000",

  // General errors (9xxx)
  UNKNOWN_ERROR = "E9000",
}

/**
 * Base error class for all Scenegraph errors
 */
export class SceneGraphError extends Error {
  public readonly code: ErrorCode;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "SceneGraphError";
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  override toString(): string {
    return `[${this.code}] ${this.name}: ${this.message}`;
  }
}

/**
 * Configuration errors: invalid settings or missing credentials.
 * Raised before any store interaction.
 */
export class ConfigurationError extends SceneGraphError {
  constructor(message: string, code: ErrorCode = ErrorCode.CONFIG_INVALID, context?: Record<string, unknown>) {
    super(message, code, context);
    this.name = "ConfigurationError";
  }
}

/**
 * Analyzer output that could not be turned into an AnalysisResult
 */
export class AnalysisError extends SceneGraphError {
  public readonly rawText?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.ANALYSIS_PARSE_FAILED,
    context?: Record<string, unknown> & { rawText?: string }
  ) {
    super(message, code, context);
    this.name = "AnalysisError";
    this.rawText = context?.rawText;
  }
}

/**
 * Graph database errors
 */
export class GraphError extends SceneGraphError {
  public readonly query?: string;
  public readonly status?: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.GRAPH_QUERY_FAILED,
    context?: Record<string, unknown> & { query?: string; status?: number }
  ) {
    super(message, code, context);
    this.name = "GraphError";
    this.query = context?.query;
    this.status = context?.status;
  }
}

/**
 * Schema migration errors
 */
export class MigrationError extends SceneGraphError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.MIGRATION_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, context);
    this.name = "MigrationError";
  }
}

/**
 * Video decoding / frame sampling errors
 */
export class VideoError extends SceneGraphError {
  public readonly filePath?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.VIDEO_DECODE_FAILED,
    context?: Record<string, unknown> & { filePath?: string }
  ) {
    super(message, code, context);
    this.name = "VideoError";
    this.filePath = context?.filePath;
  }
}

/**
 * LLM inference errors
 */
export class LLMError extends SceneGraphError {
  public readonly model?: string;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.LLM_INFERENCE_FAILED,
    context?: Record<string, unknown> & { model?: string }
  ) {
    super(message, code, context);
    this.name = "LLMError";
    this.model = context?.model;
  }
}

/**
 * A generated query rejected by the superficial checks
 */
export class QueryValidationError extends SceneGraphError {
  public readonly typeql: string;

  constructor(message: string, typeql: string) {
    super(message, ErrorCode.QUERY_VALIDATION_FAILED, { typeql });
    this.name = "QueryValidationError";
    this.typeql = typeql;
  }
}

/**
 * Extracts a printable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === "string" ? error : String(error);
}
