/**
 * Scenegraph
 *
 * Library entry point: video analysis, schema generation and migration,
 * data insertion and question answering over a TypeDB scene graph.
 *
 * @module
 */

// Analysis
export * from "./core/analysis/models.js";
export * from "./core/analysis/parser.js";
export * from "./core/analysis/vision-analyzer.js";

// Schema
export * from "./core/schema/naming.js";
export * from "./core/schema/typeql.js";
export * from "./core/schema/base-schema.js";
export * from "./core/schema/definition-context.js";
export * from "./core/schema/schema-generator.js";

// Migration
export * from "./core/migration/types.js";
export * from "./core/migration/planner.js";
export * from "./core/migration/executor.js";

// Storage & ingestion
export * from "./core/graph/interfaces/ISceneGraphStore.js";
export * from "./core/graph/typedb-http-store.js";
export * from "./core/ingestion/data-inserter.js";

// Query
export * from "./core/query/query-translator.js";

// Video & pipeline
export * from "./core/video/frame-extractor.js";
export * from "./core/pipeline/scene-loader.js";

// Models
export * from "./core/models/interfaces/IModel.js";
export * from "./core/models/providers/AnthropicProvider.js";

// Errors, results, configuration
export * from "./core/errors.js";
export * from "./types/result.js";
export { loadConfig, requireApiKey, type ConfigOverrides, type LoadConfigOptions } from "./utils/config.js";
export { SceneGraphConfigSchema, type SceneGraphConfig, type TypeDBConfig } from "./utils/validation.js";
export { createLogger, setLogLevel } from "./utils/logger.js";
