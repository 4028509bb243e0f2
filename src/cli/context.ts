/**
 * Shared wiring for CLI commands: configuration from global flags, the
 * store, the pipeline and confirmation prompts.
 */

import * as p from "@clack/prompts";
import chalk from "chalk";
import type { Command } from "commander";
import { VisionAnalyzer } from "../core/analysis/vision-analyzer.js";
import type { QueryDocument } from "../core/graph/interfaces/ISceneGraphStore.js";
import { TypeDBHttpStore } from "../core/graph/typedb-http-store.js";
import { AnthropicProvider } from "../core/models/providers/AnthropicProvider.js";
import { SceneLoader } from "../core/pipeline/scene-loader.js";
import { FrameExtractor } from "../core/video/frame-extractor.js";
import { loadConfig } from "../utils/config.js";
import type { SceneGraphConfig } from "../utils/validation.js";

// =============================================================================
// Options
// =============================================================================

export type GlobalOptions = {
  dbAddress?: string;
  dbName?: string;
  dbUser?: string;
  dbPassword?: string;
  debug?: boolean;
};

export interface SamplingFlags {
  fps?: number;
  maxFrames?: number;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Defaults, config file and environment, with command-line flags on top
 */
export function resolveConfig(command: Command, sampling: SamplingFlags = {}): SceneGraphConfig {
  const globals = globalOptions(command);
  return loadConfig({
    overrides: {
      typedb: {
        address: globals.dbAddress,
        database: globals.dbName,
        username: globals.dbUser,
        password: globals.dbPassword,
      },
      frames: { fps: sampling.fps, maxFrames: sampling.maxFrames },
    },
  });
}

export function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

// =============================================================================
// Wiring
// =============================================================================

export function createStore(config: SceneGraphConfig): TypeDBHttpStore {
  return new TypeDBHttpStore(config.typedb);
}

export function createProvider(apiKey?: string): AnthropicProvider {
  return new AnthropicProvider({ apiKey });
}

export function createSceneLoader(config: SceneGraphConfig, store: TypeDBHttpStore, apiKey: string): SceneLoader {
  const analyzer = new VisionAnalyzer(createProvider(apiKey), {
    modelId: config.model.id,
    maxTokens: config.model.maxTokens,
  });
  return new SceneLoader({ store, analyzer, frames: new FrameExtractor() });
}

/**
 * Runs `fn` with a store and closes it afterwards
 */
export async function withStore<T>(config: SceneGraphConfig, fn: (store: TypeDBHttpStore) => Promise<T>): Promise<T> {
  const store = createStore(config);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}

// =============================================================================
// Output
// =============================================================================

/**
 * Yes/no prompt; cancelling counts as no
 */
export async function confirmAction(message: string): Promise<boolean> {
  const answer = await p.confirm({ message, initialValue: false });
  return !p.isCancel(answer) && answer;
}

export function printDocuments(documents: readonly QueryDocument[]): void {
  documents.forEach((doc, index) => {
    console.log(`${index + 1}. ${JSON.stringify(doc, null, 2)}`);
  });
}

export function printHeading(title: string): void {
  console.log();
  console.log(chalk.cyan.bold(title));
  console.log(chalk.dim("─".repeat(40)));
}
