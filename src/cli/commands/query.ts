/**
 * query and execute commands - Ask the graph questions
 */

import chalk from "chalk";
import type { Command } from "commander";
import ora from "ora";
import type { ISceneGraphStore } from "../../core/graph/interfaces/ISceneGraphStore.js";
import { QueryTranslator, type QueryResult } from "../../core/query/query-translator.js";
import { requireApiKey } from "../../utils/config.js";
import type { SceneGraphConfig } from "../../utils/validation.js";
import { createProvider, resolveConfig, withStore } from "../context.js";

function createTranslator(store: ISceneGraphStore, config: SceneGraphConfig, apiKey?: string): QueryTranslator {
  return new QueryTranslator(store, createProvider(apiKey), {
    modelId: config.model.id,
    maxTokens: config.model.queryMaxTokens,
  });
}

async function requireDatabase(store: ISceneGraphStore): Promise<void> {
  if (!(await store.databaseExists())) {
    throw new Error(`Database '${store.databaseName}' does not exist. Load a scene first.`);
  }
}

function report(translator: QueryTranslator, result: QueryResult): void {
  console.log(translator.formatResults(result));
  if (!result.success) {
    process.exitCode = 1;
  }
}

export async function queryCommand(question: string, _options: unknown, command: Command): Promise<void> {
  const config = resolveConfig(command);
  const apiKey = requireApiKey();

  await withStore(config, async (store) => {
    await requireDatabase(store);
    const translator = createTranslator(store, config, apiKey);

    const spinner = ora("Translating question...").start();
    const result = await translator.query(question).catch((error: unknown) => {
      spinner.fail(chalk.red("Query failed"));
      throw error;
    });
    spinner.stop();

    report(translator, result);
  });
}

/**
 * Runs hand-written TypeQL; no model involved
 */
export async function executeCommand(typeql: string, _options: unknown, command: Command): Promise<void> {
  const config = resolveConfig(command);

  await withStore(config, async (store) => {
    await requireDatabase(store);
    const translator = createTranslator(store, config);
    report(translator, await translator.executeTypeql(typeql));
  });
}
