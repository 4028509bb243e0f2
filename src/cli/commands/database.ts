/**
 * Database commands - schema, clear, delete-scene, info
 */

import chalk from "chalk";
import type { Command } from "commander";
import { ErrorCode, GraphError } from "../../core/errors.js";
import type { ISceneGraphStore, QueryDocument } from "../../core/graph/interfaces/ISceneGraphStore.js";
import { DataInserter } from "../../core/ingestion/data-inserter.js";
import { ROOT_ENTITY } from "../../core/schema/base-schema.js";
import { createLogger } from "../../utils/index.js";
import { confirmAction, printHeading, resolveConfig, withStore } from "../context.js";

const logger = createLogger("database");

export interface ConfirmOptions {
  yes?: boolean;
}

export const ENTITY_COUNT_QUERY = `match $e isa ${ROOT_ENTITY}; reduce $count = count;`;

/**
 * Reads the integer out of a `reduce $count = count` row
 */
export function readCount(rows: readonly QueryDocument[]): number {
  const cell = rows[0]?.count;
  if (typeof cell === "number") return cell;
  if (typeof cell === "object" && cell !== null && "value" in cell && typeof cell.value === "number") {
    return cell.value;
  }
  return 0;
}

export async function schemaCommand(_options: unknown, command: Command): Promise<void> {
  const config = resolveConfig(command);

  await withStore(config, async (store) => {
    if (!(await store.databaseExists())) {
      console.log(chalk.yellow(`Database '${store.databaseName}' does not exist.`));
      return;
    }
    const schema = await store.getSchema();
    console.log(schema || chalk.dim("No schema defined yet."));
  });
}

export async function clearCommand(options: ConfirmOptions, command: Command): Promise<void> {
  const config = resolveConfig(command);

  await withStore(config, async (store) => {
    const confirmed =
      options.yes === true ||
      (await confirmAction(`Delete database '${store.databaseName}' and all of its scenes?`));
    if (!confirmed) {
      console.log(chalk.yellow("Aborted."));
      return;
    }

    try {
      await store.deleteDatabase();
      logger.info({ database: store.databaseName }, "Database deleted");
      console.log(chalk.green(`Deleted database '${store.databaseName}'.`));
    } catch (error) {
      if (error instanceof GraphError && error.code === ErrorCode.GRAPH_DATABASE_NOT_FOUND) {
        console.log(chalk.dim(`Database '${store.databaseName}' did not exist.`));
        return;
      }
      throw error;
    }
  });
}

export async function deleteSceneCommand(sceneId: string, options: ConfirmOptions, command: Command): Promise<void> {
  const config = resolveConfig(command);

  await withStore(config, async (store) => {
    if (!(await store.databaseExists())) {
      throw new Error(`Database '${store.databaseName}' does not exist.`);
    }
    const confirmed = options.yes === true || (await confirmAction(`Delete all data of scene '${sceneId}'?`));
    if (!confirmed) {
      console.log(chalk.yellow("Aborted."));
      return;
    }

    const result = await new DataInserter(store).deleteScene(sceneId);
    console.log(`Entities deleted: ${result.entitiesDeleted}`);
    for (const error of result.errors) {
      console.error(chalk.red(`  - ${error}`));
    }
    if (!result.success) {
      process.exitCode = 1;
    }
  });
}

async function describeStore(store: ISceneGraphStore): Promise<void> {
  if (!(await store.databaseExists())) {
    console.log(`Status:   ${chalk.yellow("not created")}`);
    return;
  }

  const schema = await store.getSchema();
  console.log(`Status:   ${chalk.green("ready")}`);
  console.log(`Schema:   ${schema ? `${schema.split("\n").length} line(s)` : chalk.dim("empty")}`);
  if (schema) {
    console.log(`Objects:  ${readCount(await store.executeRead(ENTITY_COUNT_QUERY))}`);
  }
}

export async function infoCommand(_options: unknown, command: Command): Promise<void> {
  const config = resolveConfig(command);

  printHeading("Scene Graph");
  console.log(`Address:  ${config.typedb.address}`);
  console.log(`Database: ${config.typedb.database}`);
  console.log(`Model:    ${config.model.id}`);
  console.log(`Sampling: ${config.frames.fps} fps, at most ${config.frames.maxFrames} frame(s)`);

  await withStore(config, describeStore);
}
