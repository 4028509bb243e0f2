/**
 * load command - Analyze a video and add the scene to the database
 */

import chalk from "chalk";
import type { Command } from "commander";
import ora from "ora";
import { summarizeAnalysis } from "../../core/analysis/models.js";
import type { LoadOutcome, LoadStage } from "../../core/pipeline/scene-loader.js";
import { createLogger } from "../../utils/index.js";
import { requireApiKey } from "../../utils/config.js";
import { confirmAction, createSceneLoader, printHeading, resolveConfig, withStore, type SamplingFlags } from "../context.js";

const logger = createLogger("load");

export interface LoadCommandOptions extends SamplingFlags {
  sceneId?: string;
  yes?: boolean;
}

const SCHEMA_PREVIEW_CHARS = 500;
const SHOWN_ERRORS = 5;
const INITIAL_SCHEMA_QUESTION = "Apply initial schema?";

const STAGE_TEXT: Record<LoadStage, string> = {
  extracting: "Extracting frames...",
  connecting: "Connecting to TypeDB...",
  analyzing: "Analyzing frames...",
  schema: "Generating initial schema...",
  migrating: "Applying schema migration...",
  inserting: "Inserting scene data...",
};

function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export async function loadCommand(video: string, options: LoadCommandOptions, command: Command): Promise<void> {
  const config = resolveConfig(command, options);
  const apiKey = requireApiKey();

  const outcome = await withStore(config, async (store) => {
    const active = ora(STAGE_TEXT.extracting).start();
    try {
      return await createSceneLoader(config, store, apiKey).loadScene(video, {
        sampling: config.frames,
        sceneId: options.sceneId,
        onStage: (stage) => {
          if (!active.isSpinning) active.start();
          active.text = STAGE_TEXT[stage];
        },
        confirm: async (question, details) => {
          active.stop();
          console.log();
          console.log(question === INITIAL_SCHEMA_QUESTION ? truncate(details, SCHEMA_PREVIEW_CHARS) : details);
          console.log();
          return options.yes === true || (await confirmAction(question));
        },
      });
    } catch (error) {
      active.fail(chalk.red("Load failed"));
      throw error;
    } finally {
      if (active.isSpinning) active.stop();
    }
  });

  reportOutcome(outcome);
}

function reportOutcome(outcome: LoadOutcome): void {
  const summary = summarizeAnalysis(outcome.analysis);
  console.log(chalk.green(`Analyzed ${outcome.frameCount} frame(s)`));
  console.log(`Entities:       ${summary.entities}`);
  console.log(`Relations:      ${summary.relations}`);
  console.log(`Schema changes: ${summary.schemaChanges}`);

  switch (outcome.status) {
    case "aborted":
      console.log(chalk.yellow("Aborted."));
      return;

    case "migration_failed": {
      const { migration } = outcome;
      logger.error({ stage: migration.failedStage, error: migration.error }, "Migration failed");
      console.error(chalk.red(`Migration failed at: ${migration.failedOperation?.description ?? "unknown operation"}`));
      console.error(chalk.red(`Error: ${migration.error ?? "unknown error"}`));
      process.exitCode = 1;
      return;
    }

    case "loaded": {
      if (outcome.createdDatabase) {
        console.log(chalk.dim("Created database."));
      }
      if (outcome.schema.kind === "initial") {
        console.log(chalk.green("Initial schema applied."));
      } else if (outcome.schema.kind === "migration") {
        console.log(chalk.green(`Migration applied: ${outcome.schema.result.executedOperations.length} operation(s)`));
      }

      const { insert } = outcome;
      printHeading("Inserted");
      console.log(`Entities:  ${insert.entitiesInserted}`);
      console.log(`Relations: ${insert.relationsInserted}`);

      if (insert.errors.length > 0) {
        console.log(chalk.yellow(`Warnings (${insert.errors.length}):`));
        for (const error of insert.errors.slice(0, SHOWN_ERRORS)) {
          console.log(chalk.yellow(`  - ${error}`));
        }
      }

      console.log();
      console.log(chalk.green(`Done! Scene '${outcome.sceneId}' added to database.`));
      return;
    }
  }
}
