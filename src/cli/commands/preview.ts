/**
 * preview command - Show the schema changes and inserts a load would run
 */

import chalk from "chalk";
import type { Command } from "commander";
import ora from "ora";
import { summarizeAnalysis } from "../../core/analysis/models.js";
import { requireApiKey } from "../../utils/config.js";
import { createSceneLoader, printHeading, resolveConfig, withStore, type SamplingFlags } from "../context.js";

export interface PreviewOptions extends SamplingFlags {
  sceneId?: string;
}

export async function previewCommand(video: string, options: PreviewOptions, command: Command): Promise<void> {
  const config = resolveConfig(command, options);
  const apiKey = requireApiKey();

  const preview = await withStore(config, async (store) => {
    const spinner = ora(`Extracting frames from ${video}...`).start();
    try {
      const outcome = await createSceneLoader(config, store, apiKey).previewScene(video, {
        sampling: config.frames,
        sceneId: options.sceneId,
        onStage: (stage) => {
          if (stage === "connecting") spinner.text = `Reading schema of ${config.typedb.database}...`;
          if (stage === "analyzing") spinner.text = "Analyzing frames...";
        },
      });
      spinner.succeed(chalk.green(`Analyzed ${outcome.frameCount} frame(s)`));
      return outcome;
    } catch (error) {
      spinner.fail(chalk.red("Preview failed"));
      throw error;
    }
  });

  const summary = summarizeAnalysis(preview.analysis);
  console.log(`Scene:     ${preview.sceneId}`);
  console.log(`Entities:  ${summary.entities}`);
  console.log(`Relations: ${summary.relations}`);

  if (preview.initialSchema !== undefined) {
    printHeading("Initial Schema");
    console.log(preview.initialSchema);
  } else if (preview.plan) {
    printHeading("Migration Plan");
    console.log(preview.plan.summary());
  }

  printHeading("Data Insertion");
  if (preview.entityInserts.length === 0 && preview.relationInserts.length === 0) {
    console.log(chalk.dim("Nothing to insert."));
  }
  for (const statement of [...preview.entityInserts, ...preview.relationInserts]) {
    console.log(statement);
    console.log();
  }
  console.log(chalk.dim("Preview only: nothing was written."));
}
