/**
 * extract command - Analyze a video without touching the database
 */

import chalk from "chalk";
import type { Command } from "commander";
import ora from "ora";
import { summarizeAnalysis } from "../../core/analysis/models.js";
import { toAnalysisPayload } from "../../core/analysis/parser.js";
import { createLogger, writeJson } from "../../utils/index.js";
import { requireApiKey } from "../../utils/config.js";
import { createSceneLoader, createStore, printHeading, resolveConfig, type SamplingFlags } from "../context.js";

const logger = createLogger("extract");

export interface ExtractOptions extends SamplingFlags {
  output?: string;
}

const SAMPLE_ENTITIES = 5;

export async function extractCommand(video: string, options: ExtractOptions, command: Command): Promise<void> {
  const config = resolveConfig(command, options);
  const apiKey = requireApiKey();
  const loader = createSceneLoader(config, createStore(config), apiKey);

  const spinner = ora(`Extracting frames from ${video}...`).start();
  const { frameCount, analysis } = await loader
    .analyzeVideo(video, {
      sampling: config.frames,
      onStage: (stage) => {
        if (stage === "analyzing") spinner.text = "Analyzing frames...";
      },
    })
    .catch((error: unknown) => {
      spinner.fail(chalk.red("Extraction failed"));
      throw error;
    });
  spinner.succeed(chalk.green(`Analyzed ${frameCount} frame(s)`));

  const summary = summarizeAnalysis(analysis);
  logger.info({ video, ...summary, entityTypes: summary.entityTypes.size }, "Extraction complete");

  printHeading("Extraction Results");
  console.log(`Entities:       ${summary.entities}`);
  console.log(`Relations:      ${summary.relations}`);
  console.log(`Schema changes: ${summary.schemaChanges}`);

  if (summary.entityTypes.size > 0) {
    printHeading("Entity Types");
    for (const [type, count] of [...summary.entityTypes].sort(([a], [b]) => a.localeCompare(b))) {
      console.log(`  ${type}: ${count}`);
    }
  }

  const entities = [...analysis.newEntities, ...analysis.pendingEntities];
  if (entities.length > 0) {
    printHeading("Sample Entities");
    for (const entity of entities.slice(0, SAMPLE_ENTITIES)) {
      console.log(`  ${chalk.white(entity.id)} ${chalk.dim(`(${entity.type})`)} ${JSON.stringify(entity.attributes)}`);
    }
  }

  if (options.output) {
    writeJson(options.output, toAnalysisPayload(analysis));
    console.log();
    console.log(chalk.green(`Saved analysis to ${options.output}`));
  }
}
