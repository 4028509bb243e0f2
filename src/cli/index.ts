#!/usr/bin/env node

/**
 * Scenegraph CLI
 * Turns videos into scene graphs in TypeDB and answers questions about them
 */

import { Command } from "commander";
import chalk from "chalk";
import { clearCommand, deleteSceneCommand, infoCommand, schemaCommand } from "./commands/database.js";
import { extractCommand } from "./commands/extract.js";
import { loadCommand } from "./commands/load.js";
import { previewCommand } from "./commands/preview.js";
import { executeCommand, queryCommand } from "./commands/query.js";
import { parseNumber, type GlobalOptions } from "./context.js";
import { createLogger, setLogLevel } from "../utils/logger.js";

const logger = createLogger("cli");

const program = new Command();

program
  .name("scenegraph")
  .description("Extract scene graphs from video and query them in TypeDB")
  .version("0.1.0")
  .option("--db-address <address>", "TypeDB HTTP address (default: http://localhost:8000)")
  .option("--db-name <name>", "Database name (default: scene_graph)")
  .option("--db-user <user>", "TypeDB username")
  .option("--db-password <password>", "TypeDB password")
  .option("--debug", "Enable debug logging")
  .configureOutput({
    writeErr: (str) => process.stderr.write(chalk.red(str)),
  })
  .hook("preAction", (thisCommand) => {
    if (thisCommand.opts<GlobalOptions>().debug) {
      setLogLevel("debug");
    }
  });

// =============================================================================
// Commands
// =============================================================================

function withSampling(command: Command): Command {
  return command
    .option("--fps <fps>", "Frames sampled per second of video (default: 0.5)", parseNumber)
    .option("--max-frames <n>", "Maximum frames sent for analysis (default: 5)", parseNumber);
}

withSampling(
  program
    .command("extract")
    .description("Analyze a video and print the scene without touching the database")
    .argument("<video>", "Path to the video file")
    .option("-o, --output <file>", "Write the analysis as JSON")
).action(extractCommand);

withSampling(
  program
    .command("preview")
    .description("Show the schema changes and inserts a load would run")
    .argument("<video>", "Path to the video file")
    .option("--scene-id <id>", "Scene id used in the rendered inserts")
).action(previewCommand);

withSampling(
  program
    .command("load")
    .alias("analyze")
    .description("Analyze a video, migrate the schema and insert the scene")
    .argument("<video>", "Path to the video file")
    .option("--scene-id <id>", "Scene id (default: scene_<random>)")
    .option("-y, --yes", "Apply schema changes without asking")
).action(loadCommand);

program
  .command("query")
  .description("Ask a question in natural language")
  .argument("<question>", "Question about the loaded scenes")
  .action(queryCommand);

program
  .command("execute")
  .description("Run a TypeQL read query")
  .argument("<typeql>", "TypeQL query")
  .action(executeCommand);

program.command("schema").description("Print the current database schema").action(schemaCommand);

program
  .command("clear")
  .description("Delete the database")
  .option("-y, --yes", "Skip confirmation")
  .action(clearCommand);

program
  .command("delete-scene")
  .description("Delete every entity and relation of one scene")
  .argument("<sceneId>", "Scene id given at load time")
  .option("-y, --yes", "Skip confirmation")
  .action(deleteSceneCommand);

program.command("info").description("Show configuration and database status").action(infoCommand);

// =============================================================================
// Global Error Handling
// =============================================================================

function handleError(error: unknown): void {
  if (error instanceof Error) {
    logger.error({ err: error }, "CLI error occurred");
    console.error(chalk.red(`\nError: ${error.message}`));
    if (process.env.DEBUG || process.env.NODE_ENV === "development") {
      console.error(chalk.dim(error.stack));
    }
  } else {
    logger.error({ error }, "Unknown error occurred");
    console.error(chalk.red("\nAn unexpected error occurred"));
  }
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "Unhandled promise rejection");
  handleError(reason);
});

process.on("uncaughtException", (error) => {
  logger.error({ err: error }, "Uncaught exception");
  handleError(error);
});

process.on("SIGINT", () => {
  console.log(chalk.dim("\nInterrupted."));
  process.exit(130);
});

// =============================================================================
// Parse and Execute
// =============================================================================

program.parseAsync(process.argv).catch(handleError);
