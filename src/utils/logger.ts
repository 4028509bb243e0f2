/**
 * Logger Module
 * Structured logging using pino, written to stderr so command output on
 * stdout stays clean.
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerOptions {
  level?: LogLevel;
}

const VALID_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

const loggers = new Set<PinoLogger>();
let levelOverride: LogLevel | null = null;

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Pretty output only makes sense on an interactive terminal
 */
function usePrettyOutput(): boolean {
  return process.env.NODE_ENV !== "production" && process.stderr.isTTY === true;
}

/**
 * Get log level from environment or default
 */
export function getLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "warn";
}

/**
 * Create a logger instance for a specific component
 *
 * @param component - The component name (e.g., "planner", "typedb-store")
 *
 * @example
 * ```typescript
 * const logger = createLogger("planner");
 * logger.info({ operations: 3 }, "Migration planned");
 * logger.error({ err }, "Schema operation failed");
 * ```
 */
export function createLogger(
  component: string,
  options: LoggerOptions = {}
): PinoLogger {
  const level = options.level ?? getLogLevel();
  const baseOptions: pino.LoggerOptions = { name: component, level };

  const logger = level !== "silent" && usePrettyOutput()
    ? pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            destination: 2,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      })
    : pino(baseOptions, pino.destination(2));

  loggers.add(logger);
  return logger;
}

/**
 * Changes the level of every logger created so far and of those created later.
 * Used by the CLI's --debug flag.
 */
export function setLogLevel(level: LogLevel): void {
  levelOverride = level;
  for (const logger of loggers) {
    logger.level = level;
  }
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(
  parent: PinoLogger,
  bindings: Record<string, unknown>
): PinoLogger {
  return parent.child(bindings);
}
