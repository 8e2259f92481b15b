/**
 * tslog setup shared by the CLI and the pipeline stages.
 *
 * One root logger per run; each stage takes a named sub-logger so file
 * lines carry `resolver`, `discovery`, `generation` and so on. Secrets from
 * config and transport headers are masked before any transport sees them.
 */

import { Logger, type ILogObj } from "tslog";
import fs from "node:fs";
import path from "node:path";

/** Ordered by severity; the index is tslog's `minLevel` */
export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerConfig {
  name: string;
  level: LogLevel;
  prettyPrint: boolean;
  logToFile: boolean;
  logDir?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: "ticketplan",
  level: "info",
  prettyPrint: true,
  logToFile: false,
};

const MASKED_KEYS = ["apiKey", "token", "authorization", "x-api-key", "password"];

export function createLogger(config: Partial<LoggerConfig> = {}): Logger<ILogObj> {
  const settings = { ...DEFAULT_CONFIG, ...config };

  const logger = new Logger<ILogObj>({
    name: settings.name,
    minLevel: LOG_LEVELS.indexOf(settings.level),
    prettyLogTemplate: settings.prettyPrint
      ? "{{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] "
      : undefined,
    prettyLogTimeZone: "local",
    stylePrettyLogs: settings.prettyPrint,
    maskValuesOfKeys: MASKED_KEYS,
    maskValuesOfKeysCaseInsensitive: true,
  });

  if (settings.logToFile && settings.logDir) {
    attachFileTransport(logger, settings.logDir, settings.name);
  }

  return logger;
}

/**
 * JSON lines appended to `<logDir>/<name>.log`
 */
function attachFileTransport(logger: Logger<ILogObj>, logDir: string, name: string): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
  const logFile = path.join(logDir, `${name}.log`);

  logger.attachTransport((logObj) => {
    fs.appendFileSync(logFile, JSON.stringify(logObj) + "\n");
  });
}

export function createChildLogger(parent: Logger<ILogObj>, name: string): Logger<ILogObj> {
  return parent.getSubLogger({ name });
}

let globalLogger: Logger<ILogObj> | null = null;

/**
 * The run's root logger; a console-only default until `initializeLogging`
 */
export function getLogger(): Logger<ILogObj> {
  globalLogger ??= createLogger();
  return globalLogger;
}

export function setLogger(logger: Logger<ILogObj>): void {
  globalLogger = logger;
}

/**
 * Create the root logger for a run. File logs go to `<outputDir>/logs/ticketplan.log`.
 */
export function initializeLogging(
  outputDir: string,
  level: LogLevel = "info",
  logToFile = true,
): Logger<ILogObj> {
  const logger = createLogger({
    name: "ticketplan",
    level,
    prettyPrint: process.stdout.isTTY ?? true,
    logToFile,
    logDir: path.join(outputDir, "logs"),
  });

  setLogger(logger);
  return logger;
}

export function logEvent(
  logger: Logger<ILogObj>,
  event: string,
  data: Record<string, unknown> = {},
): void {
  logger.info({ event, ...data });
}

/**
 * Run one pipeline stage and log how long it took. Failures are logged and rethrown.
 */
export async function logTiming<T>(
  logger: Logger<ILogObj>,
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  const start = performance.now();
  const elapsed = (): number => Math.round(performance.now() - start);
  try {
    const result = await fn();
    logger.debug({ operation, durationMs: elapsed(), status: "success" });
    return result;
  } catch (error) {
    logger.error({ operation, durationMs: elapsed(), status: "error", error });
    throw error;
  }
}
