import stringify from "json-stable-stringify";
import winston from "winston";
import { ConfigManager } from "../config";

export type { LogLevel } from "../types";

type Meta = Record<string, unknown>;

const LEVELS = ["error", "warn", "info", "verbose", "debug", "silly"];

/** Fields winston adds to every entry; everything else is caller metadata. */
const RESERVED = new Set(["level", "message", "timestamp", "stack"]);

/**
 * One log line: `[ts] [canonkey] [LEVEL] message`, then the caller's
 * metadata as key-sorted JSON, then the stack of a logged error.
 */
export function formatLine(info: winston.Logform.TransformableInfo): string {
  const prefix = `[${String(info["timestamp"])}] [canonkey] [${info.level.toUpperCase()}]`;
  const meta: Meta = {};
  for (const [key, value] of Object.entries(info)) {
    if (!RESERVED.has(key)) meta[key] = value;
  }
  const fields = Object.keys(meta).length > 0 ? ` ${stringify(meta) ?? ""}` : "";
  const stack = info["stack"];
  return `${prefix} ${String(info.message)}${fields}${
    typeof stack === "string" ? `\n${stack}` : ""
  }`;
}

let logger: winston.Logger | null = null;

function createLogger(): winston.Logger {
  const { logLevel } = ConfigManager.cfg;

  return winston.createLogger({
    level: logLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
      winston.format.errors({ stack: true }),
      winston.format.printf(formatLine)
    ),
    // stdout belongs to the host application
    transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
    exitOnError: false,
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

export const log = {
  warn: (message: string, meta?: Meta) => getLogger().warn(message, meta),
  verbose: (message: string, meta?: Meta) => getLogger().verbose(message, meta),
  debug: (message: string, meta?: Meta) => getLogger().debug(message, meta),
};

/** Rebuilds the logger on next use, picking up a changed `logLevel`. */
export function resetLogger(): void {
  logger = null;
}
