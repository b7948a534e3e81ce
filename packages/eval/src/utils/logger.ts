/**
 * Process-wide logger for the evaluation bench
 *
 * Respects verbose, quiet, no-color and JSON-lines modes.
 * Warnings and errors go to stderr, everything else to stdout.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Show debug messages and attached data */
  verbose?: boolean;
  /** Only show errors */
  quiet?: boolean;
  /** Disable color output */
  noColor?: boolean;
  /** Emit one JSON object per line */
  json?: boolean;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Info level with a green check mark */
  success(message: string, data?: Record<string, unknown>): void;
  /** Raw JSON to stdout, even in quiet mode */
  json(data: unknown): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const plain = new Chalk({ level: 0 });

let globalOptions: LoggerOptions = {
  verbose: false,
  quiet: false,
  noColor: false,
  json: false,
};

function palette(): ChalkInstance {
  return globalOptions.noColor === true ? plain : chalk;
}

function shouldOutput(level: LogLevel): boolean {
  if (globalOptions.quiet) {
    return level === "error";
  }
  if (level === "debug") {
    return globalOptions.verbose === true;
  }
  return true;
}

function writeStdout(line: string): void {
  process.stdout.write(line + "\n");
}

function writeStderr(line: string): void {
  process.stderr.write(line + "\n");
}

function formatText(level: LogLevel, message: string, prefix?: string): string {
  const c = palette();
  switch (level) {
    case "debug":
      return c.gray(`[debug] ${message}`);
    case "info":
      return prefix ? `${prefix} ${message}` : message;
    case "warn":
      return c.yellow(`${c.bold("warning:")} ${message}`);
    case "error":
      return c.red(`${c.bold("error:")} ${message}`);
  }
}

function outputLog(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>,
  prefix?: string
): void {
  if (!shouldOutput(level)) {
    return;
  }

  if (globalOptions.json) {
    const entry: JsonLogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
    };
    if (data) {
      entry.data = data;
    }
    writeStdout(JSON.stringify(entry));
    return;
  }

  const line = formatText(level, message, prefix);
  if (level === "error" || level === "warn") {
    writeStderr(line);
  } else {
    writeStdout(line);
  }

  if (data && globalOptions.verbose) {
    writeStdout(palette().gray(JSON.stringify(data, null, 2)));
  }
}

function createLoggerInstance(): Logger {
  return {
    debug(message, data) {
      outputLog("debug", message, data);
    },
    info(message, data) {
      outputLog("info", message, data);
    },
    warn(message, data) {
      outputLog("warn", message, data);
    },
    error(message, data) {
      outputLog("error", message, data);
    },
    success(message, data) {
      outputLog("info", message, data, palette().green("✓"));
    },
    json(data) {
      writeStdout(JSON.stringify(data, null, globalOptions.json ? 0 : 2));
    },
    configure(options) {
      globalOptions = { ...globalOptions, ...options };
    },
    getOptions() {
      return { ...globalOptions };
    },
  };
}

export const logger: Logger = createLoggerInstance();

export function configureLogger(options: LoggerOptions): void {
  logger.configure(options);
}

/** Chalk instance that honours --no-color */
export function colors(): ChalkInstance {
  return palette();
}
