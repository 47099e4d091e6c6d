/**
 * Structured logger for the entrypoint.
 *
 * Writes human-readable output to the console and, when enabled, JSON log
 * lines to <stateDir>/logs/.
 * Log format: {ts, level, component, msg}
 * Console format: [component] message
 */
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { LogEntry, LogLevel } from "./types.js";
import { redactCredentials } from "../security/credentials.js";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export interface LoggerContext {
  /** Startup step (e.g. "leads"). Empty for the top-level logger. */
  component: string;
}

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Directory for JSON log files. Defaults to ~/.nanobot/logs/. */
  logDir?: string;
  /** Whether to write to file. Defaults to false. */
  fileOutput?: boolean;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly logDir: string;
  private fileOutput: boolean;
  private readonly consoleOutput: boolean;
  private logFilePath: string | null = null;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.logDir = options.logDir ?? path.join(os.homedir(), ".nanobot", "logs");
    this.fileOutput = options.fileOutput ?? false;
    this.consoleOutput = options.consoleOutput ?? true;
  }

  fatal(msg: string): void {
    this.log("fatal", msg);
  }

  error(msg: string): void {
    this.log("error", msg);
  }

  warn(msg: string): void {
    this.log("warn", msg);
  }

  info(msg: string): void {
    this.log("info", msg);
  }

  debug(msg: string): void {
    this.log("debug", msg);
  }

  trace(msg: string): void {
    this.log("trace", msg);
  }

  /** Create a child logger for a startup step. */
  child(component: string): Logger {
    return new Logger(
      { component },
      {
        level: this.level,
        logDir: this.logDir,
        fileOutput: this.fileOutput,
        consoleOutput: this.consoleOutput,
      },
    );
  }

  private log(level: LogLevel, msg: string): void {
    if (LOG_LEVEL_PRIORITY[level] > LOG_LEVEL_PRIORITY[this.level]) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.context.component,
      msg: redactCredentials(msg),
    };

    if (this.consoleOutput) {
      this.writeConsole(entry);
    }

    if (this.fileOutput) {
      this.writeFile(entry);
    }
  }

  private writeConsole(entry: LogEntry): void {
    const prefix = entry.component ? `[${entry.component}]` : "[entrypoint]";
    const line = `${prefix} ${entry.msg}`;

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(entry: LogEntry): void {
    try {
      if (!this.logFilePath) {
        fs.mkdirSync(this.logDir, { recursive: true });
        const date = new Date().toISOString().slice(0, 10);
        this.logFilePath = path.join(this.logDir, `entrypoint-${date}.jsonl`);
      }
      fs.appendFileSync(this.logFilePath, JSON.stringify(entry) + "\n");
    } catch (error: unknown) {
      // A broken log file must not stop the gateway from starting; say so once on stderr.
      const msg = error instanceof Error ? error.message : String(error);
      console.error(`[entrypoint] log file disabled: ${msg}`);
      this.fileOutput = false;
    }
  }
}

/** Create a logger with default context. */
export function createLogger(
  context: Partial<LoggerContext> = {},
  options: LoggerOptions = {},
): Logger {
  return new Logger({ component: context.component ?? "" }, options);
}
