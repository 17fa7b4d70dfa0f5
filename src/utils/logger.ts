import type { LogLevelName } from "../config.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogSink = (line: string) => void;

// stdout carries the MCP protocol, so every level goes to stderr.
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export class Logger {
  private readonly levelName: LogLevelName;
  private readonly level: LogLevel;
  private readonly scope?: string;
  private readonly sink: LogSink;

  constructor(level: LogLevelName = "INFO", scope?: string, sink: LogSink = stderrSink) {
    this.levelName = level;
    this.level = LogLevel[level];
    this.scope = scope;
    this.sink = sink;
  }

  /** Returns a logger that prefixes every line with `[scope]`. */
  child(scope: string): Logger {
    const nested = this.scope ? `${this.scope}:${scope}` : scope;
    return new Logger(this.levelName, nested, this.sink);
  }

  debug(message: string): void {
    this.write(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.write(LogLevel.INFO, message);
  }

  warn(message: string): void {
    this.write(LogLevel.WARN, message);
  }

  error(message: string): void {
    this.write(LogLevel.ERROR, message);
  }

  private write(level: LogLevel, message: string): void {
    if (level < this.level) return;
    const timestamp = new Date().toISOString();
    const scope = this.scope ? ` [${this.scope}]` : "";
    this.sink(`[${timestamp}] ${LogLevel[level]}${scope}: ${message}`);
  }
}

export const silentLogger = new Logger("ERROR", undefined, () => {});
