// herocore/utils/logger.ts

import { Colors, colorize, type ColorCode } from "./colors";
import { type LogLevel, logEnabled } from "../config/logconfig";

export interface LogRecord {
  scope: string;
  level: LogLevel;
  message?: string;
  data: unknown[];
}

/**
 * Where formatted log lines end up. Defaults to console.log; tests swap it
 * out with setLogSink() to capture records.
 */
export type LogSink = (line: string, record: LogRecord) => void;

const consoleSink: LogSink = (line, record) => {
  if (record.data.length === 0) {
    console.log(line);
  } else {
    console.log(line, ...record.data);
  }
};

let sink: LogSink = consoleSink;

/** Replace the output sink; returns a function restoring the previous one. */
export function setLogSink(next: LogSink): () => void {
  const prev = sink;
  sink = next;
  return () => {
    sink = prev;
  };
}

function timestamp(): string {
  const d = new Date();
  const h = String(d.getHours()).padStart(2, "0");
  const m = String(d.getMinutes()).padStart(2, "0");
  const s = String(d.getSeconds()).padStart(2, "0");
  const ms = String(d.getMilliseconds()).padStart(3, "0");
  return `${h}:${m}:${s}.${ms}`;
}

function levelColor(level: LogLevel): ColorCode {
  switch (level) {
    case "debug":
      return Colors.BrightCyan;
    case "info":
      return Colors.FgGreen;
    case "warn":
      return Colors.FgYellow;
    case "error":
    default:
      return Colors.FgRed;
  }
}

function maybeFormatError(value: unknown): unknown {
  if (value instanceof Error) {
    return {
      error: value.message,
      name: value.name,
      stack: value.stack,
    };
  }
  return value;
}

export class Logger {
  private constructor(readonly scope: string) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase());
  }

  private write(level: LogLevel, color: ColorCode, args: unknown[]): void {
    if (!logEnabled(this.scope, level)) return;

    const [first, ...rest] = args;
    const message = typeof first === "string" ? first : undefined;
    const data = (message !== undefined ? rest : args).map(maybeFormatError);

    const tag = colorize(`[${this.scope}:${level.toUpperCase()}]`, color);
    const line =
      message !== undefined
        ? `${timestamp()} ${tag} ${message}`
        : `${timestamp()} ${tag}`;

    sink(line, { scope: this.scope, level, message, data });
  }

  debug(...args: unknown[]): void {
    this.write("debug", levelColor("debug"), args);
  }

  info(...args: unknown[]): void {
    this.write("info", levelColor("info"), args);
  }

  warn(...args: unknown[]): void {
    this.write("warn", levelColor("warn"), args);
  }

  error(...args: unknown[]): void {
    this.write("error", levelColor("error"), args);
  }

  // info level, bright green tag
  success(...args: unknown[]): void {
    this.write("info", Colors.BrightGreen, args);
  }
}
