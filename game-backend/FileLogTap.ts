// game-backend/FileLogTap.ts

import fs from "fs";
import util from "util";

type ConsoleMethod = (...args: unknown[]) => void;

// Matches ANSI color codes like \u001b[32m, \u001b[0m, etc.
const ANSI_REGEX = /\u001b\[[0-9;]*m/g;

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") {
    return stripAnsi(arg);
  }
  if (arg instanceof Error) {
    return stripAnsi(arg.stack ?? arg.message);
  }
  try {
    return stripAnsi(JSON.stringify(arg));
  } catch {
    // circular structures
    return stripAnsi(util.inspect(arg));
  }
}

export function formatLogLine(level: string, args: unknown[], at: Date = new Date()): string {
  return `[${at.toISOString()}] [${level}] ${args.map(serializeArg).join(" ")}\n`;
}

function wrapMethod(
  level: string,
  original: ConsoleMethod,
  writer: (level: string, args: unknown[]) => void,
): ConsoleMethod {
  return (...args: unknown[]): void => {
    writer(level, args);
    original.apply(console, args);
  };
}

/**
 * Mirror console.log/info/warn/error into `filePath` (append mode).
 * Returns a function restoring the original console methods.
 */
export function installFileLogTap(filePath: string): () => void {
  const stream = fs.createWriteStream(filePath, { flags: "a" });

  stream.on("error", (err) => {
    process.stderr.write(`File log tap disabled: ${err.message}\n`);
    restore();
  });

  const writeLine = (level: string, args: unknown[]): void => {
    stream.write(formatLogLine(level, args));
  };

  const { log, info, warn, error } = console;

  console.log = wrapMethod("log", log, writeLine);
  console.info = wrapMethod("info", info, writeLine);
  console.warn = wrapMethod("warn", warn, writeLine);
  console.error = wrapMethod("error", error, writeLine);

  let restored = false;
  function restore(): void {
    if (restored) return;
    restored = true;
    console.log = log;
    console.info = info;
    console.warn = warn;
    console.error = error;
    stream.end();
  }

  return restore;
}
