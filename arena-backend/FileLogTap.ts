// arena-backend/FileLogTap.ts

import fs from "fs";
import util from "util";

type ConsoleMethod = (...args: unknown[]) => void;

// Matches ANSI color codes like \u001b[32m, \u001b[0m, etc.
const ANSI_REGEX = /\u001b\[[0-9;]*m/g;

function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") return stripAnsi(arg);
  if (arg instanceof Error) return stripAnsi(arg.stack ?? arg.message);
  // inspect never throws on cycles, unlike JSON.stringify
  return stripAnsi(util.inspect(arg, { depth: 4, breakLength: Infinity }));
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
 * Mirror console output (ANSI stripped) into the file named by
 * ARENA_FILELOG. No-op when unset. Returns whether the tap is installed.
 */
export function installFileLogTap(filePath = process.env.ARENA_FILELOG): boolean {
  if (!filePath) return false;

  const stream = fs.createWriteStream(filePath, { flags: "a" });
  let broken = false;

  stream.on("error", (err) => {
    // Console keeps working; stop writing to the file.
    broken = true;
    process.stderr.write(`[FileLogTap] disabled: ${err.message}\n`);
  });

  const writeLine = (level: string, args: unknown[]): void => {
    if (broken) return;
    const payload = args.map(serializeArg).join(" ");
    stream.write(`[${new Date().toISOString()}] [${level}] ${payload}\n`);
  };

  const { log, info, warn, error } = console;

  console.log = wrapMethod("log", log, writeLine);
  console.info = wrapMethod("info", info, writeLine);
  console.warn = wrapMethod("warn", warn, writeLine);
  console.error = wrapMethod("error", error, writeLine);

  return true;
}
