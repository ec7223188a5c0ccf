import fs from "fs";
import path from "path";
import { errorMessage } from "../core/errors.js";
import type { Logger } from "../core/logger.js";

export type Level = "debug" | "info" | "warn" | "error";

export const LEVELS: Record<Level, number> = { debug: 0, info: 1, warn: 2, error: 3 };
const MAX_FILE_SIZE = 5 * 1024 * 1024; // 5 MB

export function isLevel(value: string): value is Level {
  return value in LEVELS;
}

export interface FileLogger extends Logger {
  readonly filePath: string;
  close(): void;
}

export function formatLine(level: Level, tag: string, message: string, args: unknown[], at = new Date()): string {
  const lvl = level.toUpperCase().padEnd(5);
  const extra = args.length > 0
    ? " " + args.map((a) => (a instanceof Error ? (a.stack ?? a.message) : String(a))).join(" ")
    : "";
  return `${at.toISOString()} ${lvl} [${tag}] ${message}${extra}`;
}

/**
 * Writes every line to `<workspace>/logs/phaseloop.log` (rotated to `.1`
 * past 5 MB) and echoes lines at or above `level` to stderr.
 */
export function createFileLogger(workspaceDir: string, level: Level = "info"): FileLogger {
  const dir = path.join(workspaceDir, "logs");
  fs.mkdirSync(dir, { recursive: true });
  const filePath = path.join(dir, "phaseloop.log");
  let stream: fs.WriteStream | null = fs.createWriteStream(filePath, { flags: "a" });
  const minLevel = LEVELS[level];

  function rotateIfNeeded(current: fs.WriteStream): void {
    try {
      if (fs.statSync(filePath).size <= MAX_FILE_SIZE) return;
      current.end();
      const rotated = filePath + ".1";
      if (fs.existsSync(rotated)) fs.unlinkSync(rotated);
      fs.renameSync(filePath, rotated);
      stream = fs.createWriteStream(filePath, { flags: "a" });
    } catch (err) {
      process.stderr.write(`log rotation failed: ${errorMessage(err)}\n`);
    }
  }

  function write(lvl: Level, tag: string, message: string, args: unknown[]): void {
    const line = formatLine(lvl, tag, message, args);
    if (LEVELS[lvl] >= minLevel) process.stderr.write(line + "\n");
    if (stream) {
      stream.write(line + "\n");
      rotateIfNeeded(stream);
    }
  }

  return {
    filePath,
    close() {
      stream?.end();
      stream = null;
    },
    debug(tag, msg, ...args) { write("debug", tag, msg, args); },
    info(tag, msg, ...args) { write("info", tag, msg, args); },
    warn(tag, msg, ...args) { write("warn", tag, msg, args); },
    error(tag, msg, ...args) { write("error", tag, msg, args); },
  };
}
