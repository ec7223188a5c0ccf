import fs from "fs";
import os from "os";
import path from "path";
import { loadEngineConfig, type EngineConfig } from "../core/config.js";
import { setLogger } from "../core/logger.js";
import { FilesystemStore } from "../store/storage.js";
import { flag, UsageError, type ParsedArgs } from "./args.js";
import { createFileLogger, isLevel, type FileLogger } from "./logger.js";

export function resolveWorkspace(explicit?: string): string {
  const ws = explicit ?? process.env.PHASELOOP_WORKSPACE;
  if (ws) {
    return ws.startsWith("~") ? path.join(os.homedir(), ws.slice(1)) : path.resolve(ws);
  }
  return path.join(os.homedir(), ".phaseloop");
}

export interface Workspace {
  dir: string;
  store: FilesystemStore;
  config: EngineConfig;
  logger: FileLogger;
}

/** Resolve the workspace, install the file logger and load configuration. */
export function openWorkspace(args: ParsedArgs): Workspace {
  const dir = resolveWorkspace(flag(args, "workspace"));
  const level = flag(args, "log-level") ?? "info";
  if (!isLevel(level)) throw new UsageError(`invalid --log-level: ${level}`);

  fs.mkdirSync(dir, { recursive: true });
  const logger = createFileLogger(dir, level);
  setLogger(logger);
  return { dir, store: new FilesystemStore(dir), config: loadEngineConfig(dir), logger };
}

export function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}
