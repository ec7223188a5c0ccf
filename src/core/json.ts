import fs from "fs";
import path from "path";
import type { z } from "zod/v4";
import { errorMessage } from "./errors.js";
import { log } from "./logger.js";

export function safeParseJsonFile(filePath: string, label: string): unknown | null {
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    log.warn("store", `failed to parse ${label} (${filePath}): ${errorMessage(err)}`);
    return null;
  }
}

/** Read and validate a JSON file. Missing or invalid files yield null. */
export function readJsonFile<T>(filePath: string, schema: z.ZodType<T>, label: string): T | null {
  if (!fs.existsSync(filePath)) return null;
  const raw = safeParseJsonFile(filePath, label);
  if (raw === null) return null;
  const result = schema.safeParse(raw);
  if (!result.success) {
    log.warn("store", `invalid ${label}: ${result.error.message}`);
    return null;
  }
  return result.data;
}

/** Write through a temp file and rename, so readers never observe a partial file. */
export function writeJsonFileAtomic(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmp = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(data, null, 2) + "\n");
  fs.renameSync(tmp, filePath);
}

export function appendJsonLine(filePath: string, entry: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");
}

/** Parse a JSONL file line by line, skipping lines that fail validation. */
export function readJsonLines<T>(filePath: string, schema: z.ZodType<T>, label: string): T[] {
  if (!fs.existsSync(filePath)) return [];
  const entries: T[] = [];
  const lines = fs.readFileSync(filePath, "utf-8").split("\n");
  for (const [i, line] of lines.entries()) {
    if (!line.trim()) continue;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (err) {
      log.warn("store", `${label}: skipping unparseable line ${i + 1}: ${errorMessage(err)}`);
      continue;
    }
    const result = schema.safeParse(raw);
    if (result.success) {
      entries.push(result.data);
    } else {
      log.warn("store", `${label}: skipping invalid line ${i + 1}: ${result.error.message}`);
    }
  }
  return entries;
}
