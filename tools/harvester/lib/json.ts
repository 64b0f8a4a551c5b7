import { mkdirSync, readFileSync, renameSync, writeFileSync } from "fs";
import { dirname } from "path";
import { emitAgentEvent } from "../pipeline/events.js";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

export function readJsonFile(path: string): unknown {
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading JSON file",
    path,
  });
  return JSON.parse(readFileSync(path, "utf-8"));
}

export function writeJsonAtomic(path: string, value: unknown): void {
  writeTextAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Writes to a sibling temp file and renames it over `path`, so readers see
 * either the previous content or the new content, never a partial write.
 */
export function writeTextAtomic(path: string, content: string): void {
  ensureDir(dirname(path));
  emitAgentEvent({
    level: "debug",
    eventType: "file.write",
    message: "Writing file atomically",
    path,
    bytes: Buffer.byteLength(content),
  });
  const tmpPath = `${path}.tmp-${process.pid}-${Date.now()}`;
  writeFileSync(tmpPath, content, "utf-8");
  renameSync(tmpPath, path);
}
