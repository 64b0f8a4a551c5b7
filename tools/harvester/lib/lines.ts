import { appendFileSync, existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import { emitAgentEvent } from "../pipeline/events.js";
import { ensureDir } from "./json.js";

export function appendLines(path: string, lines: readonly string[]): void {
  if (lines.length === 0) {
    return;
  }
  ensureDir(dirname(path));
  const content = lines.map((line) => `${line}\n`).join("");
  emitAgentEvent({
    level: "debug",
    eventType: "file.write",
    message: "Appending lines",
    path,
    lines: lines.length,
    bytes: Buffer.byteLength(content),
  });
  appendFileSync(path, content, "utf-8");
}

/** Every line of the file without its newline; a missing file reads as empty. */
export function readLines(path: string): string[] {
  if (!existsSync(path)) {
    return [];
  }
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading lines",
    path,
  });
  const text = readFileSync(path, "utf-8");
  const lines = text.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function touchFile(path: string): void {
  if (existsSync(path)) {
    return;
  }
  ensureDir(dirname(path));
  writeFileSync(path, "", "utf-8");
}

export function removeFile(path: string): boolean {
  if (!existsSync(path)) {
    return false;
  }
  rmSync(path);
  return true;
}
