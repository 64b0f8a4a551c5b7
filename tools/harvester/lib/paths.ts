import { dirname, join, resolve } from "path";

export const DEFAULT_RAW_OUTPUT = "./raw_output.txt";
export const DEFAULT_FINAL_OUTPUT = "./final_output.txt";
export const DEFAULT_STATE_FILE = "./state.json";

export function resolveFromCwd(path: string): string {
  return resolve(process.cwd(), path);
}

export function runLogPath(rawOutputPath: string): string {
  return join(dirname(rawOutputPath), "run.log");
}
