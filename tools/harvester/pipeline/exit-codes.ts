import {
  CheckpointError,
  ConfigurationError,
  ContainerNotFoundError,
  WriteError,
} from "./errors.js";
import type { ErrorCode, TerminalSignal } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_CONFIG_ERROR = 10;
export const EXIT_SELECTOR_ERROR = 20;
export const EXIT_RETRY_EXCEEDED = 30;
export const EXIT_WRITE_ERROR = 40;
export const EXIT_UNEXPECTED = 50;

const EXIT_BY_SIGNAL: Record<TerminalSignal, number> = {
  completed: EXIT_OK,
  "configuration-error": EXIT_CONFIG_ERROR,
  "container-not-found": EXIT_SELECTOR_ERROR,
  "retry-exceeded": EXIT_RETRY_EXCEEDED,
  "write-failed": EXIT_WRITE_ERROR,
  unexpected: EXIT_UNEXPECTED,
};

export function exitCodeForSignal(signal: TerminalSignal): number {
  return EXIT_BY_SIGNAL[signal];
}

export function signalForError(error: unknown): Exclude<TerminalSignal, "completed" | "retry-exceeded"> {
  if (error instanceof ConfigurationError || error instanceof CheckpointError) {
    return "configuration-error";
  }
  if (error instanceof ContainerNotFoundError) {
    return "container-not-found";
  }
  if (error instanceof WriteError) {
    return "write-failed";
  }
  return "unexpected";
}

export function errorCodeForSignal(signal: TerminalSignal): ErrorCode {
  switch (signal) {
    case "configuration-error":
      return "E_CONFIG";
    case "container-not-found":
      return "E_CONTAINER_NOT_FOUND";
    case "retry-exceeded":
      return "E_RETRY_EXCEEDED";
    case "write-failed":
      return "E_WRITE";
    case "completed":
    case "unexpected":
      return "E_UNEXPECTED";
  }
}

export function exitCodeForError(error: unknown): number {
  return exitCodeForSignal(signalForError(error));
}
