export class HarvestError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, options: { code: string; retryable?: boolean; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = options.code;
    this.retryable = options.retryable ?? false;
  }
}

export class ConfigurationError extends HarvestError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "E_CONFIG", retryable: false, cause });
  }
}

export class ContainerNotFoundError extends HarvestError {
  constructor(public readonly selector: string, cause?: unknown) {
    super(`container not found: ${selector}`, {
      code: "E_CONTAINER_NOT_FOUND",
      retryable: false,
      cause,
    });
  }
}

export class ExtractionError extends HarvestError {
  constructor(message: string, cause?: unknown, retryable = true) {
    super(message, { code: "E_EXTRACTION", retryable, cause });
  }
}

export class DriverTimeoutError extends HarvestError {
  constructor(operation: string, timeoutMs: number, cause?: unknown) {
    super(`${operation} timed out after ${timeoutMs}ms`, {
      code: "E_DRIVER_TIMEOUT",
      retryable: true,
      cause,
    });
  }
}

export class WriteError extends HarvestError {
  constructor(public readonly path: string, cause?: unknown) {
    super(`failed to write ${path}: ${describeCause(cause)}`, {
      code: "E_WRITE",
      retryable: false,
      cause,
    });
  }
}

export class CheckpointError extends HarvestError {
  constructor(message: string, cause?: unknown) {
    super(message, { code: "E_CHECKPOINT", retryable: false, cause });
  }
}

export function normalizeHarvestError(error: unknown): HarvestError {
  if (error instanceof HarvestError) {
    return error;
  }

  if (isFsError(error)) {
    return new WriteError(error.path ?? "(unknown path)", error);
  }

  if (error instanceof Error) {
    return new HarvestError(error.message, { code: "E_UNEXPECTED", cause: error });
  }

  return new HarvestError(String(error), { code: "E_UNEXPECTED", cause: error });
}

interface FsError extends Error {
  code: string;
  syscall: string;
  path?: string;
}

function isFsError(error: unknown): error is FsError {
  return (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string" &&
    "syscall" in error &&
    typeof error.syscall === "string"
  );
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? "unknown error" : String(cause);
}
