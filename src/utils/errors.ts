export class LibraryError extends Error {
  public readonly originalError?: unknown;

  constructor(message: string, originalError?: unknown) {
    super(message);
    this.name = "LibraryError";
    this.originalError = originalError;
  }
}

/** The watched root is missing or is not a directory. */
export class InvalidRootError extends LibraryError {
  public readonly root: string;

  constructor(root: string, reason: string, cause?: unknown) {
    super(`Invalid library root ${root}: ${reason}`, cause);
    this.name = "InvalidRootError";
    this.root = root;
  }
}

/** The backing file exists but could not be read or decoded. */
export class PersistenceLoadError extends LibraryError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Failed to load ${filePath}: ${reason}`, cause);
    this.name = "PersistenceLoadError";
    this.filePath = filePath;
  }
}

/** A flush failed; the in-memory mapping is untouched. */
export class PersistenceWriteError extends LibraryError {
  public readonly filePath: string;

  constructor(filePath: string, cause?: unknown) {
    super(`Failed to write ${filePath}${cause instanceof Error ? `: ${cause.message}` : ""}`, cause);
    this.name = "PersistenceWriteError";
    this.filePath = filePath;
  }
}

export class ConfigError extends LibraryError {
  public readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  const { code } = error;
  return typeof code === "string" && codes.includes(code);
}
