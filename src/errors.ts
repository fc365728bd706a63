/**
 * Error types raised while computing directory statistics.
 */

export class DirStatError extends Error {
  constructor(
    message: string,
    public code: string,
    public path?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "DirStatError";
  }
}

/**
 * Malformed command line. Nothing is walked.
 */
export class UsageError extends DirStatError {
  constructor(message: string) {
    super(message, "USAGE");
    this.name = "UsageError";
  }
}

/**
 * A child path could not be built. Aborts the whole run.
 */
export class AllocationError extends DirStatError {
  constructor(path: string, cause: unknown) {
    super(`Cannot build path under ${path}: ${describeError(cause)}`, "ALLOCATION", path, { cause });
    this.name = "AllocationError";
  }
}

/**
 * A directory could not be listed. Fatal only for the starting directory.
 */
export class OpenError extends DirStatError {
  constructor(path: string, cause: unknown) {
    super(describeError(cause), "OPEN", path, { cause });
    this.name = "OpenError";
  }
}

/**
 * Metadata for one entry could not be read. The entry is skipped.
 */
export class StatError extends DirStatError {
  constructor(path: string, cause: unknown) {
    super(describeError(cause), "STAT", path, { cause });
    this.name = "StatError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
