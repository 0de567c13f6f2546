/**
 * Error types surfaced to the CLI
 * Anything else (pattern misses, converter failures) is not an error
 */

export class ConversionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConversionError";
  }
}

/**
 * A file the conversion needs could not be opened
 */
export class ResourceError extends ConversionError {
  constructor(
    readonly path: string,
    readonly reason: string,
    cause?: unknown,
  ) {
    super(`Cannot read ${path}: ${reason}`, { cause });
    this.name = "ResourceError";
  }

  /**
   * Wrap an fs error, naming the common OS reasons
   */
  static fromFsError(path: string, error: unknown): ResourceError {
    return new ResourceError(path, describeFsError(error), error);
  }
}

/**
 * One or more required executables are not on PATH
 */
export class MissingDependencyError extends ConversionError {
  constructor(readonly tools: string[]) {
    super(
      `Required ${tools.length === 1 ? "tool" : "tools"} not found on PATH: ${tools.join(", ")}`,
    );
    this.name = "MissingDependencyError";
  }
}

function describeFsError(error: unknown): string {
  if (error instanceof Error && "code" in error) {
    if (error.code === "ENOENT") return "file not found";
    if (error.code === "EACCES" || error.code === "EPERM") {
      return "permission denied";
    }
    if (error.code === "EISDIR") return "is a directory";
  }
  return error instanceof Error ? error.message : String(error);
}
