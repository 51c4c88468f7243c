export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  try {
    return String(error);
  } catch {
    return "Failed to get error details";
  }
}

/**
 * A mistake in what the user typed: bad command arguments, a pattern with no
 * match. Shown as a notice; never fatal.
 */
export class CommandError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandError";
  }
}

export class FatalError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
  ) {
    super(message);
  }
}

export class FatalConfigError extends FatalError {
  constructor(message: string) {
    super(message, 52);
  }
}

/** Turns a file system failure into a line fit for the status notice. */
export function describeFileError(error: unknown, filePath: string): string {
  if (isNodeError(error)) {
    switch (error.code) {
      case "ENOENT":
        return `File not found: ${filePath}`;
      case "EACCES":
      case "EPERM":
        return `Permission denied: ${filePath}`;
      case "EISDIR":
        return `Is a directory: ${filePath}`;
      default:
        break;
    }
  }
  return `${filePath}: ${getErrorMessage(error)}`;
}
