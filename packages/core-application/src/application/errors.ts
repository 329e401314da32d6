export class StartupError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "StartupError";
  }
}

export class RootNotFoundError extends StartupError {
  constructor(public rootPath: string, cause?: unknown) {
    super(`Root directory does not exist: ${rootPath}`, cause);
    this.name = "RootNotFoundError";
  }
}

export class InvalidOptionError extends StartupError {
  constructor(public option: string, message: string) {
    super(message);
    this.name = "InvalidOptionError";
  }
}

export class OutputDirectoryError extends StartupError {
  constructor(public outputDir: string, cause?: unknown) {
    super(`Failed to create output directory: ${outputDir}`, cause);
    this.name = "OutputDirectoryError";
  }
}

export class TraversalError extends Error {
  constructor(public directory: string, public cause?: unknown) {
    super(`Failed to read directory: ${directory}`);
    this.name = "TraversalError";
  }
}

export class SinkClosedError extends Error {
  constructor(operation: string) {
    super(`Output sink is closed; cannot ${operation}`);
    this.name = "SinkClosedError";
  }
}

export class SinkStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SinkStateError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
