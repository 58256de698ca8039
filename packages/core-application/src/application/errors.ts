export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = [], public cause?: unknown) {
    super(message);
    this.name = "ConfigError";
  }
}

export class InvalidRunModeError extends Error {
  constructor(public readonly value: string) {
    super(`Invalid RUN_MODE=${value}, expected 'cron' or 'trigger'`);
    this.name = "InvalidRunModeError";
  }
}

export class InvalidDestinationError extends Error {
  constructor(message: string, public readonly destination: string) {
    super(message);
    this.name = "InvalidDestinationError";
  }
}

export type NotStableReason = "vanished" | "timed_out";

export class FileNotStableError extends Error {
  constructor(public readonly path: string, public readonly reason: NotStableReason) {
    super(reason === "vanished" ? `File ${path} vanished before it settled` : `File ${path} did not settle in time`);
    this.name = "FileNotStableError";
  }
}

export class IntegrityError extends Error {
  constructor(message: string, public readonly expected: string, public readonly actual: string) {
    super(message);
    this.name = "IntegrityError";
  }
}

export class ManifestWriteError extends Error {
  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ManifestWriteError";
  }
}

export class SameFileError extends Error {
  constructor(public readonly source: string, public readonly target: string) {
    super(`${target} is the same file as ${source}`);
    this.name = "SameFileError";
  }
}
