export type KernforgeErrorCode =
  | "config_invalid"
  | "unsupported_distro"
  | "pattern_invalid"
  | "process_failed"
  | "filesystem"
  | "not_found";

/** Base class for every error raised by the provisioning pipeline */
export class KernforgeError extends Error {
  /** stable error code */
  readonly code: KernforgeErrorCode;

  constructor(
    code: KernforgeErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "KernforgeError";
    this.code = code;
  }
}

/** Malformed or missing mask field; aborts a whole run */
export class ConfigError extends KernforgeError {
  constructor(message: string) {
    super("config_invalid", message);
    this.name = "ConfigError";
  }
}

export class UnsupportedDistroError extends KernforgeError {
  readonly distroType: string;

  constructor(distroType: string) {
    super("unsupported_distro", `${distroType} not yet supported`);
    this.name = "UnsupportedDistroError";
    this.distroType = distroType;
  }
}

export class PatternError extends KernforgeError {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("pattern_invalid", `invalid release mask '${pattern}': ${detail}`, {
      cause,
    });
    this.name = "PatternError";
    this.pattern = pattern;
  }
}

/**
 * A container engine command exited non-zero, timed out or failed to spawn.
 *
 * `output` holds stdout and stderr interleaved in arrival order.
 */
export class ProcessError extends KernforgeError {
  readonly command: string;
  readonly args: string[];
  readonly status: string;
  readonly output: string;

  constructor(
    command: string,
    args: string[],
    status: string,
    output: string,
    options?: { cause?: unknown },
  ) {
    super(
      "process_failed",
      `Command failed: ${command} ${args.join(" ")}\n` +
        `exit: ${status}` +
        (output ? `\n${output}` : ""),
      options,
    );
    this.name = "ProcessError";
    this.command = command;
    this.args = [...args];
    this.status = status;
    this.output = output;
  }
}

export class FilesystemError extends KernforgeError {
  readonly path: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super("filesystem", `${message}: ${filePath}`, options);
    this.name = "FilesystemError";
    this.path = filePath;
  }
}

/**
 * Restoring an image definition after a failed rebuild failed.
 *
 * The definition on disk may no longer match the last built image.
 */
export class RollbackError extends FilesystemError {
  /** error that triggered the rollback */
  readonly buildError: unknown;

  constructor(filePath: string, buildError: unknown, restoreError: unknown) {
    super(filePath, "cannot roll back image definition", {
      cause: restoreError,
    });
    this.name = "RollbackError";
    this.buildError = buildError;
  }
}

export class NotFoundError extends KernforgeError {
  constructor(message: string) {
    super("not_found", message);
    this.name = "NotFoundError";
  }
}

export function formatError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
