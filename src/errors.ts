/**
 * Error taxonomy for the CLI. Every error maps to a distinct process exit code.
 */

export const ExitCode = {
  Success: 0,
  Failure: 1,
  Configuration: 2,
  InvalidSource: 3,
  NotFound: 4,
  AmbiguousMatch: 5,
  DuplicateFile: 6,
  RemoteAPI: 7,
  InvalidArgument: 8,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export abstract class VStoreError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends VStoreError {
  readonly exitCode = ExitCode.Configuration;
}

/**
 * A local path or URL that could not be read into an upload.
 */
export class InvalidSourceError extends VStoreError {
  readonly exitCode = ExitCode.InvalidSource;

  constructor(
    readonly source: string,
    reason: string,
    options?: ErrorOptions
  ) {
    super(`Cannot read source '${source}': ${reason}`, options);
  }
}

export type ResourceKind =
  | "vector store"
  | "file"
  | "conversation"
  | "response";

export class NotFoundError extends VStoreError {
  readonly exitCode = ExitCode.NotFound;

  constructor(
    readonly resource: ResourceKind,
    readonly key: string,
    options?: ErrorOptions
  ) {
    super(`No ${resource} found for '${key}'`, options);
  }
}

export class AmbiguousMatchError extends VStoreError {
  readonly exitCode = ExitCode.AmbiguousMatch;

  constructor(
    readonly resource: ResourceKind,
    readonly key: string,
    readonly matches: string[]
  ) {
    super(
      `'${key}' matches ${matches.length} ${resource}s: ${matches.join(", ")}`
    );
  }
}

export class DuplicateFileError extends VStoreError {
  readonly exitCode = ExitCode.DuplicateFile;

  constructor(
    readonly fileName: string,
    readonly storeId: string,
    readonly existingId: string
  ) {
    super(
      `File '${fileName}' already exists in vector store ${storeId} (${existingId})`
    );
  }
}

/**
 * Any failure reported by the remote provider: auth, rate limit, validation, connection.
 */
export class RemoteAPIError extends VStoreError {
  readonly exitCode = ExitCode.RemoteAPI;

  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions
  ) {
    super(
      status === undefined
        ? `Remote API error: ${message}`
        : `Remote API error (${status}): ${message}`,
      options
    );
  }
}

export class InvalidArgumentError extends VStoreError {
  readonly exitCode = ExitCode.InvalidArgument;
}

/**
 * Exit code for anything thrown out of a command.
 */
export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof VStoreError ? error.exitCode : ExitCode.Failure;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
