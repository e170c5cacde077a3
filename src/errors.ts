/**
 * Base error for everything this tool raises on purpose.
 * `code` lets callers discriminate without instanceof chains.
 */
export class MergeResolutionError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    cause?: Error,
  ) {
    super(message, { cause });
    this.name = 'MergeResolutionError';

    if (cause?.stack) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * A file's content could not be read from repository storage.
 */
export class RepositoryReadError extends MergeResolutionError {
  constructor(
    public readonly revision: string,
    public readonly filePath: string,
    detail: string,
    cause?: Error,
  ) {
    super(`Cannot read "${filePath}" at ${revision}: ${detail}`, 'REPOSITORY_READ', cause);
    this.name = 'RepositoryReadError';
  }
}

/** A structural invariant that should never be broken by valid input. */
export class InvariantError extends MergeResolutionError {
  constructor(message: string) {
    super(message, 'INVARIANT');
    this.name = 'InvariantError';
  }
}

/** A choice set broke its contract (not restartable, or not finite and ordered). */
export class ChoiceSetError extends MergeResolutionError {
  constructor(message: string) {
    super(message, 'CHOICE_SET');
    this.name = 'ChoiceSetError';
  }
}

/** Conflict markers in a merge output are malformed. */
export class MergeParseError extends MergeResolutionError {
  constructor(
    message: string,
    public readonly line: number,
  ) {
    super(`${message} (line ${line})`, 'MERGE_PARSE');
    this.name = 'MergeParseError';
  }
}

export class ConfigError extends MergeResolutionError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG', cause);
    this.name = 'ConfigError';
  }
}

/** Message of any thrown value. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
