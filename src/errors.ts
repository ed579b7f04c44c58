/**
 * Errors that abort a rename batch. A filename that fails to match is reported, never thrown.
 */

export class RenameError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UsageError extends RenameError {}

export class InvalidPatternError extends RenameError {
  constructor(readonly pattern: string, options?: ErrorOptions) {
    super(`Invalid regex: ${pattern}`, options);
  }
}

export class InvalidReplacementTemplateError extends RenameError {
  constructor(readonly template: string, readonly reason: string) {
    super(`Invalid replacement template "${template}": ${reason}`);
  }
}

export class DuplicateTargetError extends RenameError {
  constructor(readonly targets: readonly string[]) {
    super(`Found duplicate target names: ${targets.join(", ")}`);
  }
}

export class MissingReplacementError extends RenameError {
  constructor() {
    super("A replacement template is required for renaming.");
  }
}

export class EmptyTargetError extends RenameError {
  constructor(readonly source: string) {
    super(`Replacement would produce an empty filename for: ${source}`);
  }
}

export class TargetExistsError extends RenameError {
  constructor(readonly source: string, readonly target: string) {
    super(`Renaming "${source}" would overwrite existing file "${target}" which is not being renamed.`);
  }
}

export class TargetNotFreedError extends RenameError {
  constructor(readonly source: string, readonly target: string) {
    super(`"${target}" could not be moved aside, so "${source}" was not renamed onto it.`);
  }
}

function strandedNote(stranded: readonly string[]): string {
  return stranded.length === 0 ? "" : `; left under temporary names: ${stranded.join(", ")}`;
}

export class RenameFailedError extends RenameError {
  constructor(
    readonly source: string,
    readonly target: string,
    readonly renamed: readonly string[],
    /** Temporary names of files that could not be moved back. */
    readonly stranded: readonly string[],
    cause: unknown,
  ) {
    super(
      `Failed to rename "${source}" to "${target}" after ${renamed.length} successful rename(s): ${describeError(cause)}` +
        strandedNote(stranded),
      { cause },
    );
  }
}

export interface RenameFailure {
  readonly source: string;
  readonly target: string;
  readonly error: unknown;
}

export class RenameBatchError extends RenameError {
  constructor(
    readonly failures: readonly RenameFailure[],
    readonly renamedCount: number,
    readonly stranded: readonly string[] = [],
  ) {
    super(
      `${failures.length} rename(s) failed, ${renamedCount} succeeded: ` +
        failures.map((f) => `${f.source} → ${f.target}`).join(", ") +
        strandedNote(stranded),
    );
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
