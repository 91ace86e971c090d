/**
 * Base class for every error the harness raises on purpose.
 */
export class HarnessError extends Error {
  public constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A discovered case has no retrievable source. Reported as a failed case.
 */
export class CaseNotFoundError extends HarnessError {
  public constructor(
    public readonly caseName: string,
    options?: { readonly cause?: unknown }
  ) {
    super(`No source found for case "${caseName}"`, options);
  }
}

/**
 * Two files in the case directory derive the same case name.
 */
export class CaseNameCollisionError extends HarnessError {
  public constructor(
    public readonly caseName: string,
    public readonly files: readonly string[]
  ) {
    super(`Case name "${caseName}" is claimed by more than one file: ${files.join(', ')}`);
  }
}

/**
 * A case fragment could not be turned into a translation unit.
 */
export class SynthesisError extends HarnessError {}

/**
 * Invalid harness configuration.
 */
export class ConfigError extends HarnessError {}

/**
 * The harness itself is misconfigured or its environment is broken
 * (compiler missing, work directory unwritable, case directory unreadable).
 * Aborts the run: every later case would fail the same way.
 */
export class ToolingFault extends HarnessError {}
