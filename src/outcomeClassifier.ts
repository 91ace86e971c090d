import type { InvocationResult } from './compilerInvoker.js';

export const DEFAULT_EXPECTED_DIAGNOSTIC = 'static assertion failed';

export type FailureReason =
  | 'compiled-successfully'
  | 'timed-out'
  | 'diagnostic-mismatch'
  | 'case-error';

export interface PassOutcome {
  readonly status: 'pass';
}

export interface FailOutcome {
  readonly status: 'fail';
  readonly reason: FailureReason;
  readonly explanation: string;
  /** Compiler output, attached verbatim when it did not match. */
  readonly diagnostics?: string;
}

export type Outcome = PassOutcome | FailOutcome;

/**
 * Judge one compiler run.
 *
 * A case passes only if the compiler rejected the unit AND said so with
 * the expected diagnostic. Compiling at all is a failure. A run stopped by
 * the timeout is judged as timed out whatever status it exited with.
 */
export function classify(
  result: InvocationResult,
  expectedDiagnostic: string = DEFAULT_EXPECTED_DIAGNOSTIC
): Outcome {
  if (result.timedOut) {
    return {
      status: 'fail',
      reason: 'timed-out',
      explanation: 'timed out'
    };
  }

  if (result.exitCode === 0) {
    return {
      status: 'fail',
      reason: 'compiled-successfully',
      explanation: 'compiled successfully'
    };
  }

  if (!result.diagnostics.includes(expectedDiagnostic)) {
    return {
      status: 'fail',
      reason: 'diagnostic-mismatch',
      explanation: 'no expected diagnostic found',
      diagnostics: result.diagnostics
    };
  }

  return { status: 'pass' };
}
