import type { CaseSource } from './caseRepository.js';
import type { Compiler } from './compilerInvoker.js';
import { ToolingFault } from './errors.js';
import { logger } from './logger.js';
import { classify, type Outcome } from './outcomeClassifier.js';
import { synthesize } from './sourceSynthesizer.js';

export interface CaseResult {
  readonly caseName: string;
  readonly outcome: Outcome;
}

export interface RunSummary {
  readonly total: number;
  readonly success: number;
  readonly failure: number;
  /** Per-case results in processing order. */
  readonly results: readonly CaseResult[];
}

/**
 * Sink for the human-readable report.
 */
export interface Reporter {
  log(line: string): void;
}

export const consoleReporter: Reporter = {
  log(line: string): void {
    // eslint-disable-next-line no-console
    console.log(line);
  }
};

export interface RunOptions {
  readonly source: CaseSource;
  readonly compiler: Compiler;
  readonly headerPath: string;
  readonly namespace?: string;
  readonly expectedDiagnostic?: string;
  readonly reporter?: Reporter;
}

export function formatSummary(summary: Pick<RunSummary, 'total' | 'success' | 'failure'>): string {
  return `tests: ${summary.total}  successes: ${summary.success}  failures: ${summary.failure}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Load and wrap a case. Any failure other than a tooling fault becomes
 * the case's outcome instead of ending the run.
 */
async function prepareUnit(
  caseName: string,
  options: RunOptions
): Promise<{ readonly unitText: string } | { readonly outcome: Outcome }> {
  try {
    const fragment = await options.source.loadSource(caseName);
    const unitText = synthesize(fragment, options.headerPath, { namespace: options.namespace });
    return { unitText };
  } catch (error) {
    if (error instanceof ToolingFault) {
      throw error;
    }
    logger.debug({ caseName, err: error }, 'Case could not be prepared');
    return {
      outcome: {
        status: 'fail',
        reason: 'case-error',
        explanation: describeError(error)
      }
    };
  }
}

async function runCase(caseName: string, options: RunOptions): Promise<Outcome> {
  const prepared = await prepareUnit(caseName, options);
  if ('outcome' in prepared) {
    return prepared.outcome;
  }

  const result = await options.compiler.compile(prepared.unitText, caseName);
  return classify(result, options.expectedDiagnostic);
}

function report(reporter: Reporter, caseName: string, outcome: Outcome): void {
  if (outcome.status === 'pass') {
    return;
  }

  reporter.log(`FAIL: ${caseName}: ${outcome.explanation}`);
  if (outcome.diagnostics !== undefined) {
    reporter.log(outcome.diagnostics);
  }
}

/**
 * Run every case in order, one compiler process at a time, and print the
 * failures followed by a summary line.
 *
 * A ToolingFault from any stage aborts the run and propagates.
 */
export async function runCases(
  caseNames: readonly string[],
  options: RunOptions
): Promise<RunSummary> {
  const reporter = options.reporter ?? consoleReporter;
  const results: CaseResult[] = [];
  let success = 0;
  let failure = 0;

  for (const caseName of caseNames) {
    const outcome = await runCase(caseName, options);
    results.push({ caseName, outcome });

    if (outcome.status === 'pass') {
      success += 1;
    } else {
      failure += 1;
    }

    report(reporter, caseName, outcome);
    logger.debug({ caseName, status: outcome.status }, 'Completed case');
  }

  const summary: RunSummary = {
    total: success + failure,
    success,
    failure,
    results
  };

  reporter.log('');
  reporter.log(formatSummary(summary));
  logger.info({ total: summary.total, success, failure }, 'Run summary');

  return summary;
}
