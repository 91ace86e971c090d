import { describe, expect, it, vi } from 'vitest';
import type { CaseSource } from './caseRepository.js';
import type { Compiler, InvocationResult } from './compilerInvoker.js';
import { CaseNotFoundError, ToolingFault } from './errors.js';
import { formatSummary, runCases, type Reporter } from './runOrchestrator.js';

const FRAGMENTS: Record<string, string> = {
  out_of_bounds_literal_index: 'Array<int, 4> a;\n    a.at<4>();',
  well_formed_access: 'Array<int, 4> a;\n    a.at<3>();',
  unrelated_syntax_error: 'int x = ;'
};

const SYNTAX_DIAGNOSTICS = "case.cpp:6:13: error: expected primary-expression before ';' token\n";

class MemorySource implements CaseSource {
  public constructor(private readonly fragments: Record<string, string>) {}

  public async loadSource(caseName: string): Promise<string> {
    const fragment = this.fragments[caseName];
    if (fragment === undefined) {
      throw new CaseNotFoundError(caseName);
    }
    return fragment;
  }
}

/**
 * Answers like a compiler would for the fragments above.
 */
class FakeCompiler implements Compiler {
  public readonly units: string[] = [];

  public async compile(unitText: string, _caseName: string): Promise<InvocationResult> {
    this.units.push(unitText);
    if (unitText.includes('a.at<4>()')) {
      return {
        exitCode: 1,
        signal: null,
        diagnostics: 'case.cpp:7:5: error: static assertion failed: index out of bounds\n',
        timedOut: false
      };
    }
    if (unitText.includes('int x = ;')) {
      return { exitCode: 1, signal: null, diagnostics: SYNTAX_DIAGNOSTICS, timedOut: false };
    }
    return { exitCode: 0, signal: null, diagnostics: '', timedOut: false };
  }
}

function recordingReporter(): Reporter & { readonly lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    log(line: string): void {
      lines.push(line);
    }
  };
}

function options(overrides: { compiler?: Compiler; source?: CaseSource } = {}) {
  const reporter = recordingReporter();
  return {
    reporter,
    runOptions: {
      source: overrides.source ?? new MemorySource(FRAGMENTS),
      compiler: overrides.compiler ?? new FakeCompiler(),
      headerPath: '/lib/array.h',
      reporter
    }
  };
}

describe('formatSummary', () => {
  it('renders the three counts', () => {
    expect(formatSummary({ total: 3, success: 1, failure: 2 })).toBe(
      'tests: 3  successes: 1  failures: 2'
    );
  });
});

describe('runCases', () => {
  it('passes a case rejected with the expected diagnostic', async () => {
    const { runOptions, reporter } = options();

    const summary = await runCases(['out_of_bounds_literal_index'], runOptions);

    expect(summary.results).toEqual([
      { caseName: 'out_of_bounds_literal_index', outcome: { status: 'pass' } }
    ]);
    expect(reporter.lines).toEqual(['', 'tests: 1  successes: 1  failures: 0']);
  });

  it('fails a case that compiled', async () => {
    const { runOptions, reporter } = options();

    const summary = await runCases(['well_formed_access'], runOptions);

    expect(summary.results[0]?.outcome).toEqual({
      status: 'fail',
      reason: 'compiled-successfully',
      explanation: 'compiled successfully'
    });
    expect(reporter.lines).toEqual([
      'FAIL: well_formed_access: compiled successfully',
      '',
      'tests: 1  successes: 0  failures: 1'
    ]);
  });

  it('fails a case rejected for an unrelated reason and prints the diagnostics', async () => {
    const { runOptions, reporter } = options();

    const summary = await runCases(['unrelated_syntax_error'], runOptions);

    expect(summary.results[0]?.outcome).toEqual({
      status: 'fail',
      reason: 'diagnostic-mismatch',
      explanation: 'no expected diagnostic found',
      diagnostics: SYNTAX_DIAGNOSTICS
    });
    expect(reporter.lines).toEqual([
      'FAIL: unrelated_syntax_error: no expected diagnostic found',
      SYNTAX_DIAGNOSTICS,
      '',
      'tests: 1  successes: 0  failures: 1'
    ]);
  });

  it('reports zero counts for an empty case list', async () => {
    const { runOptions, reporter } = options();

    const summary = await runCases([], runOptions);

    expect(summary).toEqual({ total: 0, success: 0, failure: 0, results: [] });
    expect(reporter.lines).toEqual(['', 'tests: 0  successes: 0  failures: 0']);
  });

  it('keeps going after a case whose source is missing', async () => {
    const { runOptions } = options();

    const summary = await runCases(['vanished', 'out_of_bounds_literal_index'], runOptions);

    expect(summary.total).toBe(2);
    expect(summary.success).toBe(1);
    expect(summary.failure).toBe(1);
    expect(summary.results[0]).toEqual({
      caseName: 'vanished',
      outcome: {
        status: 'fail',
        reason: 'case-error',
        explanation: 'No source found for case "vanished"'
      }
    });
  });

  it('turns a synthesis failure into a failed case', async () => {
    const { runOptions, reporter } = options();

    const summary = await runCases(['well_formed_access'], { ...runOptions, namespace: 'not valid' });

    expect(summary.results[0]?.outcome).toMatchObject({ status: 'fail', reason: 'case-error' });
    expect(reporter.lines[0]).toBe('FAIL: well_formed_access: Invalid namespace: "not valid"');
  });

  it('aborts on a tooling fault', async () => {
    const compiler: Compiler = {
      compile: vi.fn().mockRejectedValue(new ToolingFault('Cannot run compiler "cxx" (ENOENT)'))
    };
    const { runOptions, reporter } = options({ compiler });

    await expect(
      runCases(['out_of_bounds_literal_index', 'well_formed_access'], runOptions)
    ).rejects.toBeInstanceOf(ToolingFault);
    expect(compiler.compile).toHaveBeenCalledTimes(1);
    expect(reporter.lines).toEqual([]);
  });

  it('synthesizes each unit around the library header', async () => {
    const compiler = new FakeCompiler();
    const { runOptions } = options({ compiler });

    await runCases(['well_formed_access'], runOptions);

    expect(compiler.units).toHaveLength(1);
    expect(compiler.units[0]).toContain('#include "/lib/array.h"');
    expect(compiler.units[0]).toContain('using namespace safearray;');
    expect(compiler.units[0]).toContain(`    ${FRAGMENTS['well_formed_access']}\n    return 0;`);
  });

  it('yields the same outcomes when run twice', async () => {
    const names = Object.keys(FRAGMENTS);
    const first = await runCases(names, options().runOptions);
    const second = await runCases(names, options().runOptions);

    expect(second).toEqual(first);
    expect(first.total).toBe(first.success + first.failure);
    expect(first).toMatchObject({ total: 3, success: 1, failure: 2 });
  });
});
