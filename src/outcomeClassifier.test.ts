import { describe, expect, it } from 'vitest';
import type { InvocationResult } from './compilerInvoker.js';
import { classify } from './outcomeClassifier.js';

function result(overrides: Partial<InvocationResult>): InvocationResult {
  return {
    exitCode: 1,
    signal: null,
    diagnostics: '',
    timedOut: false,
    ...overrides
  };
}

describe('classify', () => {
  it('fails a unit that compiled, whatever the diagnostics say', () => {
    const outcome = classify(
      result({ exitCode: 0, diagnostics: 'warning: static assertion failed somewhere' })
    );

    expect(outcome).toEqual({
      status: 'fail',
      reason: 'compiled-successfully',
      explanation: 'compiled successfully'
    });
  });

  it('passes when compilation failed with the expected diagnostic', () => {
    const outcome = classify(
      result({ diagnostics: "case.cpp:6:5: error: static assertion failed: index out of range\n" })
    );

    expect(outcome).toEqual({ status: 'pass' });
  });

  it('fails with the diagnostics attached verbatim when they do not match', () => {
    const diagnostics = "case.cpp:5:17: error: expected ';' before '}' token\n  5 |   int a = 1\n";

    const outcome = classify(result({ diagnostics }));

    expect(outcome).toEqual({
      status: 'fail',
      reason: 'diagnostic-mismatch',
      explanation: 'no expected diagnostic found',
      diagnostics
    });
  });

  it('fails on an empty diagnostic stream', () => {
    const outcome = classify(result({ exitCode: 1, diagnostics: '' }));

    expect(outcome).toMatchObject({ status: 'fail', reason: 'diagnostic-mismatch', diagnostics: '' });
  });

  it('reports a timed-out compiler as its own failure', () => {
    const outcome = classify(
      result({ exitCode: null, signal: 'SIGTERM', timedOut: true, diagnostics: 'static assertion failed' })
    );

    expect(outcome).toEqual({ status: 'fail', reason: 'timed-out', explanation: 'timed out' });
  });

  it('treats a timed-out run as timed out even when it exited 0', () => {
    const outcome = classify(result({ exitCode: 0, timedOut: true }));

    expect(outcome).toEqual({ status: 'fail', reason: 'timed-out', explanation: 'timed out' });
  });

  it('matches a custom expected diagnostic', () => {
    const diagnostics = 'error: static_assert failed due to requirement';

    expect(classify(result({ diagnostics }), 'static_assert failed')).toEqual({ status: 'pass' });
    expect(classify(result({ diagnostics }))).toMatchObject({ reason: 'diagnostic-mismatch' });
  });
});
