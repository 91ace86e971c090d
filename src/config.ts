import { resolve } from 'node:path';
import { ConfigError } from './errors.js';
import { DEFAULT_EXPECTED_DIAGNOSTIC } from './outcomeClassifier.js';
import { DEFAULT_NAMESPACE, isIncludablePath } from './sourceSynthesizer.js';

export interface HarnessConfig {
  readonly caseDir: string;
  readonly headerPath: string;
  readonly compiler: string;
  readonly compilerArgs: readonly string[];
  readonly standardFlag: string;
  readonly expectedDiagnostic: string;
  readonly namespace: string;
  readonly sourceExtension: string;
  readonly outputDir: string;
  readonly timeoutMs: number;
  readonly keepWorkDir: boolean;
}

/**
 * Options as they arrive from the command line. Everything is optional;
 * gaps are filled from the environment, then from defaults.
 */
export interface HarnessCliOptions {
  readonly caseDir?: string;
  readonly header?: string;
  readonly compiler?: string;
  readonly compilerArg?: readonly string[];
  readonly std?: string;
  readonly expect?: string;
  readonly namespace?: string;
  readonly ext?: string;
  readonly outDir?: string;
  readonly timeout?: string;
  readonly keepWorkDir?: boolean;
}

export const DEFAULT_TIMEOUT_MS = 120_000;

const DEFAULTS = {
  caseDir: 'test/cases',
  headerPath: 'array.h',
  compiler: 'avr-g++',
  standardFlag: '-std=gnu++11',
  sourceExtension: '.cpp'
} as const;

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function parseTimeout(raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`Invalid timeout "${raw}": expected a non-negative integer of milliseconds`);
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Merge CLI options over environment variables over defaults.
 *
 * Environment variables: HARNESS_CASE_DIR, HARNESS_HEADER, HARNESS_CXX,
 * HARNESS_STD, HARNESS_EXPECT, HARNESS_TIMEOUT_MS.
 */
export function resolveConfig(
  options: HarnessCliOptions = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): HarnessConfig {
  const caseDir = nonEmpty(options.caseDir) ?? nonEmpty(env['HARNESS_CASE_DIR']) ?? DEFAULTS.caseDir;
  const headerPath = nonEmpty(options.header) ?? nonEmpty(env['HARNESS_HEADER']) ?? DEFAULTS.headerPath;
  const compiler = nonEmpty(options.compiler) ?? nonEmpty(env['HARNESS_CXX']) ?? DEFAULTS.compiler;
  const standardFlag = nonEmpty(options.std) ?? nonEmpty(env['HARNESS_STD']) ?? DEFAULTS.standardFlag;
  const expectedDiagnostic =
    nonEmpty(options.expect) ?? nonEmpty(env['HARNESS_EXPECT']) ?? DEFAULT_EXPECTED_DIAGNOSTIC;
  const rawTimeout = nonEmpty(options.timeout) ?? nonEmpty(env['HARNESS_TIMEOUT_MS']);

  const sourceExtension = options.ext ?? DEFAULTS.sourceExtension;
  if (!/^\.[A-Za-z0-9+_-]+$/.test(sourceExtension)) {
    throw new ConfigError(`Invalid source extension "${sourceExtension}"`);
  }

  const resolvedHeader = resolve(cwd, headerPath);
  if (!isIncludablePath(resolvedHeader)) {
    throw new ConfigError(`Header path cannot be used in #include: ${JSON.stringify(resolvedHeader)}`);
  }

  return {
    caseDir: resolve(cwd, caseDir),
    headerPath: resolvedHeader,
    compiler,
    compilerArgs: options.compilerArg ?? [],
    standardFlag,
    expectedDiagnostic,
    namespace: nonEmpty(options.namespace) ?? DEFAULT_NAMESPACE,
    sourceExtension,
    outputDir: resolve(cwd, options.outDir ?? '.'),
    timeoutMs: rawTimeout === undefined ? DEFAULT_TIMEOUT_MS : parseTimeout(rawTimeout),
    keepWorkDir: options.keepWorkDir === true
  };
}
