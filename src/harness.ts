import { access, mkdtemp, rm } from 'node:fs/promises';
import { constants } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { CaseRepository } from './caseRepository.js';
import { ProcessCompiler, type Compiler } from './compilerInvoker.js';
import type { HarnessConfig } from './config.js';
import { ToolingFault } from './errors.js';
import { logger } from './logger.js';
import { runCases, type Reporter, type RunSummary } from './runOrchestrator.js';

export interface HarnessOptions {
  readonly reporter?: Reporter;
  /** Replace the process compiler, e.g. with a fake in tests. */
  readonly createCompiler?: (config: HarnessConfig, workDir: string) => Compiler;
}

function createProcessCompiler(config: HarnessConfig, workDir: string): Compiler {
  return new ProcessCompiler({
    command: config.compiler,
    leadingArgs: config.compilerArgs,
    standardFlag: config.standardFlag,
    workDir,
    outputDir: config.outputDir,
    sourceExtension: config.sourceExtension,
    timeoutMs: config.timeoutMs
  });
}

async function ensureOutputDir(outputDir: string): Promise<void> {
  try {
    await access(outputDir, constants.W_OK | constants.X_OK);
  } catch (error) {
    throw new ToolingFault(`Output directory not accessible: ${outputDir}`, { cause: error });
  }
}

async function ensureHeader(headerPath: string): Promise<void> {
  try {
    await access(headerPath, constants.R_OK);
  } catch (error) {
    throw new ToolingFault(`Library header not readable: ${headerPath}`, { cause: error });
  }
}

/**
 * Discover and run every case under `config.caseDir`.
 *
 * Generated sources go to a private scratch directory that is removed on
 * every exit path unless `keepWorkDir` is set.
 */
export async function runHarness(
  config: HarnessConfig,
  options: HarnessOptions = {}
): Promise<RunSummary> {
  await ensureHeader(config.headerPath);
  await ensureOutputDir(config.outputDir);
  const repository = await CaseRepository.open(config.caseDir);

  let workDir: string;
  try {
    workDir = await mkdtemp(join(tmpdir(), 'compile-fail-harness-'));
  } catch (error) {
    throw new ToolingFault('Cannot create scratch work directory', { cause: error });
  }
  logger.debug({ workDir }, 'Created work directory');

  const createCompiler = options.createCompiler ?? createProcessCompiler;

  try {
    return await runCases(repository.listCases(), {
      source: repository,
      compiler: createCompiler(config, workDir),
      headerPath: config.headerPath,
      namespace: config.namespace,
      expectedDiagnostic: config.expectedDiagnostic,
      reporter: options.reporter
    });
  } finally {
    if (config.keepWorkDir) {
      logger.info({ workDir }, 'Keeping work directory');
    } else {
      await rm(workDir, { recursive: true, force: true });
    }
  }
}
