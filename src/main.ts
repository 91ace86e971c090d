#!/usr/bin/env node
import { Command } from 'commander';
import { CaseRepository } from './caseRepository.js';
import { resolveConfig, type HarnessCliOptions } from './config.js';
import { HarnessError } from './errors.js';
import { runHarness, type HarnessOptions } from './harness.js';
import { logger } from './logger.js';
import type { RunSummary } from './runOrchestrator.js';

/**
 * 0: every case failed to compile as expected.
 * 1: at least one case did not.
 * 2: the run was aborted (tooling fault or bad configuration).
 */
export type ExitCode = 0 | 1 | 2;

type RunCommandOptions = Omit<HarnessCliOptions, 'caseDir'>;

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function exitCodeFor(summary: RunSummary): ExitCode {
  return summary.failure > 0 ? 1 : 0;
}

function reportAbort(error: HarnessError): ExitCode {
  logger.error({ err: error }, 'Run aborted');
  // eslint-disable-next-line no-console
  console.error(`ERROR: ${error.message}`);
  return 2;
}

async function runList(caseDir: string | undefined): Promise<void> {
  const config = resolveConfig({ caseDir });
  const repository = await CaseRepository.open(config.caseDir);
  for (const caseName of repository.listCases()) {
    // eslint-disable-next-line no-console
    console.log(caseName);
  }
}

/**
 * Commander-based CLI entrypoint.
 */
export async function main(argv: string[], harnessOptions: HarnessOptions = {}): Promise<ExitCode> {
  let exitCode: ExitCode = 0;
  const program = new Command();

  program
    .name('compile-fail-harness')
    .description('Check that every case fails to compile with the expected diagnostic')
    .version('0.1.0');

  program
    .command('list')
    .description('Print discovered case names, one per line')
    .argument('[case-dir]', 'directory holding one source fragment per case')
    .action(async (caseDir: string | undefined) => {
      try {
        await runList(caseDir);
      } catch (error) {
        if (!(error instanceof HarnessError)) {
          throw error;
        }
        exitCode = reportAbort(error);
      }
    });

  program
    .argument('[case-dir]', 'directory holding one source fragment per case')
    .option('--header <path>', 'library header included by every case')
    .option('--compiler <command>', 'compiler executable')
    .option('--compiler-arg <arg>', 'argument passed before the standard flag (repeatable)', collect, [])
    .option('--std <flag>', 'language-standard flag')
    .option('--expect <text>', 'diagnostic substring every case must produce')
    .option('--namespace <name>', 'namespace brought into scope for every case')
    .option('--ext <extension>', 'extension of generated source files')
    .option('--out-dir <path>', 'directory receiving compiled binaries')
    .option('--timeout <ms>', 'per-case compiler timeout in milliseconds, 0 for none')
    .option('--keep-work-dir', 'keep generated sources after the run', false)
    .action(async (caseDir: string | undefined, options: RunCommandOptions) => {
      try {
        const config = resolveConfig({ ...options, caseDir });
        logger.debug({ config }, 'Resolved configuration');
        const summary = await runHarness(config, harnessOptions);
        exitCode = exitCodeFor(summary);
      } catch (error) {
        if (!(error instanceof HarnessError)) {
          throw error;
        }
        exitCode = reportAbort(error);
      }
    });

  await program.parseAsync(['node', 'compile-fail-harness', ...argv]);
  return exitCode;
}

if (import.meta.url === `file://${process.argv[1] ?? ''}`) {
  main(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.fatal({ err: error }, 'Unexpected failure');
      // eslint-disable-next-line no-console
      console.error(error);
      process.exitCode = 2;
    }
  );
}
