import { execFile } from 'node:child_process';
import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ToolingFault } from './errors.js';
import { logger } from './logger.js';

/**
 * What one compiler run left behind: how it ended and what it said on stderr.
 */
export interface InvocationResult {
  /** Process exit code, or null when the process was ended by a signal. */
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  /** Full stderr text of the compiler. */
  readonly diagnostics: string;
  readonly timedOut: boolean;
}

/**
 * Compiles one synthesized unit on behalf of a case.
 */
export interface Compiler {
  compile(unitText: string, caseName: string): Promise<InvocationResult>;
}

export interface ProcessCompilerOptions {
  /** Compiler executable, e.g. `avr-g++`. */
  readonly command: string;
  /** Arguments placed before the language-standard flag. */
  readonly leadingArgs?: readonly string[];
  /** Language-standard flag, e.g. `-std=gnu++11`. */
  readonly standardFlag: string;
  /** Directory receiving the generated sources. */
  readonly workDir: string;
  /** Working directory of the compiler process, where `-o <case>` lands. */
  readonly outputDir?: string;
  readonly sourceExtension?: string;
  /**
   * Stop the compiler after this many milliseconds (SIGTERM, then SIGKILL
   * after KILL_GRACE_MS). 0 disables the limit.
   */
  readonly timeoutMs?: number;
}

/** Time a compiler gets to exit after SIGTERM before it is killed outright. */
export const KILL_GRACE_MS = 1_000;

const LAUNCH_FAILURE_CODES = new Set(['ENOENT', 'EACCES', 'ENOTDIR']);

/**
 * Runs an external compiler as a subprocess:
 *
 *   <command> [leadingArgs...] <standardFlag> -o <caseName> <workDir>/<caseName><ext>
 */
export class ProcessCompiler implements Compiler {
  private readonly leadingArgs: readonly string[];
  private readonly outputDir: string;
  private readonly sourceExtension: string;
  private readonly timeoutMs: number;

  public constructor(private readonly options: ProcessCompilerOptions) {
    this.leadingArgs = options.leadingArgs ?? [];
    this.outputDir = options.outputDir ?? process.cwd();
    this.sourceExtension = options.sourceExtension ?? '.cpp';
    this.timeoutMs = options.timeoutMs ?? 0;
  }

  /**
   * Path of the generated source for a case.
   */
  public sourcePathFor(caseName: string): string {
    return join(this.options.workDir, `${caseName}${this.sourceExtension}`);
  }

  public async compile(unitText: string, caseName: string): Promise<InvocationResult> {
    const sourcePath = this.sourcePathFor(caseName);

    try {
      // 'w' truncates whatever an earlier run left under this name.
      await writeFile(sourcePath, unitText, { encoding: 'utf8', flag: 'w' });
    } catch (error) {
      throw new ToolingFault(`Cannot write generated source ${sourcePath}`, { cause: error });
    }

    const args = [
      ...this.leadingArgs,
      this.options.standardFlag,
      '-o',
      caseName,
      sourcePath
    ];

    const startedAt = Date.now();
    const result = await this.run(args);
    logger.debug(
      {
        caseName,
        exitCode: result.exitCode,
        signal: result.signal,
        timedOut: result.timedOut,
        durationMs: Date.now() - startedAt
      },
      'Compiler finished'
    );

    return result;
  }

  private async run(args: readonly string[]): Promise<InvocationResult> {
    const { command } = this.options;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    return new Promise<InvocationResult>((resolve, reject) => {
      const child = execFile(
        command,
        args,
        {
          cwd: this.outputDir,
          maxBuffer: Infinity,
          encoding: 'utf8'
        },
        (error, _stdout, stderr) => {
          clearTimeout(timer);
          clearTimeout(killTimer);

          if (!error) {
            resolve({ exitCode: 0, signal: null, diagnostics: stderr, timedOut });
            return;
          }

          const code: unknown = error.code;
          if (typeof code === 'string' && LAUNCH_FAILURE_CODES.has(code)) {
            reject(
              new ToolingFault(`Cannot run compiler "${command}" (${code})`, { cause: error })
            );
            return;
          }

          resolve({
            exitCode: typeof code === 'number' ? code : null,
            signal: error.signal ?? null,
            diagnostics: stderr,
            timedOut
          });
        }
      );

      if (this.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
          // A compiler may trap SIGTERM, and a driver's subprocesses may hold stderr open.
          killTimer = setTimeout(() => {
            child.kill('SIGKILL');
            child.stdout?.destroy();
            child.stderr?.destroy();
          }, KILL_GRACE_MS);
        }, this.timeoutMs);
      }

      child.stdin?.end();
    });
  }
}
