import type { Dirent } from 'node:fs';
import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { CaseNameCollisionError, CaseNotFoundError, ToolingFault } from './errors.js';
import { logger } from './logger.js';

/**
 * Read access to case fragments, keyed by case name.
 */
export interface CaseSource {
  loadSource(caseName: string): Promise<string>;
}

/**
 * Derive a case name from a file name: everything before the first `.`.
 */
export function deriveCaseName(fileName: string): string {
  return fileName.split('.', 1)[0] ?? '';
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Cases backed by the files at the top level of a directory.
 *
 * Use {@link CaseRepository.open} to discover the cases; the instance keeps
 * the name-to-file mapping for the rest of the run.
 */
export class CaseRepository implements CaseSource {
  private constructor(
    public readonly caseDir: string,
    private readonly files: ReadonlyMap<string, string>
  ) {}

  /**
   * Scan `caseDir` and build the repository.
   *
   * Throws ToolingFault if the directory cannot be read and
   * CaseNameCollisionError if two files derive the same name.
   */
  public static async open(caseDir: string): Promise<CaseRepository> {
    let entries: Dirent[];
    try {
      entries = await readdir(caseDir, { withFileTypes: true });
    } catch (error) {
      throw new ToolingFault(`Cannot read case directory ${caseDir}`, { cause: error });
    }

    const files = new Map<string, string>();
    for (const entry of entries) {
      if (!entry.isFile()) {
        continue;
      }

      const caseName = deriveCaseName(entry.name);
      if (!caseName) {
        logger.debug({ file: entry.name }, 'Skipping file without a case name');
        continue;
      }

      const existing = files.get(caseName);
      if (existing !== undefined) {
        throw new CaseNameCollisionError(caseName, [existing, entry.name].sort());
      }
      files.set(caseName, entry.name);
    }

    logger.debug({ caseDir, count: files.size }, 'Discovered cases');
    return new CaseRepository(caseDir, files);
  }

  /**
   * Names of all discovered cases, sorted.
   */
  public listCases(): string[] {
    return [...this.files.keys()].sort();
  }

  public async loadSource(caseName: string): Promise<string> {
    const fileName = this.files.get(caseName);
    if (fileName === undefined) {
      throw new CaseNotFoundError(caseName);
    }

    try {
      return await readFile(join(this.caseDir, fileName), 'utf8');
    } catch (error) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        throw new CaseNotFoundError(caseName, { cause: error });
      }
      throw error;
    }
  }
}
