import { SynthesisError } from './errors.js';

export interface SynthesizeOptions {
  /** Namespace brought into unqualified scope. Defaults to `safearray`. */
  readonly namespace?: string;
}

export const DEFAULT_NAMESPACE = 'safearray';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(::[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * A quoted header-name is taken literally by the preprocessor: no escape
 * sequences, so the path cannot carry a `"` or a line break.
 */
export function isIncludablePath(headerPath: string): boolean {
  return headerPath !== '' && !/["\r\n]/.test(headerPath);
}

/**
 * Wrap a case fragment into a complete translation unit.
 *
 * The fragment is embedded verbatim in the body of `main`, so any
 * malformed code in the result comes from the fragment alone.
 */
export function synthesize(
  fragment: string,
  headerPath: string,
  options: SynthesizeOptions = {}
): string {
  const { namespace = DEFAULT_NAMESPACE } = options;

  if (!IDENTIFIER.test(namespace)) {
    throw new SynthesisError(`Invalid namespace: "${namespace}"`);
  }

  if (!isIncludablePath(headerPath)) {
    throw new SynthesisError(`Header path cannot be used in #include: ${JSON.stringify(headerPath)}`);
  }

  return [
    `#include "${headerPath}"`,
    '',
    `using namespace ${namespace};`,
    '',
    'int main() {',
    `    ${fragment}`,
    '    return 0;',
    '}',
    ''
  ].join('\n');
}
