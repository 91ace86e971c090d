import pino, { type Logger } from 'pino';

/**
 * Structured logger for harness diagnostics.
 *
 * Writes JSON to stderr so that stdout carries only the console report.
 * Silenced while running under Vitest.
 */
function makeLogger(): Logger {
  const isVitest = process.env['VITEST'] === 'true';
  const level = process.env['LOG_LEVEL'] ?? 'info';

  return pino(
    {
      name: 'compile-fail-harness',
      level,
      enabled: !isVitest,
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ dest: 2, sync: true })
  );
}

export const logger = makeLogger();
