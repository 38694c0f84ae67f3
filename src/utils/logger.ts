/**
 * Logger module wrapping pino.
 * Logs go to stderr so command output on stdout stays clean.
 */

import pino from 'pino';

/** Fields whose values never reach the log output. */
export const REDACT_PATHS = [
  'token', 'password', 'authorization',
  '*.token', '*.password', '*.authorization',
];

/** Whether the pretty transport should be used for this process. */
function wantsPrettyOutput(): boolean {
  const env = process.env.NODE_ENV;
  return env !== 'production' && env !== 'test' && process.stderr.isTTY === true;
}

/** Create the root logger instance */
function createLogger(): pino.Logger {
  const level = process.env.LOG_LEVEL ?? process.env.SKILLPORT_LOG_LEVEL ?? 'warn';
  const options: pino.LoggerOptions = {
    level,
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  if (wantsPrettyOutput()) {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, destination: 2 } },
    });
  }

  return pino(options, pino.destination(2));
}

/** Root logger instance */
export const logger = createLogger();

/** Create a child logger for a specific module */
export function createModuleLogger(moduleName: string): pino.Logger {
  return logger.child({ module: moduleName });
}
