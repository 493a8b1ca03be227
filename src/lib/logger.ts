import pino from 'pino';

export type Logger = pino.Logger;

const pretty = process.env.LOG_FORMAT !== 'json' && process.stderr.isTTY === true;

const options: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? 'info',
  base: { app: 'persona-enrich' },
  redact: ['apiKey', '*.apiKey', '*.headers.authorization', '*.headers.Authorization'],
};

// Everything goes to stderr (fd 2).
const logger: Logger = pretty
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          destination: 2,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname,app',
        },
      },
    })
  : pino(options, pino.destination(2));

/**
 * Child logger for one CLI invocation; every line carries the run id.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ runId, ...extra });
}

export default logger;
