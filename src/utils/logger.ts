import { pino, type Logger, type LoggerOptions } from 'pino';

const env = process.env['NODE_ENV'];
const isDev = env !== 'production' && env !== 'test';

// Build options conditionally so the pretty transport is only loaded interactively
const options: LoggerOptions = {
  level: process.env['CADFLOW_LOG_LEVEL'] ?? (isDev ? 'debug' : 'info'),
  base: {
    pid: undefined,
    hostname: undefined,
  },
};

if (isDev) {
  options.transport = {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'SYS:standard',
      ignore: 'pid,hostname',
    },
  };
}

export const logger = pino(options);

export function createLogger(module: string): Logger {
  return logger.child({ module });
}
