import pino from 'pino';
import { AsyncLocalStorage } from 'async_hooks';
import { config } from '../config/index.js';

const contextStorage = new AsyncLocalStorage<Record<string, unknown>>();

const baseOptions: pino.LoggerOptions = {
  level: config.logLevel,
  base: { service: config.serviceName },
  mixin: () => contextStorage.getStore() || {},
  timestamp: pino.stdTimeFunctions.unixTime,
};

function createLogger(): pino.Logger {
  // no worker-thread transports under the test runner
  if (config.nodeEnv === 'test') {
    return pino(baseOptions);
  }

  const transports = pino.transport({
    targets: [
      {
        target: 'pino/file',
        options: {
          destination: `./logs/${config.serviceName}.log`,
          mkdir: true,
        },
      },
      // Always output to stdout with pretty formatting
      {
        target: 'pino-pretty',
        options: {
          destination: 1, // stdout
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      },
    ],
  });

  return pino(baseOptions, transports);
}

export const logger = createLogger();

export function withContext<T>(context: Record<string, unknown>, fn: () => T): T {
  const parent = contextStorage.getStore() || {};
  return contextStorage.run({ ...parent, ...context }, fn);
}

export function getContext(): Record<string, unknown> {
  return contextStorage.getStore() || {};
}

export type { Logger } from 'pino';
