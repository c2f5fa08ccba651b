import { destination, pino } from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger };

export const silentLogger: Logger = pino({ level: 'silent' });

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  // defaults to stderr
  destination?: DestinationStream;
}

// Logs go to stderr; stdout is reserved for operator output and the program's exit status.
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.MORNINGRUN_LOG_LEVEL ?? 'info';
  if (level === 'silent') return silentLogger;
  const pretty = options.destination === undefined && (options.pretty ?? process.stderr.isTTY === true);

  if (pretty) {
    return pino({
      name: 'morningrun',
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ name: 'morningrun', level }, options.destination ?? destination(2));
}

