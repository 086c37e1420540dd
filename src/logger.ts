import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level: string;
  pretty?: boolean;
}

export function createLogger({ level, pretty = false }: LoggerOptions): Logger {
  if (!pretty) return pino({ level });

  return pino({
    level,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
      },
    },
  });
}

// for services constructed without a logger (tests, embedding)
export const silentLogger: Logger = pino({ level: 'silent' });
