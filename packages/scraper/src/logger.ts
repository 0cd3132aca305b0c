import pino, { Logger } from 'pino';

export type { Logger };

/** Module-scoped pino logger on stderr, level from LOG_LEVEL. Stdout carries results. */
export function createLogger(name: string, pretty = false): Logger {
  const options = { name, level: process.env.LOG_LEVEL ?? 'info' };
  if (pretty) {
    return pino({
      ...options,
      transport: { target: 'pino-pretty', options: { colorize: true, ignore: 'pid,hostname', destination: 2 } },
    });
  }
  return pino(options, pino.destination(2));
}
