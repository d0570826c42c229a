import pino from 'pino';

export function createLogger(name: string, level?: string) {
  const nodeEnv = process.env['NODE_ENV'];
  return pino({
    name,
    level: level ?? process.env['LOG_LEVEL'] ?? 'info',
    transport:
      nodeEnv !== 'production' && nodeEnv !== 'test'
        ? { target: 'pino/file', options: { destination: 1 } }
        : undefined,
  });
}

export type Logger = pino.Logger;
