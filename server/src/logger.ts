import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: 'live-vlm-relay' },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

export const silentLogger: Logger = pino({ level: 'silent' });
