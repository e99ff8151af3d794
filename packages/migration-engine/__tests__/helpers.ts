import { LogLevel, Logger, createLogger } from '../src/logger';

export interface CapturedLine {
  level: LogLevel;
  line: string;
}

/**
 * Logger that records lines instead of printing them
 */
export function captureLogger(): { logger: Logger; lines: CapturedLine[] } {
  const lines: CapturedLine[] = [];
  const logger = createLogger('test', {
    minLevel: 'debug',
    sink: (level, line) => {
      lines.push({ level, line });
    },
  });
  return { logger, lines };
}

export function silentLogger(): Logger {
  return captureLogger().logger;
}
