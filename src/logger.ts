import pino from 'pino';
import { config } from './config.js';

export type Logger = pino.Logger;

// stdout은 CLI 결과(표/JSON) 출력용이라 로그는 stderr로
export const logger = pino({
  level: config.log.level,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
}, pino.destination(2));

export function createChildLogger(module: string): Logger {
  return logger.child({ module });
}
