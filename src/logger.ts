import pino from 'pino';
import { config } from './config.js';

// stdout 동기 기록 — 워커 스레드 없음, import만으로 프로세스가 붙잡히지 않음
export const logger = pino(
  {
    level: config.log.level,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 1, sync: true }),
);

/** 모듈별 child logger (orders, bars, trade, csv-loader) */
export function createChildLogger(module: string) {
  return logger.child({ module });
}
