import dotenv from 'dotenv';

dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  return v !== undefined && v !== '' ? Number(v) : fallback;
}

export const config = {
  orders: {
    /** 프로세스 기본 주문 ID 생성기의 시작값 (재시작 시 다시 이 값부터) */
    firstOrderId: envNum('ORDER_ID_START', 1),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },
} as const;
