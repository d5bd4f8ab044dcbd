import { createChildLogger } from '../logger.js';
import { ValidationError, fail, ok, type Result } from '../models/errors.js';
import { barDataSchema } from '../models/schemas.js';
import type { BarData, BarDataInput } from '../types/index.js';

const log = createChildLogger('bar-data');

/**
 * OHLCV 봉 생성
 * 모든 필드를 채운 뒤 high/low 관계를 한 번에 검사 — 부분적으로 유효한 봉은 없음.
 */
export function createBarData(input: BarDataInput): Result<BarData> {
  const result = barDataSchema.safeParse(input);
  if (!result.success) {
    const error = ValidationError.fromZod(result.error);
    log.warn({ field: error.field, reason: error.reason }, 'Bar rejected');
    return fail(error);
  }
  // freeze는 얕음 — date는 입력과 분리된 복사본으로 보관
  return ok(Object.freeze({ ...result.data, date: new Date(result.data.date.getTime()) }));
}
