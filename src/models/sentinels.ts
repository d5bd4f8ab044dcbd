/**
 * "미설정" 숫자 값. null 대신 사용해서 가격/수량 필드를 항상 number로 유지한다.
 * 계산 전에 isUnset으로 걸러야 함.
 */
export const UNSET_DOUBLE = Number.POSITIVE_INFINITY;

export const UNSET_INTEGER = 2 ** 31 - 1;

export function isUnset(value: number): boolean {
  return value === UNSET_DOUBLE;
}

export function isUnsetInteger(value: number): boolean {
  return value === UNSET_INTEGER;
}
