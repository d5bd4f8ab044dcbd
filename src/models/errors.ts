import type { z } from 'zod';

/** 생성 시 검증 실패 — 필드명 + 사유 */
export class ValidationError extends Error {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`${field}: ${reason}`);
    this.name = 'ValidationError';
    this.field = field;
    this.reason = reason;
  }

  static fromZod(error: z.ZodError): ValidationError {
    const { field, reason } = describeZodError(error);
    return new ValidationError(field, reason);
  }
}

/** 생성 후 검증 대상 필드 변경 실패 (트레일링 파라미터) */
export class FieldAssignmentError extends ValidationError {
  constructor(field: string, reason: string) {
    super(field, reason);
    this.name = 'FieldAssignmentError';
  }

  static override fromZod(error: z.ZodError): FieldAssignmentError {
    const { field, reason } = describeZodError(error);
    return new FieldAssignmentError(field, reason);
  }
}

/** 첫 번째 zod issue만 사용 */
function describeZodError(error: z.ZodError): { field: string; reason: string } {
  const issue = error.issues[0];
  if (!issue) return { field: '(input)', reason: error.message };
  return {
    field: issue.path.length > 0 ? issue.path.join('.') : '(input)',
    reason: issue.message,
  };
}

/** zod safeParse와 같은 모양 */
export type Result<T, E extends Error = ValidationError> =
  | { readonly success: true; readonly data: T }
  | { readonly success: false; readonly error: E };

export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

export function fail<E extends Error>(error: E): Result<never, E> {
  return { success: false, error };
}

export function orThrow<T, E extends Error>(result: Result<T, E>): T {
  if (result.success) return result.data;
  throw result.error;
}
