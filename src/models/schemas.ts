import { z } from 'zod';
import { UNSET_DOUBLE } from './sentinels.js';

export const TRAILING_PARAMS_MESSAGE =
  'Exactly one of trailingDistance or trailingPercent must be specified';

// ─── 공통 ────────────────────────────────────────────────────────────────

const finiteNumber = z
  .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
  .finite('must be finite');

/** 유한값 또는 UNSET_DOUBLE */
const priceOrUnset = z
  .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
  .refine((v) => Number.isFinite(v) || v === UNSET_DOUBLE, 'must be finite or UNSET_DOUBLE');

const trailingValue = finiteNumber.nullable().default(null);

// ─── 주문 ────────────────────────────────────────────────────────────────

export const orderActionSchema = z.enum(['BUY', 'SELL'], {
  errorMap: () => ({ message: 'must be BUY or SELL' }),
});

export const baseOrderSchema = z.object({
  action: orderActionSchema,
  totalQuantity: finiteNumber.positive('must be greater than 0'),
  orderId: z.number().int('must be an integer').nonnegative('must not be negative').optional(),
  permId: z.number().int('must be an integer').default(0),
  clientId: z.number().int('must be an integer').default(0),
  tif: z.string().default(''),
  goodTillDate: z.string().default(''),
  goodAfterTime: z.string().default(''),
  ocaGroup: z.string().default(''),
  orderRef: z.string().default(''),
  transmit: z.boolean().default(true),
});

export const limitOrderSchema = baseOrderSchema.extend({
  price: finiteNumber,
});

export const stopOrderSchema = baseOrderSchema.extend({
  price: priceOrUnset,
});

export const stopLimitOrderSchema = stopOrderSchema.extend({
  limitPrice: priceOrUnset,
});

function exactlyOneTrailingParam(
  value: { trailingDistance: number | null; trailingPercent: number | null },
  ctx: z.RefinementCtx,
): void {
  if ((value.trailingDistance === null) === (value.trailingPercent === null)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['trailingDistance/trailingPercent'],
      message: TRAILING_PARAMS_MESSAGE,
    });
  }
}

export const trailingParamsSchema = z
  .object({
    trailingDistance: trailingValue,
    trailingPercent: trailingValue,
  })
  .superRefine(exactlyOneTrailingParam);

const trailingOrderBaseSchema = baseOrderSchema.extend({
  trailingDistance: trailingValue,
  trailingPercent: trailingValue,
});

export const trailingStopMarketSchema = trailingOrderBaseSchema.superRefine(exactlyOneTrailingParam);

export const trailingStopLimitSchema = trailingOrderBaseSchema
  .extend({
    limitOffset: finiteNumber.nonnegative('must not be negative'),
  })
  .superRefine(exactlyOneTrailingParam);

// ─── 봉 ──────────────────────────────────────────────────────────────────

/** 모든 필드가 채워진 뒤 한 번에 검사, 첫 위반만 보고 */
function consistentOhlc(
  bar: { open: number; high: number; low: number; close: number },
  ctx: z.RefinementCtx,
): void {
  const { open, high, low, close } = bar;
  const violation =
    high < low ? { path: 'high', message: `High (${high}) must be >= Low (${low})` }
    : high < open ? { path: 'high', message: `High (${high}) must be >= Open (${open})` }
    : high < close ? { path: 'high', message: `High (${high}) must be >= Close (${close})` }
    : low > open ? { path: 'low', message: `Low (${low}) must be <= Open (${open})` }
    : low > close ? { path: 'low', message: `Low (${low}) must be <= Close (${close})` }
    : null;

  if (violation) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: [violation.path], message: violation.message });
  }
}

export const barDataSchema = z
  .object({
    date: z.date({
      required_error: 'cannot be null',
      invalid_type_error: 'cannot be null',
    }),
    open: finiteNumber.default(0),
    high: finiteNumber.default(0),
    low: finiteNumber.default(0),
    close: finiteNumber.default(0),
    volume: z
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .nonnegative('must not be negative')
      .default(0),
  })
  .superRefine(consistentOhlc);
