import type { z } from 'zod';
import { createChildLogger } from '../logger.js';
import { FieldAssignmentError, ValidationError, fail, ok, type Result } from '../models/errors.js';
import {
  baseOrderSchema,
  limitOrderSchema,
  stopLimitOrderSchema,
  stopOrderSchema,
  trailingParamsSchema,
  trailingStopLimitSchema,
  trailingStopMarketSchema,
} from '../models/schemas.js';
import { UNSET_DOUBLE, UNSET_INTEGER } from '../models/sentinels.js';
import { defaultOrderIds, type OrderIdGenerator } from './order-id.js';
import type {
  LimitOrder,
  MarketOrder,
  Order,
  OrderAction,
  OrderBase,
  OrderOptions,
  OrderType,
  StopLimitOrder,
  StopOrder,
  StopTriggeredOrder,
  TrailingOrder,
  TrailingParams,
  TrailingStopLimit,
  TrailingStopMarket,
} from '../types/index.js';

const log = createChildLogger('orders');

export interface CreateOrderOptions extends OrderOptions {
  /** 주문 ID 생성기 (기본: 프로세스 공용 defaultOrderIds) */
  readonly ids?: OrderIdGenerator;
}

type ParsedBase = z.output<typeof baseOrderSchema>;

type BaseFields = Omit<OrderBase, 'orderType' | 'price'>;

function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  orderType: OrderType,
): Result<T> {
  const result = schema.safeParse(input);
  if (result.success) return ok(result.data);

  const error = ValidationError.fromZod(result.error);
  log.warn({ orderType, field: error.field, reason: error.reason }, 'Order rejected');
  return fail(error);
}

/** 명시적 non-zero orderId가 없을 때만 생성기에서 발급 */
function buildBase(parsed: ParsedBase, ids: OrderIdGenerator = defaultOrderIds): BaseFields {
  const orderId = parsed.orderId !== undefined && parsed.orderId !== 0 ? parsed.orderId : ids.next();
  return {
    orderId,
    permId: parsed.permId,
    clientId: parsed.clientId,
    action: parsed.action,
    totalQuantity: parsed.totalQuantity,
    tif: parsed.tif,
    goodTillDate: parsed.goodTillDate,
    goodAfterTime: parsed.goodAfterTime,
    ocaGroup: parsed.ocaGroup,
    orderRef: parsed.orderRef,
    parentId: UNSET_INTEGER,
    childIds: [],
    transmit: parsed.transmit,
  };
}

export function createMarketOrder(
  action: OrderAction,
  totalQuantity: number,
  options: CreateOrderOptions = {},
): Result<MarketOrder> {
  const parsed = parseInput(baseOrderSchema, { ...options, action, totalQuantity }, 'MKT');
  if (!parsed.success) return parsed;

  const order: MarketOrder = {
    ...buildBase(parsed.data, options.ids),
    orderType: 'MKT',
    price: UNSET_DOUBLE,
  };
  return ok(order);
}

export function createLimitOrder(
  action: OrderAction,
  totalQuantity: number,
  price: number,
  options: CreateOrderOptions = {},
): Result<LimitOrder> {
  const parsed = parseInput(limitOrderSchema, { ...options, action, totalQuantity, price }, 'LMT');
  if (!parsed.success) return parsed;

  const order: LimitOrder = {
    ...buildBase(parsed.data, options.ids),
    orderType: 'LMT',
    price: parsed.data.price,
  };
  return ok(order);
}

/** price = 스톱 트리거 가격 */
export function createStopOrder(
  action: OrderAction,
  totalQuantity: number,
  stopPrice: number,
  options: CreateOrderOptions = {},
): Result<StopOrder> {
  const parsed = parseInput(stopOrderSchema, { ...options, action, totalQuantity, price: stopPrice }, 'STP');
  if (!parsed.success) return parsed;

  const order: StopOrder = {
    ...buildBase(parsed.data, options.ids),
    orderType: 'STP',
    price: parsed.data.price,
    triggered: false,
    triggerPrice: null,
  };
  return ok(order);
}

/** stopPrice에서 트리거 → limitPrice 지정가로 평가 */
export function createStopLimitOrder(
  action: OrderAction,
  totalQuantity: number,
  limitPrice: number,
  stopPrice: number,
  options: CreateOrderOptions = {},
): Result<StopLimitOrder> {
  const parsed = parseInput(
    stopLimitOrderSchema,
    { ...options, action, totalQuantity, price: stopPrice, limitPrice },
    'STP LMT',
  );
  if (!parsed.success) return parsed;

  const order: StopLimitOrder = {
    ...buildBase(parsed.data, options.ids),
    orderType: 'STP LMT',
    price: parsed.data.price,
    limitPrice: parsed.data.limitPrice,
    triggered: false,
    triggerPrice: null,
  };
  return ok(order);
}

/**
 * 트레일링 스톱 (트리거 후 시장가)
 * trailingDistance / trailingPercent 중 정확히 하나.
 * stopPrice / extremePrice는 null로 시작, 시세에 따라 엔진이 갱신.
 */
export function createTrailingStopMarket(
  action: OrderAction,
  totalQuantity: number,
  params: TrailingParams,
  options: CreateOrderOptions = {},
): Result<TrailingStopMarket> {
  const parsed = parseInput(
    trailingStopMarketSchema,
    { ...options, action, totalQuantity, ...params },
    'TRAIL',
  );
  if (!parsed.success) return parsed;

  const order: TrailingStopMarket = {
    ...buildBase(parsed.data, options.ids),
    orderType: 'TRAIL',
    price: UNSET_DOUBLE,
    triggered: false,
    triggerPrice: null,
    trailingDistance: parsed.data.trailingDistance,
    trailingPercent: parsed.data.trailingPercent,
    stopPrice: null,
    extremePrice: null,
  };
  return ok(order);
}

/** 트레일링 스톱 (트리거 후 stopPrice ± limitOffset 지정가) */
export function createTrailingStopLimit(
  action: OrderAction,
  totalQuantity: number,
  limitOffset: number,
  params: TrailingParams,
  options: CreateOrderOptions = {},
): Result<TrailingStopLimit> {
  const parsed = parseInput(
    trailingStopLimitSchema,
    { ...options, action, totalQuantity, limitOffset, ...params },
    'TRAIL LIMIT',
  );
  if (!parsed.success) return parsed;

  const order: TrailingStopLimit = {
    ...buildBase(parsed.data, options.ids),
    orderType: 'TRAIL LIMIT',
    price: UNSET_DOUBLE,
    triggered: false,
    triggerPrice: null,
    trailingDistance: parsed.data.trailingDistance,
    trailingPercent: parsed.data.trailingPercent,
    stopPrice: null,
    extremePrice: null,
    limitOffset: parsed.data.limitOffset,
  };
  return ok(order);
}

/**
 * 트레일링 파라미터 교체 — 두 값을 함께 받아 다시 검증.
 * 원본은 그대로 두고 새 주문 객체를 반환 (OrderRegistry.replace로 갱신).
 */
export function withTrailingParams<T extends TrailingOrder>(
  order: T,
  params: TrailingParams,
): Result<T, FieldAssignmentError> {
  const result = trailingParamsSchema.safeParse(params);
  if (!result.success) {
    const error = FieldAssignmentError.fromZod(result.error);
    log.warn({ orderId: order.orderId, field: error.field, reason: error.reason }, 'Trailing params rejected');
    return fail(error);
  }

  return ok({
    ...order,
    childIds: [...order.childIds],
    trailingDistance: result.data.trailingDistance,
    trailingPercent: result.data.trailingPercent,
  });
}

/**
 * 브래킷 자식 연결
 * child.parentId를 덮어쓰고 (마지막 호출 우선) parent.childIds에 append.
 * 같은 child를 다시 넣으면 중복 append. 순환 검사 없음.
 */
export function addChild(parent: Order, child: Order): void {
  child.parentId = parent.orderId;
  parent.childIds.push(child.orderId);
}

export function isStopTriggered(order: Order): order is StopTriggeredOrder {
  return order.orderType !== 'MKT' && order.orderType !== 'LMT';
}

export function isTrailingOrder(order: Order): order is TrailingOrder {
  return order.orderType === 'TRAIL' || order.orderType === 'TRAIL LIMIT';
}
