import type { OrderStatus, OrderStatusValue, StatusClass } from '../types/index.js';

export const DONE_STATES: ReadonlySet<OrderStatusValue> = new Set<OrderStatusValue>(['Filled', 'Cancelled']);

export const ACTIVE_STATES: ReadonlySet<OrderStatusValue> = new Set<OrderStatusValue>(['PendingSubmit', 'Submitted']);

/** undefined로 넘긴 필드도 기본값 유지 */
export function createOrderStatus(init: Partial<OrderStatus> = {}): OrderStatus {
  return {
    orderId: init.orderId ?? 0,
    status: init.status ?? 'PendingSubmit',
    filled: init.filled ?? 0,
    remaining: init.remaining ?? 0,
    avgFillPrice: init.avgFillPrice ?? 0,
    lastFillPrice: init.lastFillPrice ?? 0,
    parentId: init.parentId ?? 0,
  };
}

export function isDoneStatus(status: OrderStatusValue): boolean {
  return DONE_STATES.has(status);
}

export function isActiveStatus(status: OrderStatusValue): boolean {
  return ACTIVE_STATES.has(status);
}

/** Inactive는 active도 done도 아님 */
export function classifyStatus(status: OrderStatusValue): StatusClass {
  if (isDoneStatus(status)) return 'done';
  if (isActiveStatus(status)) return 'active';
  return 'inactive';
}
