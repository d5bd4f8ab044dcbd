import { createChildLogger } from '../logger.js';
import { isUnsetInteger } from '../models/sentinels.js';
import { createOrderStatus, isActiveStatus, isDoneStatus } from './order-status.js';
import type { Fill, Order, OrderStatus, OrderStatusValue, TradeLogEntry } from '../types/index.js';

const log = createChildLogger('trade');

/**
 * 주문 1건의 수명주기 집계
 *
 * 정책:
 * - 상태 전이 검사 없음: 엔진이 orderStatus 필드를 직접 덮어씀
 * - fills / log는 append-only, 시간순
 * - fills와 filled/remaining 간 일관성은 엔진 책임
 */
export class Trade {
  readonly order: Order;
  readonly orderStatus: OrderStatus;
  readonly fills: Fill[] = [];
  readonly log: TradeLogEntry[] = [];

  constructor(order: Order, orderStatus?: OrderStatus) {
    this.order = order;
    this.orderStatus = orderStatus ?? createOrderStatus({
      orderId: order.orderId,
      remaining: order.totalQuantity,
      parentId: isUnsetInteger(order.parentId) ? 0 : order.parentId,
    });
  }

  /** 매 접근 시 현재 status로 재계산 */
  get isDone(): boolean {
    return isDoneStatus(this.orderStatus.status);
  }

  get isActive(): boolean {
    return isActiveStatus(this.orderStatus.status);
  }

  addFill(fill: Fill): void {
    this.fills.push(fill);
  }

  addLogEntry(status: OrderStatusValue, message: string = '', time: Date = new Date()): TradeLogEntry {
    const entry: TradeLogEntry = { time, status, message };
    this.log.push(entry);
    log.debug({ orderId: this.order.orderId, status, message }, 'Trade log entry');
    return entry;
  }
}
