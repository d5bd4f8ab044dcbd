import { ValidationError } from '../models/errors.js';
import { isUnsetInteger } from '../models/sentinels.js';
import { addChild } from './orders.js';
import type { Order } from '../types/index.js';

/**
 * 주문 평면 저장소 (orderId → Order)
 * 부모/자식 관계는 ID로만 연결 — 주문끼리 서로 소유하지 않음.
 */
export class OrderRegistry {
  private readonly orders: Map<number, Order> = new Map();

  get size(): number {
    return this.orders.size;
  }

  register(order: Order): void {
    if (this.orders.has(order.orderId)) {
      throw new ValidationError('orderId', `order ${order.orderId} is already registered`);
    }
    this.orders.set(order.orderId, order);
  }

  /** 같은 orderId의 새 객체로 교체 (withTrailingParams 결과 반영용) */
  replace(order: Order): void {
    if (!this.orders.has(order.orderId)) {
      throw new ValidationError('orderId', `unknown order ${order.orderId}`);
    }
    this.orders.set(order.orderId, order);
  }

  get(orderId: number): Order | undefined {
    return this.orders.get(orderId);
  }

  has(orderId: number): boolean {
    return this.orders.has(orderId);
  }

  addChild(parentId: number, childId: number): void {
    addChild(this.require(parentId), this.require(childId));
  }

  /** childIds 순서대로, 중복 포함 */
  childrenOf(orderId: number): Order[] {
    const children: Order[] = [];
    for (const id of this.require(orderId).childIds) {
      const child = this.orders.get(id);
      if (child) children.push(child);
    }
    return children;
  }

  parentOf(orderId: number): Order | undefined {
    const { parentId } = this.require(orderId);
    if (isUnsetInteger(parentId)) return undefined;
    return this.orders.get(parentId);
  }

  values(): IterableIterator<Order> {
    return this.orders.values();
  }

  private require(orderId: number): Order {
    const order = this.orders.get(orderId);
    if (!order) {
      throw new ValidationError('orderId', `unknown order ${orderId}`);
    }
    return order;
  }
}
