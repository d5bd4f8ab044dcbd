import { config } from '../config.js';

/**
 * 단조 증가 주문 ID 생성기
 * 프로세스 수명 동안만 유일 — 재시작하면 다시 시작값부터.
 */
export class OrderIdGenerator {
  private nextId: number;

  constructor(start: number = 1) {
    if (!Number.isSafeInteger(start) || start < 1) {
      throw new Error(`Invalid order id start: ${start}`);
    }
    this.nextId = start;
  }

  next(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  /** 다음에 발급될 ID (소비하지 않음) */
  peek(): number {
    return this.nextId;
  }
}

/** 모든 주문 타입이 공유하는 프로세스 기본 생성기. reset 없음. */
export const defaultOrderIds = new OrderIdGenerator(config.orders.firstOrderId);
