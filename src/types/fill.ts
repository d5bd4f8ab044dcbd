import type { Order, OrderAction } from './order.js';

export interface Execution {
  readonly orderId: number;
  readonly time: Date;
  readonly shares: number;
  readonly price: number;
  readonly side: OrderAction;
}

export interface CommissionReport {
  readonly commission: number;
  readonly currency: string;
}

/** 주문 1건에 대한 체결 1회 (부분 체결 포함) */
export interface Fill {
  readonly order: Order;
  readonly execution: Execution;
  readonly commissionReport: CommissionReport;
  readonly time: Date;
}
