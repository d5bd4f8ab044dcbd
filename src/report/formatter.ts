import { isUnset } from '../models/sentinels.js';
import type { Trade } from '../trade/trade.js';
import type { Order, TrailingOrder } from '../types/index.js';

/**
 * 주문 한 줄 요약 (로그/콘솔용)
 * 예: "#7 BUY 100 LMT @ 150.25", "#9 SELL 50 TRAIL trail 2.5%"
 */
export function formatOrder(order: Order): string {
  const head = `#${order.orderId} ${order.action} ${order.totalQuantity} ${order.orderType}`;

  switch (order.orderType) {
    case 'MKT':
      return head;
    case 'LMT':
      return `${head} @ ${formatPrice(order.price)}`;
    case 'STP':
      return `${head} stop ${formatPrice(order.price)}`;
    case 'STP LMT':
      return `${head} stop ${formatPrice(order.price)} limit ${formatPrice(order.limitPrice)}`;
    case 'TRAIL':
      return `${head} ${formatTrailing(order)}`;
    case 'TRAIL LIMIT':
      return `${head} ${formatTrailing(order)} offset ${order.limitOffset}`;
  }
}

export function formatTrade(trade: Trade): string {
  const s = trade.orderStatus;
  return [
    formatOrder(trade.order),
    s.status,
    `filled ${s.filled} / remaining ${s.remaining}`,
    `${trade.fills.length} fill(s)`,
  ].join(' | ');
}

function formatPrice(price: number): string {
  return isUnset(price) ? '-' : String(price);
}

function formatTrailing(order: TrailingOrder): string {
  const trail = order.trailingPercent !== null
    ? `trail ${order.trailingPercent}%`
    : `trail ${order.trailingDistance ?? '-'}`;
  return order.stopPrice !== null ? `${trail} (stop ${order.stopPrice})` : trail;
}
