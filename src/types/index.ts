export type {
  OrderAction,
  OrderType,
  OrderBase,
  MarketOrder,
  LimitOrder,
  StopFields,
  StopOrder,
  StopLimitOrder,
  TrailingFields,
  TrailingStopMarket,
  TrailingStopLimit,
  TrailingOrder,
  StopTriggeredOrder,
  Order,
  TrailingParams,
  OrderOptions,
} from './order.js';
export type { BarData, BarDataInput } from './bar.js';
export type { Execution, CommissionReport, Fill } from './fill.js';
export type { OrderStatusValue, StatusClass, OrderStatus, TradeLogEntry } from './trade.js';
