export { UNSET_DOUBLE, UNSET_INTEGER, isUnset, isUnsetInteger } from './models/sentinels.js';
export { ValidationError, FieldAssignmentError, ok, fail, orThrow } from './models/errors.js';
export type { Result } from './models/errors.js';
export { TRAILING_PARAMS_MESSAGE } from './models/schemas.js';

export { OrderIdGenerator, defaultOrderIds } from './orders/order-id.js';
export {
  createMarketOrder,
  createLimitOrder,
  createStopOrder,
  createStopLimitOrder,
  createTrailingStopMarket,
  createTrailingStopLimit,
  withTrailingParams,
  addChild,
  isStopTriggered,
  isTrailingOrder,
} from './orders/orders.js';
export type { CreateOrderOptions } from './orders/orders.js';
export { OrderRegistry } from './orders/order-registry.js';

export { createBarData } from './bars/bar-data.js';
export { loadBarsCsv } from './data/csv-loader.js';
export type { CsvLoaderOptions, CsvLoadResult, RejectedRow } from './data/csv-loader.js';

export { createExecution, createCommissionReport, createFill } from './trade/fill.js';
export {
  DONE_STATES,
  ACTIVE_STATES,
  createOrderStatus,
  isDoneStatus,
  isActiveStatus,
  classifyStatus,
} from './trade/order-status.js';
export { Trade } from './trade/trade.js';

export { formatOrder, formatTrade } from './report/formatter.js';

export type * from './types/index.js';
