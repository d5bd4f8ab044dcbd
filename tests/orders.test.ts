import { describe, it, expect } from 'vitest';
import {
  addChild,
  createLimitOrder,
  createMarketOrder,
  createStopLimitOrder,
  createStopOrder,
  createTrailingStopLimit,
  createTrailingStopMarket,
  isStopTriggered,
  isTrailingOrder,
  withTrailingParams,
} from '../src/orders/orders.js';
import { OrderIdGenerator } from '../src/orders/order-id.js';
import { FieldAssignmentError, ValidationError, orThrow } from '../src/models/errors.js';
import { TRAILING_PARAMS_MESSAGE } from '../src/models/schemas.js';
import { UNSET_DOUBLE, UNSET_INTEGER } from '../src/models/sentinels.js';
import type { TrailingParams } from '../src/types/index.js';

describe('order ids', () => {
  it('should assign increasing ids across all order types', () => {
    const a = orThrow(createLimitOrder('BUY', 100, 150));
    const b = orThrow(createMarketOrder('SELL', 50));
    const c = orThrow(createTrailingStopMarket('BUY', 25, { trailingDistance: 1 }));

    expect(a.orderId).toBeGreaterThan(0);
    expect(b.orderId).toBe(a.orderId + 1);
    expect(c.orderId).toBe(b.orderId + 1);
  });

  it('should draw ids from an injected generator', () => {
    const ids = new OrderIdGenerator(1);
    const first = orThrow(createMarketOrder('BUY', 1, { ids }));
    const second = orThrow(createStopOrder('SELL', 1, 99, { ids }));

    expect(first.orderId).toBe(1);
    expect(second.orderId).toBe(2);
    expect(ids.peek()).toBe(3);
  });

  it('should keep an explicit non-zero id without consuming the counter', () => {
    const ids = new OrderIdGenerator(10);
    const order = orThrow(createMarketOrder('BUY', 1, { ids, orderId: 42 }));

    expect(order.orderId).toBe(42);
    expect(ids.peek()).toBe(10);
  });

  it('should treat orderId 0 as "assign one"', () => {
    const ids = new OrderIdGenerator(5);
    const order = orThrow(createMarketOrder('BUY', 1, { ids, orderId: 0 }));
    expect(order.orderId).toBe(5);
  });

  it('should reject a non-positive start', () => {
    expect(() => new OrderIdGenerator(0)).toThrow('Invalid order id start: 0');
  });
});

describe('base fields', () => {
  it('should default routing and linkage fields', () => {
    const order = orThrow(createMarketOrder('SELL', 50));

    expect(order.orderType).toBe('MKT');
    expect(order.price).toBe(UNSET_DOUBLE);
    expect(order.permId).toBe(0);
    expect(order.clientId).toBe(0);
    expect(order.tif).toBe('');
    expect(order.ocaGroup).toBe('');
    expect(order.parentId).toBe(UNSET_INTEGER);
    expect(order.childIds).toEqual([]);
    expect(order.transmit).toBe(true);
  });

  it('should carry optional routing fields', () => {
    const order = orThrow(createLimitOrder('BUY', 10, 99.5, {
      tif: 'GTC',
      orderRef: 'entry-1',
      ocaGroup: 'oca-7',
      transmit: false,
      clientId: 3,
    }));

    expect(order.tif).toBe('GTC');
    expect(order.orderRef).toBe('entry-1');
    expect(order.ocaGroup).toBe('oca-7');
    expect(order.transmit).toBe(false);
    expect(order.clientId).toBe(3);
  });

  it('should not share childIds between orders', () => {
    const a = orThrow(createMarketOrder('BUY', 1));
    const b = orThrow(createMarketOrder('BUY', 1));
    expect(a.childIds).not.toBe(b.childIds);
  });

  it.each([0, -5])('should reject totalQuantity %d', (qty) => {
    const result = createMarketOrder('BUY', qty);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.field).toBe('totalQuantity');
    expect(result.error.message).toBe('totalQuantity: must be greater than 0');
  });

  it('should throw through orThrow', () => {
    expect(() => orThrow(createLimitOrder('SELL', -1, 10))).toThrow('totalQuantity: must be greater than 0');
  });
});

describe('simple orders', () => {
  it('should create a limit order', () => {
    const order = orThrow(createLimitOrder('BUY', 100, 150.25));

    expect(order.action).toBe('BUY');
    expect(order.totalQuantity).toBe(100);
    expect(order.price).toBe(150.25);
    expect(order.orderType).toBe('LMT');
  });

  it('should require a finite limit price', () => {
    const result = createLimitOrder('BUY', 100, UNSET_DOUBLE);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.field).toBe('price');
    expect(result.error.reason).toBe('must be finite');
  });

  it('should create a stop order with untriggered state', () => {
    const order = orThrow(createStopOrder('SELL', 100, 145));

    expect(order.orderType).toBe('STP');
    expect(order.price).toBe(145);
    expect(order.triggered).toBe(false);
    expect(order.triggerPrice).toBeNull();

    order.triggered = true;
    order.triggerPrice = 144.9;
    expect(order.triggered).toBe(true);
    expect(order.triggerPrice).toBe(144.9);
  });

  it('should accept UNSET_DOUBLE as a stop price', () => {
    const order = orThrow(createStopOrder('SELL', 100, UNSET_DOUBLE));
    expect(order.price).toBe(UNSET_DOUBLE);
  });

  it('should reject NaN as a stop price', () => {
    const result = createStopOrder('SELL', 100, Number.NaN);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.field).toBe('price');
  });

  it('should create a stop limit order', () => {
    const order = orThrow(createStopLimitOrder('BUY', 100, 150.5, 150));

    expect(order.orderType).toBe('STP LMT');
    expect(order.price).toBe(150);
    expect(order.limitPrice).toBe(150.5);
    expect(order.triggered).toBe(false);
  });
});

describe('trailing orders', () => {
  it('should create a trailing stop market with a distance', () => {
    const order = orThrow(createTrailingStopMarket('BUY', 100, { trailingDistance: 2 }));

    expect(order.orderType).toBe('TRAIL');
    expect(order.trailingDistance).toBe(2);
    expect(order.trailingPercent).toBeNull();
    expect(order.stopPrice).toBeNull();
    expect(order.extremePrice).toBeNull();
    expect(order.triggered).toBe(false);
    expect(order.childIds).toHaveLength(0);
  });

  it('should create a trailing stop limit with a percent', () => {
    const order = orThrow(createTrailingStopLimit('SELL', 50, 0.25, { trailingPercent: 1.5 }));

    expect(order.orderType).toBe('TRAIL LIMIT');
    expect(order.trailingDistance).toBeNull();
    expect(order.trailingPercent).toBe(1.5);
    expect(order.limitOffset).toBe(0.25);
  });

  const invalidParams: Array<{ label: string; params: TrailingParams }> = [
    { label: 'neither', params: {} },
    { label: 'both', params: { trailingDistance: 2, trailingPercent: 2.5 } },
    { label: 'explicit nulls', params: { trailingDistance: null, trailingPercent: null } },
  ];

  it.each(invalidParams)('should reject $label trailing params', ({ params }) => {
    const market = createTrailingStopMarket('BUY', 100, params);
    const limit = createTrailingStopLimit('BUY', 100, 0.5, params);

    for (const result of [market, limit]) {
      expect(result.success).toBe(false);
      if (result.success) continue;
      expect(result.error.field).toBe('trailingDistance/trailingPercent');
      expect(result.error.reason).toBe(TRAILING_PARAMS_MESSAGE);
    }
  });

  it('should accept a zero trailing distance or percent', () => {
    const distance = orThrow(createTrailingStopMarket('SELL', 10, { trailingDistance: 0 }));
    const percent = orThrow(createTrailingStopLimit('BUY', 10, 0.5, { trailingPercent: 0 }));

    expect(distance.trailingDistance).toBe(0);
    expect(distance.trailingPercent).toBeNull();
    expect(percent.trailingPercent).toBe(0);
    expect(percent.trailingDistance).toBeNull();
  });

  it('should reject a non-finite trailing distance', () => {
    const result = createTrailingStopMarket('SELL', 10, { trailingDistance: Number.POSITIVE_INFINITY });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('trailingDistance: must be finite');
  });

  it('should reject a negative limit offset', () => {
    const result = createTrailingStopLimit('SELL', 10, -0.5, { trailingPercent: 1 });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('limitOffset: must not be negative');
  });

  it('should let the engine write stop and extreme prices', () => {
    const order = orThrow(createTrailingStopMarket('SELL', 50, { trailingDistance: 1.5 }));

    order.extremePrice = 100;
    order.stopPrice = 98.5;
    expect(order.extremePrice).toBe(100);
    expect(order.stopPrice).toBe(98.5);

    order.extremePrice = 101;
    order.stopPrice = 99.5;
    expect(order.extremePrice).toBe(101);
    expect(order.stopPrice).toBe(99.5);
  });

  it('should keep execution state per instance', () => {
    const a = orThrow(createTrailingStopMarket('BUY', 100, { trailingDistance: 1 }));
    const b = orThrow(createTrailingStopMarket('BUY', 100, { trailingDistance: 2 }));

    a.stopPrice = 100;
    a.extremePrice = 101;

    expect(b.stopPrice).toBeNull();
    expect(b.extremePrice).toBeNull();
    expect(b.trailingDistance).toBe(2);
  });
});

describe('withTrailingParams', () => {
  it('should swap distance for percent on a copy', () => {
    const order = orThrow(createTrailingStopLimit('SELL', 10, 0.5, { trailingDistance: 2 }));
    order.stopPrice = 97;

    const updated = orThrow(withTrailingParams(order, { trailingPercent: 1.5 }));

    expect(updated.orderId).toBe(order.orderId);
    expect(updated.trailingDistance).toBeNull();
    expect(updated.trailingPercent).toBe(1.5);
    expect(updated.limitOffset).toBe(0.5);
    expect(updated.stopPrice).toBe(97);
    expect(order.trailingDistance).toBe(2);
    expect(updated.childIds).not.toBe(order.childIds);
  });

  it('should fail with FieldAssignmentError when both are given', () => {
    const order = orThrow(createTrailingStopMarket('BUY', 10, { trailingDistance: 2 }));
    const result = withTrailingParams(order, { trailingDistance: 1, trailingPercent: 2 });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(FieldAssignmentError);
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.name).toBe('FieldAssignmentError');
    expect(result.error.reason).toBe(TRAILING_PARAMS_MESSAGE);
    expect(order.trailingDistance).toBe(2);
  });

  it('should fail when both are cleared', () => {
    const order = orThrow(createTrailingStopMarket('BUY', 10, { trailingPercent: 3 }));
    expect(() => orThrow(withTrailingParams(order, {}))).toThrow(TRAILING_PARAMS_MESSAGE);
  });
});

describe('addChild', () => {
  it('should link children in order', () => {
    const parent = orThrow(createLimitOrder('BUY', 100, 150));
    const takeProfit = orThrow(createLimitOrder('SELL', 100, 155));
    const stopLoss = orThrow(createStopOrder('SELL', 100, 145));

    addChild(parent, takeProfit);
    addChild(parent, stopLoss);

    expect(takeProfit.parentId).toBe(parent.orderId);
    expect(stopLoss.parentId).toBe(parent.orderId);
    expect(parent.childIds).toEqual([takeProfit.orderId, stopLoss.orderId]);
  });

  it('should support nested brackets', () => {
    const root = orThrow(createMarketOrder('BUY', 10));
    const child = orThrow(createMarketOrder('SELL', 10));
    const grandchild = orThrow(createMarketOrder('SELL', 5));

    addChild(root, child);
    addChild(child, grandchild);

    expect(grandchild.parentId).toBe(child.orderId);
    expect(root.childIds).toEqual([child.orderId]);
    expect(child.childIds).toEqual([grandchild.orderId]);
  });

  it('should append duplicates on repeated calls', () => {
    const parent = orThrow(createMarketOrder('BUY', 10));
    const child = orThrow(createMarketOrder('SELL', 10));

    addChild(parent, child);
    addChild(parent, child);

    expect(child.parentId).toBe(parent.orderId);
    expect(parent.childIds).toEqual([child.orderId, child.orderId]);
  });

  it('should overwrite parentId without removing from the old parent', () => {
    const first = orThrow(createMarketOrder('BUY', 10));
    const second = orThrow(createMarketOrder('BUY', 10));
    const child = orThrow(createMarketOrder('SELL', 10));

    addChild(first, child);
    addChild(second, child);

    expect(child.parentId).toBe(second.orderId);
    expect(first.childIds).toEqual([child.orderId]);
    expect(second.childIds).toEqual([child.orderId]);
  });
});

describe('type guards', () => {
  it('should classify variants', () => {
    const market = orThrow(createMarketOrder('BUY', 1));
    const stopLimit = orThrow(createStopLimitOrder('BUY', 1, 10, 9));
    const trail = orThrow(createTrailingStopLimit('SELL', 1, 0, { trailingDistance: 1 }));

    expect(isStopTriggered(market)).toBe(false);
    expect(isStopTriggered(stopLimit)).toBe(true);
    expect(isTrailingOrder(stopLimit)).toBe(false);
    expect(isTrailingOrder(trail)).toBe(true);
    expect(isStopTriggered(trail)).toBe(true);
  });
});
