export type OrderAction = 'BUY' | 'SELL';

export type OrderType = 'MKT' | 'LMT' | 'STP' | 'STP LMT' | 'TRAIL' | 'TRAIL LIMIT';

/**
 * 모든 주문 공통 필드
 * 식별/라우팅 필드는 생성 후 변경 불가. parentId/childIds는 addChild로만 변경.
 */
export interface OrderBase {
  readonly orderId: number;
  readonly permId: number;
  readonly clientId: number;
  readonly action: OrderAction;
  readonly totalQuantity: number;
  readonly orderType: OrderType;
  readonly price: number;          // 지정가/스톱가, 없으면 UNSET_DOUBLE
  readonly tif: string;
  readonly goodTillDate: string;
  readonly goodAfterTime: string;
  readonly ocaGroup: string;
  readonly orderRef: string;
  parentId: number;                // 루트 주문이면 UNSET_INTEGER
  readonly childIds: number[];     // 브래킷 자식 주문 ID (추가 순서)
  readonly transmit: boolean;
}

export interface MarketOrder extends OrderBase {
  readonly orderType: 'MKT';
}

export interface LimitOrder extends OrderBase {
  readonly orderType: 'LMT';
}

/** 스톱 계열 공통 실행 상태 (엔진이 기록) */
export interface StopFields {
  triggered: boolean;
  triggerPrice: number | null;     // 실제 트리거된 가격 (디버깅용)
}

export interface StopOrder extends OrderBase, StopFields {
  readonly orderType: 'STP';
}

export interface StopLimitOrder extends OrderBase, StopFields {
  readonly orderType: 'STP LMT';
  readonly limitPrice: number;
}

/**
 * 트레일링 파라미터: trailingDistance / trailingPercent 중 정확히 하나만 non-null.
 * 둘을 함께 바꾸려면 withTrailingParams 사용.
 */
export interface TrailingFields extends StopFields {
  readonly trailingDistance: number | null;
  readonly trailingPercent: number | null;
  stopPrice: number | null;        // 현재 스톱 가격 (엔진이 갱신)
  extremePrice: number | null;     // 진입 후 최유리 가격 (엔진이 갱신)
}

export interface TrailingStopMarket extends OrderBase, TrailingFields {
  readonly orderType: 'TRAIL';
}

export interface TrailingStopLimit extends OrderBase, TrailingFields {
  readonly orderType: 'TRAIL LIMIT';
  readonly limitOffset: number;    // 스톱 → 지정가 거리 (>= 0)
}

export type TrailingOrder = TrailingStopMarket | TrailingStopLimit;

export type StopTriggeredOrder = StopOrder | StopLimitOrder | TrailingOrder;

export type Order = MarketOrder | LimitOrder | StopTriggeredOrder;

export interface TrailingParams {
  readonly trailingDistance?: number | null;
  readonly trailingPercent?: number | null;
}

/** 생성 시 선택 입력 (공통 필드) */
export interface OrderOptions {
  readonly orderId?: number;
  readonly permId?: number;
  readonly clientId?: number;
  readonly tif?: string;
  readonly goodTillDate?: string;
  readonly goodAfterTime?: string;
  readonly ocaGroup?: string;
  readonly orderRef?: string;
  readonly transmit?: boolean;
}
