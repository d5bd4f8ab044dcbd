export type OrderStatusValue =
  | 'PendingSubmit'   // 전송 대기
  | 'Submitted'       // 거래소 접수
  | 'Filled'          // 전량 체결
  | 'Cancelled'       // 취소
  | 'Inactive';       // 거부/알 수 없음 (active도 done도 아님)

export type StatusClass = 'active' | 'done' | 'inactive';

/** 엔진이 필드를 직접 덮어씀 — 필드 간 일관성 검사 없음 */
export interface OrderStatus {
  orderId: number;
  status: OrderStatusValue;
  filled: number;
  remaining: number;
  avgFillPrice: number;
  lastFillPrice: number;
  parentId: number;
}

export interface TradeLogEntry {
  readonly time: Date;
  readonly status: OrderStatusValue;
  readonly message: string;
}
