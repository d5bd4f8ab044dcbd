import type { CommissionReport, Execution, Fill } from '../types/index.js';

// 구조만 보장 — shares 부호, execution.orderId와 order 일치 여부는 검사하지 않음

export function createExecution(execution: Execution): Execution {
  return Object.freeze({ ...execution });
}

export function createCommissionReport(commission: number, currency: string): CommissionReport {
  return Object.freeze({ commission, currency });
}

export function createFill(fill: Fill): Fill {
  return Object.freeze({ ...fill });
}
