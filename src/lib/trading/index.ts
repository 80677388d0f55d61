// ============================================================
// Trading - order gating and risk state
// ============================================================

export { ExecutionPipeline, DEFAULT_PIPELINE_CONFIG } from './execution-pipeline'
export type {
  PipelineConfig,
  PipelineDependencies,
  PipelineOptions,
  PipelineStatus,
  SubmitOptions,
} from './execution-pipeline'
export { RiskManager, DEFAULT_RISK_LIMITS, DEFAULT_INITIAL_EQUITY, utcDayKey } from './risk-manager'
export type { RiskLimits, RiskManagerOptions, RiskState } from './risk-manager'
export { PositionBook, checkPositionLimits, DEFAULT_POSITION_LIMITS } from './position-limits'
export type { PositionLimits, PositionSnapshot } from './position-limits'
export { RecentOrderCache, buildDedupKey, DEFAULT_DUPLICATE_WINDOW_MS } from './recent-orders'
export { KillSwitch } from './kill-switch'
export type { KillSwitchState } from './kill-switch'
export { ApprovalQueue, DEFAULT_APPROVAL_TIMEOUT_MS } from './approval-queue'
export { SerialExecutor } from './serial-executor'
export {
  validateOrderRequest,
  validateQuantity,
  assertValidQuantity,
  DEFAULT_QUANTITY_VALIDATION,
} from './validate-order'
export type { QuantityValidationConfig } from './validate-order'
export { GATE_ORDER, TERMINAL_ORDER_STATES, HALTING_RISK_CODES, NO_PENDING_TRADES } from './types'
export type * from './types'
