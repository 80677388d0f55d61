// ============================================================
// Trading Types
// ============================================================
// Orders, the per-order state machine and the gate vocabulary shared by
// the execution pipeline, the risk manager and the broker adapters.
// ============================================================

export type OrderSide = 'buy' | 'sell'
export type OrderType = 'market' | 'limit'

export interface OrderRequest {
  symbol: string
  side: OrderSide
  quantity: number
  orderType: OrderType
  /** limit price; market orders may carry a reference price */
  price?: number
}

export type OrderState =
  | 'created'
  | 'rejected'
  | 'pending_approval'
  | 'approved'
  | 'denied'
  | 'discarded'
  | 'submitted'
  | 'filled'
  | 'rejected_by_broker'

export const TERMINAL_ORDER_STATES: ReadonlySet<OrderState> = new Set<OrderState>([
  'rejected',
  'filled',
  'rejected_by_broker',
  'discarded',
])

/** Gates in evaluation order, plus the broker hand-off */
export const GATE_ORDER = [
  'kill_switch',
  'validation',
  'queue_capacity',
  'pre_trade_risk',
  'duplicate_suppression',
  'manual_approval',
  'position_limits',
] as const

export type GateName = (typeof GATE_ORDER)[number] | 'broker'

export type RejectionReason =
  | 'TradingHalted'
  | 'InvalidOrder'
  | 'QueueFull'
  | 'RiskLimitExceeded'
  | 'DuplicateOrder'
  | 'LimitExceeded'
  | 'ApprovalDenied'
  | 'ApprovalExpired'
  | 'BrokerRejected'
  | 'BrokerError'

export interface GateResult {
  allowed: boolean
  gate: GateName
  reason?: RejectionReason
  /** Human-readable detail (undefined when allowed) */
  message?: string
}

export interface OrderTransition {
  from: OrderState | null
  to: OrderState
  at: number
  gate?: GateName
  reason?: RejectionReason
  message?: string
}

export interface OrderRecord {
  id: string
  request: Readonly<OrderRequest>
  state: OrderState
  createdAt: number
  updatedAt: number
  /** set once the order reached the broker */
  brokerOrderId?: string
  fillPrice?: number
  transitions: OrderTransition[]
}

export interface OrderStateEvent {
  orderId: string
  symbol: string
  from: OrderState | null
  to: OrderState
  gate?: GateName
  reason?: RejectionReason
  message?: string
  timestamp: number
}

export type OrderStateListener = (event: OrderStateEvent) => void

export type SubmitResult =
  | { status: 'rejected'; orderId: string; gate: GateName; reason: RejectionReason; message: string }
  | { status: 'pending_approval'; orderId: string }
  | { status: 'filled'; orderId: string; fillPrice?: number; brokerOrderId?: string }
  | { status: 'rejected_by_broker'; orderId: string; reason: 'BrokerRejected' | 'BrokerError'; message: string }
  | { status: 'discarded'; orderId: string; reason: 'ApprovalDenied' | 'ApprovalExpired' | 'TradingHalted' }

export type ApprovalDecision = 'approve' | 'deny'

// ============================================================
// Risk checker contract
// ============================================================

export type RiskReasonCode = 'daily_trades' | 'daily_loss' | 'open_positions' | 'cooldown' | 'drawdown'

export interface RiskReason {
  code: RiskReasonCode
  message: string
}

export interface RiskCheckResult {
  allowed: boolean
  reasons: RiskReason[]
}

export interface FillEvent {
  symbol: string
  side: OrderSide
  quantity: number
  price?: number
  /** the fill took the symbol from flat to a position */
  opened: boolean
  /** the fill brought the symbol back to flat */
  closed: boolean
}

export interface TradeCloseEvent {
  symbol: string
  /** realized profit (negative for a loss) */
  pnl: number
  /** account equity after the close, when the caller knows it */
  equity?: number
  /** the close brought the symbol back to flat */
  closed: boolean
}

/** Orders past the risk gate with no broker answer yet */
export interface PendingTrades {
  trades: number
  /** distinct flat symbols those orders would open */
  openings: number
}

export const NO_PENDING_TRADES: PendingTrades = { trades: 0, openings: 0 }

export interface RiskChecker {
  canTrade(now: number, pending?: PendingTrades): RiskCheckResult
  recordFill?(fill: FillEvent, now: number): void
  recordTradeClose?(close: TradeCloseEvent, now: number): void
  resetDaily?(now: number): void
}

/** Breaches severe enough to halt trading, not just the current order */
export const HALTING_RISK_CODES: ReadonlySet<RiskReasonCode> = new Set<RiskReasonCode>([
  'daily_loss',
  'drawdown',
])
