// ============================================================
// Execution Safety Pipeline
// ============================================================
// Every order runs the gate chain inside one serialized section:
//   kill switch -> validation -> queue capacity -> pre-trade risk
//   -> duplicate suppression -> manual approval -> position limits
// The broker call and the wait for a human decision happen outside it.
// Gate rejections are returned, never thrown.
// ============================================================

import { ErrorCode, Result, TradingError, errorHandler } from '../errors'
import { loggers } from '../logger'
import type { TelemetrySink } from '../telemetry'
import type { BrokerAdapter, BrokerOrderResult } from '../broker/types'
import { ApprovalQueue, DEFAULT_APPROVAL_TIMEOUT_MS } from './approval-queue'
import type { PendingApproval } from './approval-queue'
import { KillSwitch } from './kill-switch'
import type { KillSwitchState } from './kill-switch'
import { DEFAULT_POSITION_LIMITS, PositionBook, checkPositionLimits } from './position-limits'
import type { PositionLimits, PositionSnapshot } from './position-limits'
import { DEFAULT_DUPLICATE_WINDOW_MS, DEFAULT_MAX_RECENT_ORDERS, RecentOrderCache } from './recent-orders'
import { SerialExecutor } from './serial-executor'
import { HALTING_RISK_CODES, TERMINAL_ORDER_STATES } from './types'
import type {
  ApprovalDecision,
  GateName,
  OrderRecord,
  OrderRequest,
  OrderState,
  OrderStateEvent,
  OrderStateListener,
  PendingTrades,
  RejectionReason,
  RiskCheckResult,
  RiskChecker,
  SubmitResult,
} from './types'
import { DEFAULT_QUANTITY_VALIDATION, validateOrderRequest } from './validate-order'
import type { QuantityValidationConfig } from './validate-order'

const logger = loggers.pipeline

export interface PipelineConfig {
  /** pending approvals + broker calls in flight */
  maxPendingOrders: number
  requireApproval: boolean
  approvalTimeoutMs: number
  duplicateWindowMs: number
  maxRecentOrders: number
  initialEquity: number
  /** finished orders kept for lookup */
  maxOrderHistory: number
  limits: PositionLimits
  quantity: QuantityValidationConfig
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  maxPendingOrders: 50,
  requireApproval: true,
  approvalTimeoutMs: DEFAULT_APPROVAL_TIMEOUT_MS,
  duplicateWindowMs: DEFAULT_DUPLICATE_WINDOW_MS,
  maxRecentOrders: DEFAULT_MAX_RECENT_ORDERS,
  initialEquity: 10_000,
  maxOrderHistory: 1000,
  limits: DEFAULT_POSITION_LIMITS,
  quantity: DEFAULT_QUANTITY_VALIDATION,
}

export type PipelineOptions = Partial<Omit<PipelineConfig, 'limits' | 'quantity'>> & {
  limits?: Partial<PositionLimits>
  quantity?: Partial<QuantityValidationConfig>
}

export interface PipelineDependencies {
  broker: BrokerAdapter
  risk: RiskChecker
  telemetry?: TelemetrySink
  /** injectable for time-based gates */
  clock?: () => number
}

export interface SubmitOptions {
  /** skip the manual approval gate for this order */
  preApproved?: boolean
}

export interface PipelineStatus {
  killSwitch: KillSwitchState
  paused: boolean
  pendingApprovals: number
  inFlight: number
  recentOrders: number
  equity: number
  positions: PositionSnapshot[]
  risk: RiskCheckResult
  orders: Partial<Record<OrderState, number>>
}

interface TransitionDetail {
  gate?: GateName
  reason?: RejectionReason
  message?: string
}

type EntryOutcome = { kind: 'dispatch'; record: OrderRecord } | { kind: 'done'; result: SubmitResult }

interface DedupHold {
  key: string
  recordedAt: number
}

type DiscardReason = 'ApprovalDenied' | 'ApprovalExpired' | 'TradingHalted'

function discardReasonOf(record: OrderRecord): DiscardReason {
  const last = record.transitions[record.transitions.length - 1]
  const reason = last?.reason
  if (reason === 'ApprovalDenied' || reason === 'ApprovalExpired') return reason
  return 'TradingHalted'
}

export class ExecutionPipeline {
  private readonly config: PipelineConfig
  private readonly broker: BrokerAdapter
  private readonly risk: RiskChecker
  private readonly telemetry?: TelemetrySink
  private readonly clock: () => number

  private readonly lock = new SerialExecutor()
  private readonly killSwitch = new KillSwitch()
  private readonly recentOrders: RecentOrderCache
  private readonly approvals: ApprovalQueue
  private readonly book: PositionBook

  private readonly orders: Map<string, OrderRecord> = new Map()
  private readonly dedupHolds: Map<string, DedupHold> = new Map()
  private readonly inFlight: Set<string> = new Set()
  private readonly listeners: Set<OrderStateListener> = new Set()
  private paused = false
  private sequence = 0
  private cancellation: Promise<void> = Promise.resolve()

  constructor(deps: PipelineDependencies, options: PipelineOptions = {}) {
    this.config = {
      ...DEFAULT_PIPELINE_CONFIG,
      ...options,
      limits: { ...DEFAULT_PIPELINE_CONFIG.limits, ...options.limits },
      quantity: { ...DEFAULT_PIPELINE_CONFIG.quantity, ...options.quantity },
    }
    this.broker = deps.broker
    this.risk = deps.risk
    this.telemetry = deps.telemetry
    this.clock = deps.clock ?? Date.now

    this.recentOrders = new RecentOrderCache(this.config.duplicateWindowMs, this.config.maxRecentOrders)
    this.approvals = new ApprovalQueue(this.config.approvalTimeoutMs)
    this.book = new PositionBook(this.config.initialEquity)
  }

  // ============================================================
  // Submission
  // ============================================================

  async submitOrder(order: OrderRequest, options: SubmitOptions = {}): Promise<SubmitResult> {
    const record = this.createRecord(order)
    const outcome = await this.lock.run(() => this.runEntryGates(record, options))
    if (outcome.kind === 'done') return outcome.result
    return this.dispatch(outcome.record)
  }

  private runEntryGates(record: OrderRecord, options: SubmitOptions): EntryOutcome {
    const now = this.clock()
    this.expireApprovals(now)

    // Gate 1: kill switch
    const halted = this.checkHalted()
    if (halted) return this.reject(record, 'kill_switch', 'TradingHalted', halted)

    const validation = validateOrderRequest(record.request, this.config.quantity)
    if (!validation.valid || !validation.order) {
      return this.reject(record, 'validation', 'InvalidOrder', validation.reason ?? 'Invalid order')
    }
    record.request = Object.freeze(validation.order)
    const order = record.request

    // Gate 2: queue capacity
    const outstanding = this.approvals.size + this.inFlight.size
    if (outstanding >= this.config.maxPendingOrders) {
      return this.reject(
        record,
        'queue_capacity',
        'QueueFull',
        `${outstanding} outstanding orders (max ${this.config.maxPendingOrders})`,
      )
    }

    // Gate 3: pre-trade risk
    const risk = this.risk.canTrade(now, this.pendingTrades())
    if (!risk.allowed) {
      const message = risk.reasons.map((r) => r.message).join('; ') || 'Risk check failed'
      const halting = risk.reasons.find((r) => HALTING_RISK_CODES.has(r.code))
      const result = this.reject(record, 'pre_trade_risk', 'RiskLimitExceeded', message)
      if (halting) this.activateKillSwitch(`Risk limit breached: ${halting.message}`)
      return result
    }

    // Gate 4: duplicate suppression
    const dup = this.recentOrders.checkAndRecord(order, now)
    if (dup.duplicate) {
      return this.reject(
        record,
        'duplicate_suppression',
        'DuplicateOrder',
        `${dup.dedupKey} seen ${dup.ageMs}ms ago (window ${this.config.duplicateWindowMs}ms)`,
      )
    }
    this.dedupHolds.set(record.id, { key: dup.dedupKey, recordedAt: now })

    // Gate 5: manual approval
    if (this.config.requireApproval && !options.preApproved) {
      this.approvals.add(record.id, order.symbol, now)
      this.transition(record, 'pending_approval', { gate: 'manual_approval' })
      logger.info(`Order ${record.id} awaiting approval: ${order.side} ${order.quantity} ${order.symbol}`)
      return { kind: 'done', result: { status: 'pending_approval', orderId: record.id } }
    }

    return this.passLimitsAndReserve(record)
  }

  /**
   * Gate 6 and the hand-off: reserve room in the book and mark in flight
   */
  private passLimitsAndReserve(record: OrderRecord): EntryOutcome {
    const limits = checkPositionLimits(record.request, this.book, this.config.limits)
    if (!limits.allowed) {
      return this.reject(record, 'position_limits', 'LimitExceeded', limits.message ?? 'Position limit exceeded')
    }

    this.book.reserve(record.id, record.request)
    this.inFlight.add(record.id)
    this.transition(record, 'submitted', { gate: 'position_limits' })
    return { kind: 'dispatch', record }
  }

  private async dispatch(record: OrderRecord): Promise<SubmitResult> {
    let result: BrokerOrderResult
    try {
      result = await this.broker.placeOrder({ ...record.request, clientOrderId: record.id })
    } catch (e) {
      const error = errorHandler.handle(
        e,
        { module: 'lib/trading', function: 'dispatch', extra: { orderId: record.id, broker: this.broker.name } },
        ErrorCode.BROKER_ERROR,
      )
      result = { status: 'error', message: error.message }
    }
    return this.lock.run(() => this.settle(record, result))
  }

  private settle(record: OrderRecord, result: BrokerOrderResult): SubmitResult {
    const now = this.clock()
    this.inFlight.delete(record.id)
    const order = record.request

    if (result.status === 'filled') {
      const fillPrice = result.fillPrice ?? order.price ?? this.book.getMarkPrice(order.symbol) ?? undefined
      const applied = this.book.applyFill(record.id, order, fillPrice)
      record.fillPrice = fillPrice
      record.brokerOrderId = result.brokerOrderId
      this.risk.recordFill?.({ ...order, price: fillPrice, opened: applied.opened, closed: applied.closed }, now)
      this.transition(record, 'filled', { gate: 'broker' })
      logger.trade(`Filled ${order.side} ${order.quantity} ${order.symbol}${fillPrice !== undefined ? ` @ ${fillPrice}` : ''}`)
      return { status: 'filled', orderId: record.id, fillPrice, brokerOrderId: result.brokerOrderId }
    }

    // never retried here; the slot goes back so the caller may resubmit
    this.book.release(record.id)
    const hold = this.dedupHolds.get(record.id)
    if (hold) this.recentOrders.release(hold.key, hold.recordedAt)

    const reason = result.status === 'rejected' ? 'BrokerRejected' : 'BrokerError'
    const message = result.message ?? (reason === 'BrokerRejected' ? 'Rejected by broker' : 'Broker error')
    record.brokerOrderId = result.brokerOrderId
    this.transition(record, 'rejected_by_broker', { gate: 'broker', reason, message })
    this.telemetry?.({
      stage: 'broker',
      reason,
      symbol: order.symbol,
      timestamp: now,
      detail: { orderId: record.id, message },
    })
    logger.warn(`Order ${record.id} ${reason}: ${message}`)
    return { status: 'rejected_by_broker', orderId: record.id, reason, message }
  }

  // ============================================================
  // Manual approval
  // ============================================================

  approve(orderId: string): Promise<Result<SubmitResult>> {
    return this.resolveApproval(orderId, 'approve')
  }

  deny(orderId: string): Promise<Result<SubmitResult>> {
    return this.resolveApproval(orderId, 'deny')
  }

  /**
   * Resume a parked order. Approval re-checks the kill switch and the
   * position limits before the broker sees it.
   */
  async resolveApproval(orderId: string, decision: ApprovalDecision): Promise<Result<SubmitResult>> {
    const outcome = await this.lock.run((): Result<EntryOutcome> => {
      const now = this.clock()
      this.expireApprovals(now)

      const record = this.orders.get(orderId)
      if (!record) {
        return Result.fail(ErrorCode.ORDER_NOT_FOUND, `Order ${orderId} not found`, {
          module: 'lib/trading',
          function: 'resolveApproval',
        })
      }

      if (record.state === 'discarded') {
        const result: SubmitResult = { status: 'discarded', orderId, reason: discardReasonOf(record) }
        return Result.ok({ kind: 'done', result })
      }

      if (record.state !== 'pending_approval') {
        return Result.fail(ErrorCode.ORDER_INVALID_STATE, `Order ${orderId} is ${record.state}`, {
          module: 'lib/trading',
          function: 'resolveApproval',
          extra: { state: record.state },
        })
      }

      this.approvals.remove(orderId)

      if (decision === 'deny') {
        this.transition(record, 'denied', { gate: 'manual_approval', reason: 'ApprovalDenied' })
        this.transition(record, 'discarded', { gate: 'manual_approval', reason: 'ApprovalDenied' })
        logger.info(`Order ${orderId} denied`)
        return Result.ok({ kind: 'done', result: { status: 'discarded', orderId, reason: 'ApprovalDenied' } })
      }

      this.transition(record, 'approved', { gate: 'manual_approval' })

      const halted = this.checkHalted()
      if (halted) return Result.ok(this.reject(record, 'kill_switch', 'TradingHalted', halted))

      return Result.ok(this.passLimitsAndReserve(record))
    })

    if (!outcome.success) return outcome
    if (outcome.data.kind === 'done') return Result.ok(outcome.data.result)
    return Result.ok(await this.dispatch(outcome.data.record))
  }

  getPendingApprovals(): OrderRecord[] {
    this.expireApprovals(this.clock())
    return this.approvals
      .list()
      .map((p) => this.orders.get(p.orderId))
      .filter((r): r is OrderRecord => r !== undefined)
      .map((r) => this.copyRecord(r))
  }

  private expireApprovals(now: number): void {
    for (const expired of this.approvals.takeExpired(now)) {
      this.discardPending(expired, 'ApprovalExpired', `No decision within ${this.config.approvalTimeoutMs}ms`)
    }
  }

  private discardPending(entry: PendingApproval, reason: DiscardReason, message: string): void {
    const record = this.orders.get(entry.orderId)
    if (!record) return
    this.transition(record, 'discarded', { gate: 'manual_approval', reason, message })
    this.telemetry?.({
      stage: 'pipeline',
      reason,
      symbol: entry.symbol,
      timestamp: this.clock(),
      detail: { orderId: entry.orderId, message },
    })
  }

  // ============================================================
  // Kill switch
  // ============================================================

  /**
   * Halt all trading. Only the call that sets the switch discards pending
   * approvals and asks the broker to cancel in-flight orders.
   */
  activateKillSwitch(reason: string): boolean {
    const now = this.clock()
    if (!this.killSwitch.activate(reason, now)) return false

    logger.halt(`Kill switch activated: ${reason}`)
    this.telemetry?.({ stage: 'pipeline', reason: 'KillSwitchActivated', timestamp: now, detail: { reason } })

    for (const entry of this.approvals.drain()) {
      this.discardPending(entry, 'TradingHalted', reason)
    }
    this.cancellation = this.cancelInFlight([...this.inFlight])
    return true
  }

  emergencyStop(reason: string = 'Emergency stop'): boolean {
    return this.activateKillSwitch(reason)
  }

  clearKillSwitch(): boolean {
    const cleared = this.killSwitch.clear()
    if (cleared) logger.info('Kill switch cleared')
    return cleared
  }

  isHalted(): boolean {
    return this.killSwitch.isActive
  }

  private async cancelInFlight(orderIds: string[]): Promise<void> {
    if (!this.broker.cancelOrder || orderIds.length === 0) return

    const results = await Promise.allSettled(orderIds.map((id) => this.broker.cancelOrder?.(id)))
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        errorHandler.handle(
          r.reason,
          { module: 'lib/trading', function: 'cancelInFlight', extra: { orderId: orderIds[i] } },
          ErrorCode.BROKER_ERROR,
        )
      }
    })
    logger.info(`Cancel requested for ${orderIds.length} in-flight order(s)`)
  }

  /**
   * Pausing blocks new orders at gate 1 without tripping the kill switch
   */
  pause(): void {
    if (this.paused) return
    this.paused = true
    logger.stop('Pipeline paused')
  }

  resume(): void {
    if (!this.paused) return
    this.paused = false
    logger.start('Pipeline resumed')
  }

  private checkHalted(): string | null {
    const ks = this.killSwitch.getState()
    if (ks.active) return `Kill switch active: ${ks.reason ?? 'no reason given'}`
    if (this.paused) return 'paused'
    return null
  }

  // ============================================================
  // Positions & risk feedback
  // ============================================================

  /**
   * A position was reduced outside the pipeline (exit fill, stop).
   * Equity follows `equity` when given, otherwise moves by `pnl`.
   */
  recordTradeClose(symbol: string, quantity: number, pnl: number, equity?: number): void {
    const now = this.clock()
    const applied = this.book.reduce(symbol, quantity)
    this.book.setEquity(equity ?? this.book.getEquity() + pnl)
    this.risk.recordTradeClose?.({ symbol, pnl, equity: this.book.getEquity(), closed: applied.closed }, now)
    logger.trade(`Closed ${quantity} ${symbol}, pnl ${pnl}`)
  }

  /** Signed filled quantity; long > 0 */
  getPositionQuantity(symbol: string): number {
    return this.book.getQuantity(symbol)
  }

  updateMarkPrice(symbol: string, price: number): void {
    if (!Number.isFinite(price) || price <= 0) {
      throw new TradingError({
        code: ErrorCode.VALIDATION_RANGE,
        message: `Mark price for ${symbol} must be a positive number (value: ${price})`,
        context: { module: 'lib/trading', function: 'updateMarkPrice' },
      })
    }
    this.book.setMarkPrice(symbol, price)
  }

  resetDaily(): void {
    this.risk.resetDaily?.(this.clock())
  }

  // ============================================================
  // Events & inspection
  // ============================================================

  onOrderStateChanged(listener: OrderStateListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  getOrder(orderId: string): OrderRecord | null {
    const record = this.orders.get(orderId)
    return record ? this.copyRecord(record) : null
  }

  getStatus(): PipelineStatus {
    const orders: Partial<Record<OrderState, number>> = {}
    for (const record of this.orders.values()) {
      orders[record.state] = (orders[record.state] ?? 0) + 1
    }
    return {
      killSwitch: this.killSwitch.getState(),
      paused: this.paused,
      pendingApprovals: this.approvals.size,
      inFlight: this.inFlight.size,
      recentOrders: this.recentOrders.size,
      equity: this.book.getEquity(),
      positions: this.book.snapshot(),
      risk: this.risk.canTrade(this.clock(), this.pendingTrades()),
      orders,
    }
  }

  /** Resolves once queued gate work and broker cancellations have settled */
  async whenIdle(): Promise<void> {
    await this.lock.idle()
    await this.cancellation
  }

  // ============================================================
  // Internals
  // ============================================================

  /**
   * Orders waiting for approval or for the broker. Each will be a trade if
   * it fills; those on a flat symbol would also open a position.
   */
  private pendingTrades(): PendingTrades {
    const ids = [...this.approvals.list().map((p) => p.orderId), ...this.inFlight]
    const opening = new Set<string>()
    for (const id of ids) {
      const record = this.orders.get(id)
      if (record && this.book.getQuantity(record.request.symbol) === 0) opening.add(record.request.symbol)
    }
    return { trades: ids.length, openings: opening.size }
  }

  private createRecord(order: OrderRequest): OrderRecord {
    const now = this.clock()
    const record: OrderRecord = {
      id: `ord-${++this.sequence}`,
      request: order,
      state: 'created',
      createdAt: now,
      updatedAt: now,
      transitions: [],
    }
    this.orders.set(record.id, record)
    this.pruneHistory()
    this.transition(record, 'created', {}, null)
    return record
  }

  private reject(record: OrderRecord, gate: GateName, reason: RejectionReason, message: string): EntryOutcome {
    this.transition(record, 'rejected', { gate, reason, message })
    this.telemetry?.({
      stage: 'pipeline',
      reason,
      symbol: typeof record.request.symbol === 'string' ? record.request.symbol : undefined,
      timestamp: this.clock(),
      detail: { orderId: record.id, gate, message },
    })
    logger.warn(`Order ${record.id} rejected at ${gate} (${reason}): ${message}`)
    return { kind: 'done', result: { status: 'rejected', orderId: record.id, gate, reason, message } }
  }

  private transition(
    record: OrderRecord,
    to: OrderState,
    detail: TransitionDetail,
    from: OrderState | null = record.state,
  ): void {
    const at = this.clock()
    record.transitions.push({ from, to, at, ...detail })
    record.state = to
    record.updatedAt = at

    const event: OrderStateEvent = {
      orderId: record.id,
      symbol: record.request.symbol,
      from,
      to,
      timestamp: at,
      ...detail,
    }
    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (e) {
        logger.error('Order state listener error:', e)
      }
    }
  }

  /** Forget the oldest finished orders beyond maxOrderHistory */
  private pruneHistory(): void {
    if (this.orders.size <= this.config.maxOrderHistory) return
    for (const [id, record] of this.orders) {
      if (this.orders.size <= this.config.maxOrderHistory) break
      if (!TERMINAL_ORDER_STATES.has(record.state)) continue
      this.orders.delete(id)
      this.dedupHolds.delete(id)
    }
  }

  private copyRecord(record: OrderRecord): OrderRecord {
    return { ...record, transitions: record.transitions.map((t) => ({ ...t })) }
  }
}
