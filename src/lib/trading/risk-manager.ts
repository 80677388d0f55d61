// ============================================================
// Risk Manager
// ============================================================
// Daily counters, loss streak cooldown and equity drawdown behind the
// synchronous canTrade() check used by the pre-trade risk gate.
// Counters belong to one UTC day and reset when the day changes.
// ============================================================

import { loggers } from '../logger';
import { NO_PENDING_TRADES } from './types';
import type { FillEvent, PendingTrades, RiskCheckResult, RiskChecker, RiskReason, TradeCloseEvent } from './types';

const logger = loggers.risk;

export interface RiskLimits {
  maxDailyTrades: number;
  /** absolute currency amount; reached counts as breached */
  maxDailyLoss: number;
  maxOpenPositions: number;
  /** loss streak that starts the cooldown */
  maxConsecutiveLosses: number;
  lossCooldownMs: number;
  /** % below peak equity */
  maxDrawdownPercent: number;
}

export const DEFAULT_RISK_LIMITS: RiskLimits = {
  maxDailyTrades: 20,
  maxDailyLoss: 500,
  maxOpenPositions: 5,
  maxConsecutiveLosses: 5,
  lossCooldownMs: 15 * 60 * 1000,
  maxDrawdownPercent: 10,
};

export interface RiskState {
  dayKey: string;
  dailyTradeCount: number;
  dailyRealizedPnl: number;
  /** max(0, -dailyRealizedPnl) */
  dailyRealizedLoss: number;
  openPositionCount: number;
  consecutiveLossStreak: number;
  cooldownUntil: number | null;
  equity: number;
  peakEquity: number;
  currentDrawdownPercent: number;
}

export interface RiskManagerOptions {
  limits?: Partial<RiskLimits>;
  initialEquity?: number;
  now?: number;
}

export const DEFAULT_INITIAL_EQUITY = 10_000;

/**
 * UTC calendar day of a timestamp, e.g. '2024-01-31'
 */
export function utcDayKey(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 10);
}

export class RiskManager implements RiskChecker {
  private limits: RiskLimits;
  private state: RiskState;

  constructor(options: RiskManagerOptions = {}) {
    this.limits = { ...DEFAULT_RISK_LIMITS, ...options.limits };
    const equity = options.initialEquity ?? DEFAULT_INITIAL_EQUITY;
    this.state = {
      dayKey: utcDayKey(options.now ?? Date.now()),
      dailyTradeCount: 0,
      dailyRealizedPnl: 0,
      dailyRealizedLoss: 0,
      openPositionCount: 0,
      consecutiveLossStreak: 0,
      cooldownUntil: null,
      equity,
      peakEquity: equity,
      currentDrawdownPercent: 0,
    };
  }

  // ============================================================
  // Gate check
  // ============================================================

  /**
   * Every breached limit, not just the first one. `pending` orders count
   * against the trade and open position limits as if already filled.
   */
  canTrade(now: number, pending: PendingTrades = NO_PENDING_TRADES): RiskCheckResult {
    this.rollover(now);
    const s = this.state;
    const l = this.limits;
    const reasons: RiskReason[] = [];
    const trades = s.dailyTradeCount + pending.trades;
    const open = s.openPositionCount + pending.openings;

    if (trades >= l.maxDailyTrades) {
      reasons.push({ code: 'daily_trades', message: `Daily trade limit reached (${trades}/${l.maxDailyTrades})` });
    }

    if (s.dailyRealizedLoss >= l.maxDailyLoss) {
      reasons.push({ code: 'daily_loss', message: `Daily loss limit reached (${s.dailyRealizedLoss} >= ${l.maxDailyLoss})` });
    }

    if (open >= l.maxOpenPositions) {
      reasons.push({ code: 'open_positions', message: `Open position limit reached (${open}/${l.maxOpenPositions})` });
    }

    if (s.cooldownUntil !== null && now < s.cooldownUntil) {
      reasons.push({ code: 'cooldown', message: `Loss cooldown active (${s.cooldownUntil - now}ms remaining)` });
    }

    if (s.currentDrawdownPercent >= l.maxDrawdownPercent) {
      reasons.push({
        code: 'drawdown',
        message: `Max drawdown reached (${s.currentDrawdownPercent.toFixed(1)}% >= ${l.maxDrawdownPercent}%)`,
      });
    }

    return { allowed: reasons.length === 0, reasons };
  }

  // ============================================================
  // State updates
  // ============================================================

  recordFill(fill: FillEvent, now: number): void {
    this.rollover(now);
    this.state.dailyTradeCount++;
    if (fill.opened) this.state.openPositionCount++;
    if (fill.closed) this.state.openPositionCount = Math.max(0, this.state.openPositionCount - 1);
  }

  /**
   * Realized result of a closed trade. Equity follows `close.equity` when
   * given, otherwise it moves by the pnl.
   */
  recordTradeClose(close: TradeCloseEvent, now: number): void {
    this.rollover(now);
    const s = this.state;
    const { pnl } = close;

    s.dailyRealizedPnl += pnl;
    s.dailyRealizedLoss = Math.max(0, -s.dailyRealizedPnl);

    if (pnl < 0) {
      s.consecutiveLossStreak++;
      if (s.consecutiveLossStreak >= this.limits.maxConsecutiveLosses) {
        s.cooldownUntil = now + this.limits.lossCooldownMs;
        s.consecutiveLossStreak = 0;
        logger.warn(`${this.limits.maxConsecutiveLosses} consecutive losses, cooling down until ${new Date(s.cooldownUntil).toISOString()}`);
      }
    } else if (pnl > 0) {
      s.consecutiveLossStreak = 0;
    }

    if (close.closed) s.openPositionCount = Math.max(0, s.openPositionCount - 1);
    this.updateEquity(close.equity ?? s.equity + pnl);
  }

  updateEquity(equity: number): void {
    const s = this.state;
    s.equity = equity;
    if (equity > s.peakEquity) s.peakEquity = equity;
    s.currentDrawdownPercent = s.peakEquity > 0 ? ((s.peakEquity - equity) / s.peakEquity) * 100 : 0;
  }

  /**
   * Start a new day's counters; open positions and equity carry over
   */
  resetDaily(now: number): void {
    const s = this.state;
    s.dayKey = utcDayKey(now);
    s.dailyTradeCount = 0;
    s.dailyRealizedPnl = 0;
    s.dailyRealizedLoss = 0;
    s.consecutiveLossStreak = 0;
    s.cooldownUntil = null;
    logger.info(`Daily risk counters reset (${s.dayKey})`);
  }

  private rollover(now: number): void {
    if (utcDayKey(now) !== this.state.dayKey) {
      this.resetDaily(now);
    }
  }

  getState(): Readonly<RiskState> {
    return { ...this.state };
  }

  getLimits(): Readonly<RiskLimits> {
    return { ...this.limits };
  }

  updateLimits(updates: Partial<RiskLimits>): void {
    this.limits = { ...this.limits, ...updates };
    logger.info('Risk limits updated');
  }
}
