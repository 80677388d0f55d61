// ============================================================
// Telemetry Hub
// ============================================================
// Receives one event per gate rejection and per regime evaluation issue.
// Keeps counters and a bounded recent-event buffer; listeners get every
// event as it happens.
// ============================================================

import { createLogger } from '../logger'

const logger = createLogger('Telemetry')

export type TelemetryStage = 'indicator' | 'regime' | 'signal' | 'pipeline' | 'broker' | 'analysis'

export interface TelemetryEvent {
  stage: TelemetryStage
  reason: string
  symbol?: string
  timestamp: number
  detail?: Record<string, unknown>
}

/** Anything that accepts telemetry events */
export type TelemetrySink = (event: TelemetryEvent) => void

export type TelemetryListener = (event: TelemetryEvent) => void

export interface TelemetryCounters {
  total: number
  byStage: Record<string, number>
  /** keyed `${stage}:${reason}` */
  byReason: Record<string, number>
}

export class TelemetryHub {
  private recent: TelemetryEvent[] = []
  private listeners: TelemetryListener[] = []
  private counters: TelemetryCounters = { total: 0, byStage: {}, byReason: {} }

  constructor(private readonly maxRecent: number = 200) {}

  /** Bound sink, safe to hand to components */
  readonly sink: TelemetrySink = (event) => this.emit(event)

  emit(event: TelemetryEvent): void {
    this.counters.total++
    this.counters.byStage[event.stage] = (this.counters.byStage[event.stage] ?? 0) + 1
    const reasonKey = `${event.stage}:${event.reason}`
    this.counters.byReason[reasonKey] = (this.counters.byReason[reasonKey] ?? 0) + 1

    this.recent.push(event)
    if (this.recent.length > this.maxRecent) {
      this.recent.shift()
    }

    for (const listener of this.listeners) {
      try {
        listener(event)
      } catch (e) {
        logger.error('Listener error:', e)
      }
    }
  }

  /**
   * @returns unsubscribe function
   */
  subscribe(listener: TelemetryListener): () => void {
    this.listeners.push(listener)
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener)
    }
  }

  getRecent(limit?: number): TelemetryEvent[] {
    return limit ? this.recent.slice(-limit) : [...this.recent]
  }

  getCounters(): TelemetryCounters {
    return {
      total: this.counters.total,
      byStage: { ...this.counters.byStage },
      byReason: { ...this.counters.byReason },
    }
  }

  count(stage: TelemetryStage, reason?: string): number {
    if (reason === undefined) return this.counters.byStage[stage] ?? 0
    return this.counters.byReason[`${stage}:${reason}`] ?? 0
  }

  reset(): void {
    this.recent = []
    this.counters = { total: 0, byStage: {}, byReason: {} }
  }
}

/** Sink that drops everything */
export const noopTelemetry: TelemetrySink = () => {}
