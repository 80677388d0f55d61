// ============================================================
// Control Handlers
// ============================================================
// Route logic for the control server as plain functions, so it can be
// exercised without an HTTP stack. Each returns { status, body }.
// ============================================================

import { ErrorCode, errorHandler } from '../lib/errors'
import type { ErrorHandler, Result, TradingError } from '../lib/errors'
import type { ExecutionPipeline } from '../lib/trading/execution-pipeline'
import type { SubmitResult } from '../lib/trading/types'

export interface HandlerResponse {
  status: number
  body: Record<string, unknown>
}

export interface ControlHandlers {
  status(): HandlerResponse
  pendingOrders(): HandlerResponse
  approve(orderId: string): Promise<HandlerResponse>
  deny(orderId: string): Promise<HandlerResponse>
  activateKillSwitch(body: unknown): HandlerResponse
  clearKillSwitch(): HandlerResponse
  errors(limit: unknown): HandlerResponse
}

export const DEFAULT_ERROR_LIMIT = 20

const ERROR_STATUS: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.ORDER_NOT_FOUND]: 404,
  [ErrorCode.ORDER_INVALID_STATE]: 409,
  [ErrorCode.VALIDATION_REQUIRED]: 400,
  [ErrorCode.VALIDATION_TYPE]: 400,
}

export function errorResponse(error: TradingError): HandlerResponse {
  return {
    status: ERROR_STATUS[error.code] ?? 500,
    body: { success: false, code: error.code, message: error.message },
  }
}

function decisionResponse(orderId: string, result: Result<SubmitResult>): HandlerResponse {
  if (!result.success) return errorResponse(result.error)
  return { status: 200, body: { success: true, orderId, result: result.data } }
}

/**
 * Refusal for a browser request from an origin not on the list.
 * Requests without an Origin header (curl, scripts) pass.
 */
export function checkOrigin(origin: string | undefined, allowedOrigins: readonly string[]): HandlerResponse | null {
  if (origin === undefined || allowedOrigins.includes(origin)) return null
  return { status: 403, body: { success: false, message: `Origin ${origin} is not allowed` } }
}

function readLimit(raw: unknown): number {
  const limit = typeof raw === 'string' ? Number(raw) : NaN
  return Number.isInteger(limit) && limit > 0 ? limit : DEFAULT_ERROR_LIMIT
}

function readReason(body: unknown): string | undefined {
  if (typeof body !== 'object' || body === null || !('reason' in body)) return undefined
  const reason = body.reason
  return typeof reason === 'string' && reason.trim() !== '' ? reason.trim() : undefined
}

export function createControlHandlers(
  pipeline: ExecutionPipeline,
  errors: ErrorHandler = errorHandler,
): ControlHandlers {
  return {
    status() {
      return { status: 200, body: { success: true, ...pipeline.getStatus() } }
    },

    pendingOrders() {
      const orders = pipeline.getPendingApprovals()
      return { status: 200, body: { success: true, count: orders.length, orders } }
    },

    async approve(orderId) {
      return decisionResponse(orderId, await pipeline.approve(orderId))
    },

    async deny(orderId) {
      return decisionResponse(orderId, await pipeline.deny(orderId))
    },

    activateKillSwitch(body) {
      const activated = pipeline.emergencyStop(readReason(body))
      return { status: 200, body: { success: true, activated, killSwitch: pipeline.getStatus().killSwitch } }
    },

    clearKillSwitch() {
      const cleared = pipeline.clearKillSwitch()
      return { status: 200, body: { success: true, cleared, killSwitch: pipeline.getStatus().killSwitch } }
    },

    errors(limit) {
      return { status: 200, body: { success: true, stats: errors.getStats(), recent: errors.getHistory(readLimit(limit)) } }
    },
  }
}
