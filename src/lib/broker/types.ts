// ============================================================
// Broker Adapter Contract
// ============================================================

import type { OrderRequest } from '../trading/types'

/** Order as handed to the broker, tagged with the pipeline's order id */
export interface BrokerOrder extends OrderRequest {
  clientOrderId: string
}

export interface BrokerOrderResult {
  status: 'filled' | 'rejected' | 'error'
  fillPrice?: number
  brokerOrderId?: string
  message?: string
}

/**
 * Opaque, possibly slow or failing execution venue.
 * The pipeline never retries a call.
 */
export interface BrokerAdapter {
  readonly name: string
  placeOrder(order: BrokerOrder): Promise<BrokerOrderResult>
  /** Cancel an order the pipeline still considers in flight */
  cancelOrder?(clientOrderId: string): Promise<void>
}
