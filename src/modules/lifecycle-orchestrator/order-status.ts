/**
 * Order status aggregation.
 *
 * An order's terminal status is a pure function of its generations' statuses.
 */

import { isGenerationTerminal } from '../../core/status-rules.js'
import type { Generation, OrderStatus } from '../../core/types.js'

export type TerminalOrderStatus = Extract<OrderStatus, 'FULFILLED' | 'FAILED' | 'CANCELED'>

/**
 * Derive the terminal status an order should take from its generations.
 *
 * Returns null while any generation is still running (or when there are none).
 * Otherwise: any COMPLETED → FULFILLED; else any FAILED → FAILED; else CANCELED.
 */
export function deriveOrderStatus(generations: readonly Generation[]): TerminalOrderStatus | null {
  if (generations.length === 0) return null
  if (generations.some((generation) => !isGenerationTerminal(generation.status))) return null
  if (generations.some((generation) => generation.status === 'COMPLETED')) return 'FULFILLED'
  if (generations.some((generation) => generation.status === 'FAILED')) return 'FAILED'
  return 'CANCELED'
}

/** The error reported on order.failed: the first failed generation's message */
export function summarizeFailure(generations: readonly Generation[]): string {
  const failed = generations.find((generation) => generation.status === 'FAILED' && generation.error !== null)
  return failed?.error ?? 'All generations failed'
}
