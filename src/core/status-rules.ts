/**
 * Status transition rules for Orders and Generations.
 *
 * Orders only advance PENDING → PROCESSING → {FULFILLED | FAILED | CANCELED};
 * a PENDING order may also fail or be canceled directly when creation aborts.
 * Generations advance STARTING → IN_PROGRESS → terminal, and terminal
 * statuses never change.
 */

import type { GenerationStatus, Order, OrderStatus } from './types.js'

const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  PENDING: ['PROCESSING', 'FAILED', 'CANCELED'],
  PROCESSING: ['FULFILLED', 'FAILED', 'CANCELED'],
  FULFILLED: [],
  FAILED: [],
  CANCELED: [],
}

const GENERATION_TRANSITIONS: Record<GenerationStatus, readonly GenerationStatus[]> = {
  STARTING: ['IN_PROGRESS', 'COMPLETED', 'FAILED', 'CANCELLED'],
  IN_PROGRESS: ['COMPLETED', 'FAILED', 'CANCELLED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
}

export function canTransitionOrder(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to)
}

export function canTransitionGeneration(from: GenerationStatus, to: GenerationStatus): boolean {
  return GENERATION_TRANSITIONS[from].includes(to)
}

export function isOrderTerminal(status: OrderStatus): boolean {
  return ORDER_TRANSITIONS[status].length === 0
}

export function isGenerationTerminal(status: GenerationStatus): boolean {
  return GENERATION_TRANSITIONS[status].length === 0
}

/** An order is active until it reaches a terminal status */
export function isOrderActive(order: Order): boolean {
  return order.status === 'PENDING' || order.status === 'PROCESSING'
}

export function canCancelOrder(order: Order): boolean {
  return isOrderActive(order)
}
