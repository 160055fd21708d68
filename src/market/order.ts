/**
 * Order construction.
 */

import type { Order, OrderSide } from '../types/domain.js';
import { SimulationError, invalidSide } from '../types/errors.js';
import type { IdGenerator } from '../utils/hash.js';

export interface OrderParams {
  ownerId: string;
  side: OrderSide;
  price: number;
  size: number;
}

/**
 * Reject sides that slipped past the type system (JSON input, casts).
 */
export function assertSide(side: OrderSide): OrderSide {
  switch (side) {
    case 'bid':
    case 'ask':
      return side;
    default:
      return invalidSide(side);
  }
}

/**
 * Create an order with a freshly generated id.
 */
export function createOrder(params: OrderParams, generateId: IdGenerator): Order {
  assertSide(params.side);

  if (!Number.isFinite(params.price)) {
    throw new SimulationError('INVALID_ORDER', `Order price must be finite, got ${params.price}`);
  }
  if (!Number.isFinite(params.size) || params.size <= 0) {
    throw new SimulationError('INVALID_ORDER', `Order size must be positive, got ${params.size}`);
  }

  return {
    id: generateId(),
    ownerId: params.ownerId,
    side: params.side,
    price: params.price,
    size: params.size,
  };
}

/**
 * Copy of a resting order with its remaining size reduced by a fill.
 */
export function reduceOrder(order: Order, filled: number): Order {
  const size = order.size - filled;
  if (!(size > 0)) {
    throw new SimulationError(
      'INVALID_ORDER',
      `Fill of ${filled} would exhaust order ${order.id} of size ${order.size}`
    );
  }
  return { ...order, size };
}

export function formatOrder(order: Order): string {
  return `${order.price.toFixed(3)} (${order.size} lots)`;
}
