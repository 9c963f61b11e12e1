/**
 * Order data model
 */

export type OrderStatus = 'open' | 'filled' | 'cancelled';
export type OrderSide = 'buy' | 'sell';

/**
 * Immutable order record. A status change stores a new record under the same
 * orderId; onHold and every other field stay as they were at creation.
 */
export interface Order {
  readonly orderId: string;
  readonly exchange: string;
  readonly market: string;
  readonly side: OrderSide;
  /** Absent for market orders */
  readonly limitPrice?: number;
  /** Quote reserved by a buy, base reserved by a sell */
  readonly onHold: number;
  readonly status: OrderStatus;
  /** Epoch milliseconds */
  readonly timeCreated: number;
  readonly isTaker: boolean;
}

export function isLimitOrder(order: Order): boolean {
  return order.limitPrice !== undefined;
}

export function isOpen(order: Order): boolean {
  return order.status === 'open';
}

export function withStatus(order: Order, status: OrderStatus): Order {
  return Object.freeze({ ...order, status });
}

export function createOrder(fields: Order): Order {
  return Object.freeze({ ...fields });
}
