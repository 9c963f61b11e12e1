/**
 * Portfolio ledger for a single base/quote pair
 * Holds balances and every order ever created; execution clients are its only writers
 */

import { Order, createOrder, withStatus } from './Order';
import { InvalidOrderError, OrderNotCancellableError, OrderNotFoundError } from '../utils/TradingErrors';

export interface LedgerInit {
  base: string;
  totalBase?: number;
  totalQuote?: number;
}

export interface LedgerSnapshot {
  base: string;
  totalBase: number;
  totalQuote: number;
  numberOfTransactions: number;
  orders: Order[];
  filledOrderIds: string[];
  cancelledOrderIds: string[];
}

/**
 * Read-only view handed to strategies, recorders and persistence
 */
export interface ReadonlyLedger {
  readonly base: string;
  readonly totalBase: number;
  readonly totalQuote: number;
  readonly quoteAvailable: number;
  readonly baseAvailable: number;
  readonly buyOrders: readonly Order[];
  readonly sellOrders: readonly Order[];
  readonly openOrders: readonly Order[];
  readonly filledOrders: readonly Order[];
  readonly cancelledOrders: readonly Order[];
  readonly orders: readonly Order[];
  readonly numberOfTransactions: number;
  totalValueInQuote(price: number): number;
  findOrder(orderId: string): Order | undefined;
  toSnapshot(): LedgerSnapshot;
}

const COMPONENT = 'Ledger';

export class Ledger implements ReadonlyLedger {
  readonly base: string;
  private _totalBase: number;
  private _totalQuote: number;
  private _numberOfTransactions: number = 0;

  // Insertion-ordered: the index doubles as the append-only order history
  private ordersById: Map<string, Order> = new Map();
  private buyOrderIds: Set<string> = new Set();
  private sellOrderIds: Set<string> = new Set();
  private filledOrderIds: string[] = [];
  private cancelledOrderIds: string[] = [];

  constructor(init: LedgerInit) {
    this.base = init.base;
    this._totalBase = init.totalBase ?? 0;
    this._totalQuote = init.totalQuote ?? 0;
  }

  get totalBase(): number {
    return this._totalBase;
  }

  get totalQuote(): number {
    return this._totalQuote;
  }

  get numberOfTransactions(): number {
    return this._numberOfTransactions;
  }

  get quoteAvailable(): number {
    return this._totalQuote - this.sumOnHold(this.buyOrderIds);
  }

  get baseAvailable(): number {
    return this._totalBase - this.sumOnHold(this.sellOrderIds);
  }

  get buyOrders(): Order[] {
    return this.resolve(this.buyOrderIds);
  }

  get sellOrders(): Order[] {
    return this.resolve(this.sellOrderIds);
  }

  get openOrders(): Order[] {
    return [...this.buyOrders, ...this.sellOrders];
  }

  get filledOrders(): Order[] {
    return this.resolve(this.filledOrderIds);
  }

  get cancelledOrders(): Order[] {
    return this.resolve(this.cancelledOrderIds);
  }

  get orders(): Order[] {
    return Array.from(this.ordersById.values());
  }

  totalValueInQuote(price: number): number {
    return this._totalQuote + this._totalBase * price;
  }

  findOrder(orderId: string): Order | undefined {
    return this.ordersById.get(orderId);
  }

  /**
   * Seeds an already-open order, reserving its onHold from the matching available balance
   */
  addOrder(order: Order): Order {
    this.assertInsertable(order, 'addOrder');
    if (order.status !== 'open') {
      throw new InvalidOrderError(`Only open orders can be seeded, got status: ${order.status}`, {
        operation: 'addOrder',
        component: COMPONENT,
        orderId: order.orderId
      });
    }

    const stored = createOrder(order);
    this.ordersById.set(stored.orderId, stored);
    this.openIdsFor(stored).add(stored.orderId);
    return stored;
  }

  /**
   * Marks an open order filled. The held amount leaves its total and `received`
   * (net of fees) is credited to the other side.
   * @internal reserved to execution clients
   */
  settleFill(orderId: string, received: number): Order {
    const order = this.requireOpen(orderId, 'settleFill');
    this.assertAmount(received, 'settleFill', orderId);

    let totalBase = this._totalBase;
    let totalQuote = this._totalQuote;
    if (order.side === 'buy') {
      totalQuote -= order.onHold;
      totalBase += received;
    } else {
      totalBase -= order.onHold;
      totalQuote += received;
    }

    const filled = withStatus(order, 'filled');
    this._totalBase = totalBase;
    this._totalQuote = totalQuote;
    this.ordersById.set(orderId, filled);
    this.openIdsFor(order).delete(orderId);
    this.filledOrderIds.push(orderId);
    this._numberOfTransactions += 1;
    return filled;
  }

  /**
   * Marks an open order cancelled, releasing its hold back into the available balance
   * @internal reserved to execution clients
   */
  settleCancel(orderId: string): Order {
    const order = this.ordersById.get(orderId);
    if (!order) {
      throw new OrderNotFoundError(`Order not found: ${orderId}`, {
        operation: 'settleCancel',
        component: COMPONENT,
        orderId
      });
    }
    if (order.status !== 'open') {
      throw new OrderNotCancellableError(`Cannot cancel order in status: ${order.status}`, {
        operation: 'settleCancel',
        component: COMPONENT,
        orderId
      });
    }

    const cancelled = withStatus(order, 'cancelled');
    this.ordersById.set(orderId, cancelled);
    this.openIdsFor(order).delete(orderId);
    this.cancelledOrderIds.push(orderId);
    return cancelled;
  }

  /**
   * Records an order that executed on placement, bypassing the open collections
   * @internal reserved to execution clients
   */
  recordMarketFill(order: Order, received: number): Order {
    this.assertInsertable(order, 'recordMarketFill');
    this.assertAmount(received, 'recordMarketFill', order.orderId);

    let totalBase = this._totalBase;
    let totalQuote = this._totalQuote;
    if (order.side === 'buy') {
      totalQuote -= order.onHold;
      totalBase += received;
    } else {
      totalBase -= order.onHold;
      totalQuote += received;
    }

    const filled = createOrder({ ...order, status: 'filled' });
    this._totalBase = totalBase;
    this._totalQuote = totalQuote;
    this.ordersById.set(filled.orderId, filled);
    this.filledOrderIds.push(filled.orderId);
    this._numberOfTransactions += 1;
    return filled;
  }

  toSnapshot(): LedgerSnapshot {
    return {
      base: this.base,
      totalBase: this._totalBase,
      totalQuote: this._totalQuote,
      numberOfTransactions: this._numberOfTransactions,
      orders: this.orders.map(order => ({ ...order })),
      filledOrderIds: [...this.filledOrderIds],
      cancelledOrderIds: [...this.cancelledOrderIds]
    };
  }

  static fromSnapshot(snapshot: LedgerSnapshot): Ledger {
    const ledger = new Ledger({
      base: snapshot.base,
      totalBase: snapshot.totalBase,
      totalQuote: snapshot.totalQuote
    });
    ledger._numberOfTransactions = snapshot.numberOfTransactions;

    for (const raw of snapshot.orders) {
      const order = createOrder(raw);
      ledger.ordersById.set(order.orderId, order);
      if (order.status === 'open') {
        ledger.openIdsFor(order).add(order.orderId);
      }
    }

    ledger.filledOrderIds = snapshot.filledOrderIds.filter(id => ledger.ordersById.get(id)?.status === 'filled');
    ledger.cancelledOrderIds = snapshot.cancelledOrderIds.filter(id => ledger.ordersById.get(id)?.status === 'cancelled');
    return ledger;
  }

  private openIdsFor(order: Order): Set<string> {
    return order.side === 'buy' ? this.buyOrderIds : this.sellOrderIds;
  }

  private resolve(ids: Iterable<string>): Order[] {
    const result: Order[] = [];
    for (const id of ids) {
      const order = this.ordersById.get(id);
      if (order) {
        result.push(order);
      }
    }
    return result;
  }

  private sumOnHold(ids: Set<string>): number {
    let total = 0;
    for (const id of ids) {
      total += this.ordersById.get(id)?.onHold ?? 0;
    }
    return total;
  }

  private requireOpen(orderId: string, operation: string): Order {
    const order = this.ordersById.get(orderId);
    if (!order) {
      throw new OrderNotFoundError(`Order not found: ${orderId}`, { operation, component: COMPONENT, orderId });
    }
    if (order.status !== 'open') {
      throw new InvalidOrderError(`Order ${orderId} is already ${order.status}`, { operation, component: COMPONENT, orderId });
    }
    return order;
  }

  private assertInsertable(order: Order, operation: string): void {
    const context = { operation, component: COMPONENT, orderId: order.orderId };

    if (this.ordersById.has(order.orderId)) {
      throw new InvalidOrderError(`Duplicate order id: ${order.orderId}`, context);
    }
    if (order.market !== this.base) {
      throw new InvalidOrderError(`Order market ${order.market} does not match ledger base ${this.base}`, context);
    }
    if (!Number.isFinite(order.onHold) || order.onHold <= 0) {
      throw new InvalidOrderError(`Order onHold must be a positive number, got: ${order.onHold}`, context);
    }
  }

  private assertAmount(amount: number, operation: string, orderId: string): void {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new InvalidOrderError(`Settlement amount must be a non-negative number, got: ${amount}`, {
        operation,
        component: COMPONENT,
        orderId
      });
    }
  }
}
