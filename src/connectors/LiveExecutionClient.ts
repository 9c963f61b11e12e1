/**
 * Live execution client
 * Forwards orders to an exchange connector and mirrors accepted orders into the ledger
 */

import { IExecutionClient } from './ExecutionClient';
import { IExchangeConnector, PlaceOrderParams, RemoteOrder } from './ExchangeConnector';
import { Order, OrderSide, createOrder } from '../models/Order';
import { CandlePrices } from '../models/Candle';
import { Ledger, ReadonlyLedger } from '../models/Ledger';
import { AuditService } from '../services/AuditService';
import {
  ApplicationError,
  ErrorCategory,
  ErrorSeverity,
  InsufficientBalanceError,
  InvalidOrderError,
  OrderNotCancellableError,
  OrderNotFoundError,
  toApplicationError
} from '../utils/TradingErrors';

const COMPONENT = 'LiveExecutionClient';

export class LiveExecutionClient implements IExecutionClient {
  readonly kind = 'live' as const;
  private readonly ledger: Ledger;
  private readonly connector: IExchangeConnector;
  private readonly auditService?: AuditService;
  private currentCandle?: CandlePrices;

  constructor(ledger: Ledger, connector: IExchangeConnector, auditService?: AuditService) {
    this.ledger = ledger;
    this.connector = connector;
    this.auditService = auditService;
  }

  get state(): ReadonlyLedger {
    return this.ledger;
  }

  // Live fills come from the exchange; the candle is kept for strategies that read it
  setCurrentCandle(candle: CandlePrices): void {
    this.currentCandle = { ...candle };
  }

  get candle(): CandlePrices | undefined {
    return this.currentCandle;
  }

  async placeLimitBuyOrder(base: string, limitPrice: number, amountInQuote: number): Promise<Order> {
    return this.placeLimitOrder('buy', base, limitPrice, amountInQuote);
  }

  async placeLimitSellOrder(base: string, limitPrice: number, amountInBase: number): Promise<Order> {
    return this.placeLimitOrder('sell', base, limitPrice, amountInBase);
  }

  async placeMarketBuyOrder(base: string, amountInQuote: number): Promise<Order> {
    return this.placeMarketOrder('buy', base, amountInQuote);
  }

  async placeMarketSellOrder(base: string, amountInBase: number): Promise<Order> {
    return this.placeMarketOrder('sell', base, amountInBase);
  }

  async cancelOrder(order: Order): Promise<Order> {
    const stored = this.requireStored(order.orderId, 'cancelOrder');
    if (stored.status !== 'open') {
      throw new OrderNotCancellableError(`Cannot cancel order in status: ${stored.status}`, {
        operation: 'cancelOrder',
        component: COMPONENT,
        orderId: stored.orderId
      });
    }

    const cancelled = await this.callExchange(() => this.connector.cancelOrder(stored.orderId), 'cancelOrder', stored.orderId);
    if (!cancelled) {
      throw new OrderNotCancellableError(`Exchange refused to cancel order ${stored.orderId}`, {
        operation: 'cancelOrder',
        component: COMPONENT,
        orderId: stored.orderId
      });
    }

    const result = this.ledger.settleCancel(stored.orderId);
    this.auditService?.logEvent('ORDER_CANCELLED', { orderId: result.orderId, released: result.onHold }, undefined, this.connector.connectorId);
    return result;
  }

  async getOrderInfo(order: Order): Promise<Order> {
    return this.requireStored(order.orderId, 'getOrderInfo');
  }

  /**
   * Polls every open order and settles the ones the exchange reports as filled or cancelled
   */
  async updateState(): Promise<Order[]> {
    const settled: Order[] = [];

    for (const order of this.ledger.openOrders) {
      const remote = await this.callExchange(() => this.connector.getOrder(order.orderId), 'updateState', order.orderId);
      if (!remote || remote.status === 'open') {
        continue;
      }

      // The ledger may have moved on while the request was in flight
      if (this.ledger.findOrder(order.orderId)?.status !== 'open') {
        continue;
      }

      if (remote.status === 'filled') {
        const filled = this.ledger.settleFill(order.orderId, this.requireReceived(remote, 'updateState'));
        this.auditService?.logEvent('ORDER_FILLED', { orderId: filled.orderId, received: remote.received }, undefined, this.connector.connectorId);
        settled.push(filled);
      } else {
        const cancelled = this.ledger.settleCancel(order.orderId);
        this.auditService?.logEvent('ORDER_CANCELLED', { orderId: cancelled.orderId, remote: true }, undefined, this.connector.connectorId);
        settled.push(cancelled);
      }
    }

    return settled;
  }

  private async placeLimitOrder(side: OrderSide, base: string, limitPrice: number, amount: number): Promise<Order> {
    const operation = side === 'buy' ? 'placeLimitBuyOrder' : 'placeLimitSellOrder';
    this.assertOrderInput(operation, base, amount);
    if (!(limitPrice > 0)) {
      throw new InsufficientBalanceError(`Limit price must be positive, got: ${limitPrice}`, { operation, component: COMPONENT });
    }
    this.assertAvailable(operation, side, amount);

    const params: PlaceOrderParams = { market: base, side, orderType: 'limit', amount, limitPrice };
    const remote = await this.callExchange(() => this.connector.placeOrder(params), operation);

    // Another call may have reserved the balance while this one was in flight
    try {
      this.assertAvailable(operation, side, amount);
    } catch (error) {
      await this.callExchange(() => this.connector.cancelOrder(remote.orderId), operation, remote.orderId);
      throw error;
    }
    const order = this.ledger.addOrder(createOrder({
      orderId: remote.orderId,
      exchange: this.connector.connectorId,
      market: base,
      side,
      limitPrice,
      onHold: amount,
      status: 'open',
      timeCreated: remote.timestamp.getTime(),
      isTaker: false
    }));

    this.auditService?.logEvent('ORDER_PLACED', { orderId: order.orderId, type: 'limit', side, limitPrice, onHold: amount }, undefined, this.connector.connectorId);
    return order;
  }

  private async placeMarketOrder(side: OrderSide, base: string, amount: number): Promise<Order> {
    const operation = side === 'buy' ? 'placeMarketBuyOrder' : 'placeMarketSellOrder';
    this.assertOrderInput(operation, base, amount);
    this.assertAvailable(operation, side, amount);

    const params: PlaceOrderParams = { market: base, side, orderType: 'market', amount };
    const remote = await this.callExchange(() => this.connector.placeOrder(params), operation);
    const received = this.requireReceived(remote, operation);

    // Already executed remotely: record it as the exchange reports it
    const filled = this.ledger.recordMarketFill(createOrder({
      orderId: remote.orderId,
      exchange: this.connector.connectorId,
      market: base,
      side,
      onHold: amount,
      status: 'filled',
      timeCreated: remote.timestamp.getTime(),
      isTaker: true
    }), received);

    this.auditService?.logEvent('ORDER_FILLED', { orderId: filled.orderId, type: 'market', side, amount, received }, undefined, this.connector.connectorId);
    return filled;
  }

  private async callExchange<T>(call: () => Promise<T>, operation: string, orderId?: string): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw toApplicationError(error, { operation, component: COMPONENT, orderId });
    }
  }

  private requireReceived(remote: RemoteOrder, operation: string): number {
    if (remote.status !== 'filled' || remote.received === undefined) {
      throw new ApplicationError(
        `Exchange did not report a fill for order ${remote.orderId}`,
        'EXTERNAL_SERVICE_ERROR',
        ErrorCategory.EXTERNAL_SERVICE,
        ErrorSeverity.HIGH,
        { operation, component: COMPONENT, orderId: remote.orderId, timestamp: new Date() },
        { isRetryable: false }
      );
    }
    return remote.received;
  }

  private requireStored(orderId: string, operation: string): Order {
    const stored = this.ledger.findOrder(orderId);
    if (!stored) {
      throw new OrderNotFoundError(`Order not found: ${orderId}`, { operation, component: COMPONENT, orderId });
    }
    return stored;
  }

  private assertOrderInput(operation: string, base: string, amount: number): void {
    if (base !== this.ledger.base) {
      throw new InvalidOrderError(`Ledger trades ${this.ledger.base}, not ${base}`, { operation, component: COMPONENT });
    }
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new InvalidOrderError(`Order amount must be a positive number, got: ${amount}`, { operation, component: COMPONENT });
    }
  }

  private assertAvailable(operation: string, side: OrderSide, amount: number): void {
    const available = side === 'buy' ? this.ledger.quoteAvailable : this.ledger.baseAvailable;
    if (amount > available) {
      throw new InsufficientBalanceError(
        `Insufficient ${side === 'buy' ? 'quote' : 'base'} balance: requested ${amount}, available ${available}`,
        { operation, component: COMPONENT, metadata: { requested: amount, available } }
      );
    }
  }
}
