/**
 * Simulated execution client
 * Deterministic in-memory fill engine that settles limit orders against OHLC candles
 */

import { randomUUID } from 'crypto';
import { IExecutionClient } from './ExecutionClient';
import { Order, OrderSide, createOrder } from '../models/Order';
import { CandlePrices } from '../models/Candle';
import { Ledger, ReadonlyLedger } from '../models/Ledger';
import { AuditService } from '../services/AuditService';
import {
  InsufficientBalanceError,
  InvalidOrderError,
  MissingCandleError,
  OrderNotFoundError
} from '../utils/TradingErrors';

export const SIMULATED_EXCHANGE = 'backtest';

export interface SimulatedExecutionConfig {
  /** Fee rate charged on maker fills, deducted from the acquired asset */
  feeLimitOrder: number;
  /** Fee rate charged on taker fills, deducted from the acquired asset */
  feeMarketOrder: number;
  auditService?: AuditService;
}

const COMPONENT = 'SimulatedExecutionClient';

export class SimulatedExecutionClient implements IExecutionClient {
  readonly kind = 'simulated' as const;
  private readonly ledger: Ledger;
  private readonly config: SimulatedExecutionConfig;
  private currentCandle?: CandlePrices;

  constructor(ledger: Ledger, config: SimulatedExecutionConfig) {
    if (config.feeLimitOrder < 0 || config.feeLimitOrder >= 1 || config.feeMarketOrder < 0 || config.feeMarketOrder >= 1) {
      throw new InvalidOrderError('Fee rates must lie in [0, 1)', {
        operation: 'constructor',
        component: COMPONENT,
        metadata: { feeLimitOrder: config.feeLimitOrder, feeMarketOrder: config.feeMarketOrder }
      });
    }
    this.ledger = ledger;
    this.config = config;
  }

  get state(): ReadonlyLedger {
    return this.ledger;
  }

  get candle(): CandlePrices | undefined {
    return this.currentCandle;
  }

  setCurrentCandle(candle: CandlePrices): void {
    this.currentCandle = { ...candle };
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
    const cancelled = this.ledger.settleCancel(order.orderId);
    this.config.auditService?.logEvent('ORDER_CANCELLED', {
      orderId: cancelled.orderId,
      side: cancelled.side,
      released: cancelled.onHold
    }, undefined, SIMULATED_EXCHANGE);
    return cancelled;
  }

  async getOrderInfo(order: Order): Promise<Order> {
    const stored = this.ledger.findOrder(order.orderId);
    if (!stored) {
      throw new OrderNotFoundError(`Order not found: ${order.orderId}`, {
        operation: 'getOrderInfo',
        component: COMPONENT,
        orderId: order.orderId
      });
    }
    return stored;
  }

  /**
   * Fills every open order the current candle crosses: buys when low <= limit,
   * sells when high >= limit. Evaluated oldest first; ties keep placement order.
   */
  async updateState(): Promise<Order[]> {
    const candle = this.currentCandle;
    if (!candle) {
      return [];
    }

    // ledger.orders is in placement order across both sides
    const open = this.ledger.orders
      .map((order, index) => ({ order, index }))
      .filter(entry => entry.order.status === 'open')
      .sort((a, b) => a.order.timeCreated - b.order.timeCreated || a.index - b.index)
      .map(entry => entry.order);

    const filled: Order[] = [];
    for (const order of open) {
      const limitPrice = order.limitPrice;
      if (limitPrice === undefined) {
        continue;
      }

      const crosses = order.side === 'buy' ? candle.low <= limitPrice : candle.high >= limitPrice;
      if (!crosses) {
        continue;
      }

      const received = this.receivedFor(order.side, order.onHold, limitPrice, this.feeFor(order));
      const settled = this.ledger.settleFill(order.orderId, received);
      filled.push(settled);

      this.config.auditService?.logEvent('ORDER_FILLED', {
        orderId: settled.orderId,
        side: settled.side,
        limitPrice,
        onHold: settled.onHold,
        received
      }, undefined, SIMULATED_EXCHANGE);
    }

    return filled;
  }

  /**
   * Maker fee unless the order is flagged as taker
   */
  feeFor(order: Pick<Order, 'isTaker'>): number {
    return order.isTaker ? this.config.feeMarketOrder : this.config.feeLimitOrder;
  }

  private receivedFor(side: OrderSide, onHold: number, price: number, fee: number): number {
    return side === 'buy'
      ? (onHold / price) * (1 - fee)
      : onHold * price * (1 - fee);
  }

  private placeLimitOrder(side: OrderSide, base: string, limitPrice: number, amount: number): Order {
    const operation = side === 'buy' ? 'placeLimitBuyOrder' : 'placeLimitSellOrder';
    this.assertOrderInput(operation, base, amount);

    if (!(limitPrice > 0)) {
      throw new InsufficientBalanceError(`Limit price must be positive, got: ${limitPrice}`, {
        operation,
        component: COMPONENT,
        metadata: { limitPrice, amount }
      });
    }
    this.assertAvailable(operation, side, amount);

    const order = this.ledger.addOrder(createOrder({
      orderId: randomUUID(),
      exchange: SIMULATED_EXCHANGE,
      market: base,
      side,
      limitPrice,
      onHold: amount,
      status: 'open',
      timeCreated: this.now(),
      isTaker: false
    }));

    this.config.auditService?.logEvent('ORDER_PLACED', {
      orderId: order.orderId,
      type: 'limit',
      side,
      limitPrice,
      onHold: amount
    }, undefined, SIMULATED_EXCHANGE);

    return order;
  }

  private placeMarketOrder(side: OrderSide, base: string, amount: number): Order {
    const operation = side === 'buy' ? 'placeMarketBuyOrder' : 'placeMarketSellOrder';
    this.assertOrderInput(operation, base, amount);
    this.assertAvailable(operation, side, amount);

    const candle = this.currentCandle;
    if (!candle) {
      throw new MissingCandleError('Market orders need a current candle to price against', {
        operation,
        component: COMPONENT
      });
    }

    const order = createOrder({
      orderId: randomUUID(),
      exchange: SIMULATED_EXCHANGE,
      market: base,
      side,
      onHold: amount,
      status: 'filled',
      timeCreated: this.now(),
      isTaker: true
    });
    const received = this.receivedFor(side, amount, candle.open, this.feeFor(order));
    const filled = this.ledger.recordMarketFill(order, received);

    this.config.auditService?.logEvent('ORDER_FILLED', {
      orderId: filled.orderId,
      type: 'market',
      side,
      price: candle.open,
      amount,
      received
    }, undefined, SIMULATED_EXCHANGE);

    return filled;
  }

  private assertOrderInput(operation: string, base: string, amount: number): void {
    if (base !== this.ledger.base) {
      throw new InvalidOrderError(`Ledger trades ${this.ledger.base}, not ${base}`, {
        operation,
        component: COMPONENT
      });
    }
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new InvalidOrderError(`Order amount must be a positive number, got: ${amount}`, {
        operation,
        component: COMPONENT
      });
    }
  }

  private assertAvailable(operation: string, side: OrderSide, amount: number): void {
    const available = side === 'buy' ? this.ledger.quoteAvailable : this.ledger.baseAvailable;
    if (amount > available) {
      throw new InsufficientBalanceError(
        `Insufficient ${side === 'buy' ? 'quote' : 'base'} balance: requested ${amount}, available ${available}`,
        {
          operation,
          component: COMPONENT,
          metadata: { requested: amount, available }
        }
      );
    }
  }

  private now(): number {
    return this.currentCandle?.time?.getTime() ?? Date.now();
  }
}
