/**
 * In-process exchange used for paper trading and tests.
 * Limit orders rest until settled by hand; market orders fill at the configured price.
 */

import { randomUUID } from 'crypto';
import {
  BaseExchangeConnector,
  ConnectorProtectionConfig,
  ExchangeCredentials,
  PlaceOrderParams,
  RemoteOrder
} from './ExchangeConnector';

export interface InMemoryExchangeOptions {
  marketPrice: number;
  fee?: number;
  protection?: ConnectorProtectionConfig;
}

export class InMemoryExchangeConnector extends BaseExchangeConnector {
  private readonly remoteOrders: Map<string, RemoteOrder> = new Map();
  private readonly placed: PlaceOrderParams[] = [];
  private pendingFailures: string[] = [];
  private healthy: boolean = true;
  marketPrice: number;
  private readonly fee: number;

  constructor(connectorId: string, credentials: ExchangeCredentials, options: InMemoryExchangeOptions) {
    super(connectorId, `InMemory(${connectorId})`, options.protection);
    this.validateCredentials(credentials);
    this.marketPrice = options.marketPrice;
    this.fee = options.fee ?? 0;
  }

  /**
   * Makes the next `count` remote calls fail with `message`
   */
  failNext(count: number, message: string): void {
    this.pendingFailures = [...this.pendingFailures, ...Array.from({ length: count }, () => message)];
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  fillRemotely(orderId: string, received: number): void {
    const order = this.remoteOrders.get(orderId);
    if (order && order.status === 'open') {
      this.remoteOrders.set(orderId, { ...order, status: 'filled', received });
    }
  }

  cancelRemotely(orderId: string): void {
    const order = this.remoteOrders.get(orderId);
    if (order && order.status === 'open') {
      this.remoteOrders.set(orderId, { ...order, status: 'cancelled' });
    }
  }

  get placedOrders(): readonly PlaceOrderParams[] {
    return this.placed;
  }

  protected async submitOrder(params: PlaceOrderParams): Promise<RemoteOrder> {
    this.consumeFailure();
    this.placed.push({ ...params });

    const order: RemoteOrder = params.orderType === 'market'
      ? {
          orderId: randomUUID(),
          status: 'filled',
          timestamp: new Date(),
          received: params.side === 'buy'
            ? (params.amount / this.marketPrice) * (1 - this.fee)
            : params.amount * this.marketPrice * (1 - this.fee)
        }
      : { orderId: randomUUID(), status: 'open', timestamp: new Date() };

    this.remoteOrders.set(order.orderId, order);
    return { ...order };
  }

  protected async submitCancel(orderId: string): Promise<boolean> {
    this.consumeFailure();
    const order = this.remoteOrders.get(orderId);
    if (!order || order.status !== 'open') {
      return false;
    }
    this.remoteOrders.set(orderId, { ...order, status: 'cancelled' });
    return true;
  }

  protected async fetchOrder(orderId: string): Promise<RemoteOrder | null> {
    this.consumeFailure();
    const order = this.remoteOrders.get(orderId);
    return order ? { ...order } : null;
  }

  protected async performHealthCheck(): Promise<boolean> {
    return this.healthy;
  }

  private consumeFailure(): void {
    const [message, ...rest] = this.pendingFailures;
    if (message !== undefined) {
      this.pendingFailures = rest;
      throw new Error(message);
    }
  }
}
