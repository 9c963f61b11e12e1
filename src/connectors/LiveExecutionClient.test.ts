import { describe, it, expect, beforeEach, vi } from 'vitest';
import { LiveExecutionClient } from './LiveExecutionClient';
import { InMemoryExchangeConnector } from './InMemoryExchangeConnector';
import { Ledger } from '../models/Ledger';
import { AuditService } from '../services/AuditService';
import {
  ApplicationError,
  ErrorCategory,
  InsufficientBalanceError,
  OrderNotCancellableError
} from '../utils/TradingErrors';

describe('LiveExecutionClient', () => {
  let ledger: Ledger;
  let connector: InMemoryExchangeConnector;
  let audit: AuditService;
  let client: LiveExecutionClient;

  beforeEach(() => {
    ledger = new Ledger({ base: 'BTC', totalQuote: 1000, totalBase: 0 });
    connector = new InMemoryExchangeConnector('paper', { apiKey: 'test-key', secret: 'test-secret' }, {
      marketPrice: 20000,
      fee: 0.001,
      protection: { retry: { maxRetries: 0 }, rateLimiter: { requestsPerSecond: 1000 } }
    });
    audit = new AuditService();
    client = new LiveExecutionClient(ledger, connector, audit);
  });

  it('mirrors an accepted limit order into the ledger', async () => {
    const order = await client.placeLimitBuyOrder('BTC', 19000, 300);

    expect(client.kind).toBe('live');
    expect(order.exchange).toBe('paper');
    expect(client.state.quoteAvailable).toBe(700);
    expect(connector.placedOrders).toEqual([{ market: 'BTC', side: 'buy', orderType: 'limit', amount: 300, limitPrice: 19000 }]);
    expect(audit.exportAuditLog(undefined, undefined, 'ORDER_PLACED')).toHaveLength(1);
  });

  it('leaves the ledger untouched when the exchange fails', async () => {
    connector.failNext(1, 'connection refused');

    const failure = await client.placeLimitBuyOrder('BTC', 19000, 300).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ApplicationError);
    expect(failure instanceof ApplicationError && failure.category).toBe(ErrorCategory.NETWORK);
    expect(client.state.orders).toHaveLength(0);
    expect(client.state.quoteAvailable).toBe(1000);
  });

  it('validates the balance before calling the exchange', async () => {
    await expect(client.placeLimitBuyOrder('BTC', 19000, 1001)).rejects.toBeInstanceOf(InsufficientBalanceError);
    expect(connector.placedOrders).toHaveLength(0);
  });

  it('settles market orders with the amounts the exchange reports', async () => {
    const order = await client.placeMarketBuyOrder('BTC', 400);

    expect(order.status).toBe('filled');
    expect(client.state.totalQuote).toBe(600);
    expect(client.state.totalBase).toBeCloseTo((400 / 20000) * 0.999, 12);
    expect(client.state.numberOfTransactions).toBe(1);
  });

  it('settles remote fills and cancellations on updateState', async () => {
    const filled = await client.placeLimitBuyOrder('BTC', 19000, 190);
    const cancelled = await client.placeLimitBuyOrder('BTC', 18000, 180);
    await client.placeLimitBuyOrder('BTC', 17000, 170);

    connector.fillRemotely(filled.orderId, 0.01);
    connector.cancelRemotely(cancelled.orderId);

    const settled = await client.updateState();

    expect(settled.map(o => [o.orderId, o.status])).toEqual([
      [filled.orderId, 'filled'],
      [cancelled.orderId, 'cancelled']
    ]);
    expect(client.state.totalBase).toBe(0.01);
    expect(client.state.totalQuote).toBe(810);
    expect(client.state.quoteAvailable).toBe(640);
    expect(client.state.openOrders).toHaveLength(1);
    expect(await client.updateState()).toEqual([]);
  });

  it('cancels remotely before releasing the hold', async () => {
    const order = await client.placeLimitBuyOrder('BTC', 19000, 300);

    const cancelled = await client.cancelOrder(order);

    expect(cancelled.status).toBe('cancelled');
    expect(client.state.quoteAvailable).toBe(1000);
    await expect(client.cancelOrder(order)).rejects.toBeInstanceOf(OrderNotCancellableError);
  });

  it('refuses to release the hold when the exchange already closed the order', async () => {
    const order = await client.placeLimitBuyOrder('BTC', 19000, 300);
    connector.fillRemotely(order.orderId, 0.015);

    await expect(client.cancelOrder(order)).rejects.toBeInstanceOf(OrderNotCancellableError);
    expect(client.state.quoteAvailable).toBe(700);
  });

  it('cancels the remote order when the balance was taken while it was in flight', async () => {
    const cancel = vi.spyOn(connector, 'cancelOrder');

    const results = await Promise.allSettled([
      client.placeLimitBuyOrder('BTC', 19000, 600),
      client.placeLimitBuyOrder('BTC', 19500, 600)
    ]);

    const rejected = results.filter(result => result.status === 'rejected');
    expect(rejected).toHaveLength(1);
    expect(rejected[0].status === 'rejected' && rejected[0].reason).toBeInstanceOf(InsufficientBalanceError);
    expect(client.state.openOrders).toHaveLength(1);
    expect(client.state.quoteAvailable).toBe(400);
    expect(cancel).toHaveBeenCalledTimes(1);

    const orphanId = cancel.mock.calls[0][0];
    expect(orphanId).not.toBe(client.state.openOrders[0].orderId);
    expect((await connector.getOrder(orphanId))?.status).toBe('cancelled');
  });

  it('keeps the last candle it was given', () => {
    client.setCurrentCandle({ open: 1, high: 2, low: 0.5, close: 1.5 });
    expect(client.candle).toEqual({ open: 1, high: 2, low: 0.5, close: 1.5 });
  });
});
