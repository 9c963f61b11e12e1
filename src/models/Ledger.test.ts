import { describe, it, expect } from 'vitest';
import { Ledger } from './Ledger';
import { Order, createOrder } from './Order';
import { InvalidOrderError, OrderNotCancellableError, OrderNotFoundError } from '../utils/TradingErrors';

function order(overrides: Partial<Order> = {}): Order {
  return createOrder({
    orderId: 'o-1',
    exchange: 'backtest',
    market: 'BTC',
    side: 'buy',
    limitPrice: 100,
    onHold: 200,
    status: 'open',
    timeCreated: 0,
    isTaker: false,
    ...overrides
  });
}

describe('Ledger', () => {
  it('derives available balances from open orders', () => {
    const ledger = new Ledger({ base: 'BTC', totalQuote: 1000, totalBase: 3 });
    ledger.addOrder(order());
    ledger.addOrder(order({ orderId: 'o-2', side: 'sell', onHold: 1 }));

    expect(ledger.quoteAvailable).toBe(800);
    expect(ledger.baseAvailable).toBe(2);
    expect(ledger.openOrders.map(o => o.orderId)).toEqual(['o-1', 'o-2']);
    expect(ledger.totalValueInQuote(50)).toBe(1150);
  });

  it('rejects orders it cannot seed', () => {
    const ledger = new Ledger({ base: 'BTC', totalQuote: 1000 });
    ledger.addOrder(order());

    expect(() => ledger.addOrder(order())).toThrow(InvalidOrderError);
    expect(() => ledger.addOrder(order({ orderId: 'o-2', market: 'ETH' }))).toThrow(InvalidOrderError);
    expect(() => ledger.addOrder(order({ orderId: 'o-3', status: 'filled' }))).toThrow(InvalidOrderError);
    expect(() => ledger.addOrder(order({ orderId: 'o-4', onHold: 0 }))).toThrow(InvalidOrderError);
  });

  it('settles a fill by moving the hold and crediting the other side', () => {
    const ledger = new Ledger({ base: 'BTC', totalQuote: 1000 });
    ledger.addOrder(order());

    const filled = ledger.settleFill('o-1', 1.5);

    expect(filled.status).toBe('filled');
    expect(ledger.totalQuote).toBe(800);
    expect(ledger.totalBase).toBe(1.5);
    expect(ledger.numberOfTransactions).toBe(1);
    expect(ledger.filledOrders).toEqual([filled]);
    expect(() => ledger.settleFill('o-1', 1)).toThrow(InvalidOrderError);
    expect(() => ledger.settleFill('missing', 1)).toThrow(OrderNotFoundError);
  });

  it('keeps order records immutable across status changes', () => {
    const ledger = new Ledger({ base: 'BTC', totalQuote: 1000 });
    const seeded = ledger.addOrder(order());

    ledger.settleCancel('o-1');

    expect(seeded.status).toBe('open');
    expect(Object.isFrozen(seeded)).toBe(true);
    expect(ledger.findOrder('o-1')?.status).toBe('cancelled');
    expect(() => ledger.settleCancel('o-1')).toThrow(OrderNotCancellableError);
  });

  it('round-trips through a snapshot', () => {
    const ledger = new Ledger({ base: 'BTC', totalQuote: 1000, totalBase: 1 });
    ledger.addOrder(order());
    ledger.addOrder(order({ orderId: 'o-2', onHold: 100 }));
    ledger.addOrder(order({ orderId: 'o-3', side: 'sell', onHold: 0.5 }));
    ledger.settleFill('o-1', 2);
    ledger.settleCancel('o-3');
    ledger.recordMarketFill(order({ orderId: 'o-4', limitPrice: undefined, onHold: 0.5, side: 'sell', isTaker: true }), 40);

    const restored = Ledger.fromSnapshot(JSON.parse(JSON.stringify(ledger.toSnapshot())));

    expect(restored.toSnapshot()).toEqual(JSON.parse(JSON.stringify(ledger.toSnapshot())));
    expect(restored.quoteAvailable).toBe(ledger.quoteAvailable);
    expect(restored.baseAvailable).toBe(ledger.baseAvailable);
    expect(restored.buyOrders.map(o => o.orderId)).toEqual(['o-2']);
    expect(restored.filledOrders.map(o => o.orderId)).toEqual(['o-1', 'o-4']);
    expect(restored.cancelledOrders.map(o => o.orderId)).toEqual(['o-3']);
    expect(restored.numberOfTransactions).toBe(2);
  });
});
