import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { LocalStrategyRepository, BotKey } from './StrategyRepository';
import { StrategySnapshot } from './Strategy';
import { Ledger } from '../models/Ledger';
import { createOrder } from '../models/Order';
import { ApplicationError } from '../utils/TradingErrors';

const key: BotKey = { personId: 'alice', exchange: 'backtest', botId: 'bot-1' };

function snapshot(): StrategySnapshot {
  const ledger = new Ledger({ base: 'BTC', totalQuote: 1000 });
  ledger.addOrder(createOrder({
    orderId: 'o-1',
    exchange: 'backtest',
    market: 'BTC',
    side: 'buy',
    limitPrice: 19000,
    onHold: 300,
    status: 'open',
    timeCreated: 1700000000000,
    isTaker: false
  }));
  return { strategyType: 'rsi', params: { period: 14 }, ledger: ledger.toSnapshot() };
}

describe('LocalStrategyRepository', () => {
  let root: string;
  let repository: LocalStrategyRepository;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'candle-bots-'));
    repository = new LocalStrategyRepository(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('stores snapshots at root/person/exchange/status/bot.json', async () => {
    await repository.store(key, 'active', snapshot());

    const path = join(root, 'alice', 'backtest', 'active', 'bot-1.json');
    expect(repository.pathFor(key, 'active')).toBe(path);
    expect(JSON.parse(await readFile(path, 'utf8')).strategyType).toBe('rsi');
  });

  it('reads back an equivalent snapshot that restores the ledger', async () => {
    await repository.store(key, 'active', snapshot());

    const read = await repository.read(key, 'active');
    const ledger = Ledger.fromSnapshot(read.ledger);

    expect(read).toEqual(snapshot());
    expect(ledger.quoteAvailable).toBe(700);
    expect(ledger.buyOrders.map(o => o.orderId)).toEqual(['o-1']);
  });

  it('keeps the data pipeline stored with the bot', async () => {
    const withPipeline: StrategySnapshot = { ...snapshot(), dataPipeline: { kind: 'file', path: '/data/btc.json' } };
    await repository.store(key, 'active', withPipeline);

    expect((await repository.read(key, 'active')).dataPipeline).toEqual({ kind: 'file', path: '/data/btc.json' });

    const path = repository.pathFor(key, 'paused');
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify({ ...snapshot(), dataPipeline: { kind: 'http' } }));
    await expect(repository.read(key, 'paused')).rejects.toThrow(`Corrupt bot snapshot ${path}: malformed dataPipeline`);
  });

  it('moves the file when the status changes', async () => {
    await repository.store(key, 'active', snapshot());

    await repository.changeStatus(key, 'active', 'paused');

    expect(existsSync(repository.pathFor(key, 'active'))).toBe(false);
    expect((await repository.read(key, 'paused')).strategyType).toBe('rsi');
  });

  it('treats an unchanged status as a no-op', async () => {
    await repository.store(key, 'paused', snapshot());
    await repository.changeStatus(key, 'paused', 'paused');
    expect(existsSync(repository.pathFor(key, 'paused'))).toBe(true);
  });

  it('reports missing and corrupt snapshots', async () => {
    await expect(repository.read(key, 'active')).rejects.toThrow('No active bot bot-1 for alice on backtest');

    const path = repository.pathFor(key, 'stopped');
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify({ strategyType: 'rsi', params: {}, ledger: { base: 'BTC' } }));
    await expect(repository.read(key, 'stopped')).rejects.toThrow(`Corrupt bot snapshot ${path}: malformed ledger`);
  });

  it('rejects key segments that would escape the root', () => {
    expect(() => repository.pathFor({ ...key, botId: '../x' }, 'active')).toThrow(ApplicationError);
    expect(() => repository.pathFor({ ...key, personId: '..' }, 'active')).toThrow(ApplicationError);
  });
});
