import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runBacktestCommand, runBotCommand, stopBotCommand } from './commands';
import { LocalStrategyRepository } from '../services/StrategyRepository';
import { Ledger } from '../models/Ledger';
import { ConnectorProtectionConfig } from '../connectors/ExchangeConnector';
import { InMemoryExchangeConnector } from '../connectors/InMemoryExchangeConnector';

describe('CLI commands', () => {
  let dir: string;
  let dataFile: string;
  let lines: string[];
  const log = (line: string): void => {
    lines.push(line);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'candle-cli-'));
    dataFile = join(dir, 'candles.json');
    lines = [];
    const candles = Array.from({ length: 10 }, (_, i) => ({
      time: new Date(Date.UTC(2024, 0, 1, 0, i)).toISOString(),
      open: 100 + i,
      high: 100 + i,
      low: 100 + i,
      close: 100 + i,
      volume: 1
    }));
    await writeFile(dataFile, JSON.stringify(candles));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('backtests the RSI strategy and writes the rows', async () => {
    const output = join(dir, 'rows.json');

    const report = await runBacktestCommand(
      { data: dataFile, base: 'BTC', quote: 1000, lower: 30, higher: 70, period: 2, window: 3, output },
      log,
      {}
    );

    expect(report.candlesSimulated).toBe(7);
    expect(lines).toEqual([
      `Loaded 10 candles from ${dataFile}`,
      'Simulated 7 candles',
      'Start value: 1000.00',
      'End value: 1000.00',
      'Return: 0.00% (market 5.83%)',
      'Transactions: 0',
      `Wrote 7 rows to ${output}`
    ]);
    const rows: unknown = JSON.parse(await readFile(output, 'utf8'));
    expect(Array.isArray(rows) && rows.length).toBe(7);
  });

  it('writes the audit journal when asked', async () => {
    const audit = join(dir, 'audit.json');

    await runBacktestCommand(
      { data: dataFile, base: 'BTC', quote: 1000, lower: 30, higher: 70, period: 2, window: 3, audit },
      log,
      {}
    );

    expect(lines[lines.length - 1]).toBe(`Wrote 3 audit events to ${audit}`);
    const events: unknown = JSON.parse(await readFile(audit, 'utf8'));
    expect(Array.isArray(events) && events.map((event: { eventType: unknown }) => event.eventType)).toEqual([
      'CONFIG_LOADED',
      'BACKTEST_STARTED',
      'BACKTEST_COMPLETED'
    ]);
  });

  it('hands the configured connector protection to live exchanges', async () => {
    const storage = join(dir, 'bots');
    const key = { personId: 'alice', exchange: 'paper', botId: 'bot-2' };
    await new LocalStrategyRepository(storage).store(key, 'active', {
      strategyType: 'rsi',
      params: { period: 2, analysisWindowMinutes: 3 },
      ledger: new Ledger({ base: 'BTC', totalQuote: 1000 }).toSnapshot()
    });
    const protections: ConnectorProtectionConfig[] = [];
    const env = {
      BOT_STORAGE_DIR: storage,
      CONNECTOR_MAX_RETRIES: '0',
      alice_paper_api_key: 'test-key',
      alice_paper_api_secret_key: 'test-secret'
    };

    await runBotCommand(
      { person: 'alice', exchange: 'paper', bot: 'bot-2', status: 'active', data: dataFile },
      log,
      env,
      {
        paper: (credentials, protection) => {
          protections.push(protection);
          return new InMemoryExchangeConnector('paper', credentials, { marketPrice: 100, protection });
        }
      }
    );

    expect(protections).toEqual([{
      rateLimiter: { requestsPerSecond: 10 },
      retry: { maxRetries: 0, baseDelay: 1000 },
      circuitBreaker: { failureThreshold: 5, recoveryTimeout: 60000 }
    }]);
    expect(lines).toEqual(['Bot bot-2: 0 transactions, 0 orders']);
  });

  it('runs and stops a persisted bot', async () => {
    const storage = join(dir, 'bots');
    const key = { personId: 'alice', exchange: 'backtest', botId: 'bot-1' };
    await new LocalStrategyRepository(storage).store(key, 'active', {
      strategyType: 'rsi',
      params: { lowerThreshold: 30, higherThreshold: 70, period: 2, analysisWindowMinutes: 3 },
      ledger: new Ledger({ base: 'BTC', totalQuote: 1000 }).toSnapshot()
    });
    const options = { person: 'alice', exchange: 'backtest', bot: 'bot-1', status: 'active' as const, data: dataFile };
    const env = { BOT_STORAGE_DIR: storage };

    await runBotCommand(options, log, env);
    await stopBotCommand({ ...options, assets: 'quote_only' }, log, env);

    expect(lines).toEqual([
      'Bot bot-1: 0 transactions, 0 orders',
      'Bot bot-1 stopped with 0 base and 1000 quote'
    ]);
    expect(existsSync(join(storage, 'alice', 'backtest', 'stopped', 'bot-1.json'))).toBe(true);
  });
});
