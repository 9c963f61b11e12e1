/**
 * Strategy persistence
 * Snapshots are keyed by person, exchange, bot and lifecycle status
 */

import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import { StrategySnapshot } from './Strategy';
import { DataPipelineSnapshot } from '../connectors/DataPipeline';
import { LedgerSnapshot } from '../models/Ledger';
import { ApplicationError, ErrorCategory, ErrorSeverity } from '../utils/TradingErrors';

export type BotStatus = 'active' | 'paused' | 'stopped';

export const BOT_STATUSES: readonly BotStatus[] = ['active', 'paused', 'stopped'];

export interface BotKey {
  personId: string;
  exchange: string;
  botId: string;
}

export interface StrategyRepository {
  store(key: BotKey, status: BotStatus, snapshot: StrategySnapshot): Promise<void>;
  read(key: BotKey, status: BotStatus): Promise<StrategySnapshot>;
  changeStatus(key: BotKey, from: BotStatus, to: BotStatus): Promise<void>;
}

const COMPONENT = 'LocalStrategyRepository';

/**
 * Keeps one JSON file per bot at root/personId/exchange/status/botId.json
 */
export class LocalStrategyRepository implements StrategyRepository {
  constructor(private readonly root: string) {}

  pathFor(key: BotKey, status: BotStatus): string {
    for (const part of [key.personId, key.exchange, key.botId]) {
      if (part.length === 0 || part.includes('/') || part.includes('\\') || part === '.' || part === '..') {
        throw new ApplicationError(
          `Invalid bot key segment: ${JSON.stringify(part)}`,
          'INVALID_BOT_KEY',
          ErrorCategory.VALIDATION,
          ErrorSeverity.MEDIUM,
          { operation: 'pathFor', component: COMPONENT, botId: key.botId, timestamp: new Date() }
        );
      }
    }
    return join(this.root, key.personId, key.exchange, status, `${key.botId}.json`);
  }

  async store(key: BotKey, status: BotStatus, snapshot: StrategySnapshot): Promise<void> {
    const path = this.pathFor(key, status);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, JSON.stringify(snapshot, null, 2), 'utf8');
  }

  async read(key: BotKey, status: BotStatus): Promise<StrategySnapshot> {
    const path = this.pathFor(key, status);
    let content: string;
    try {
      content = await readFile(path, 'utf8');
    } catch (error) {
      throw new ApplicationError(
        `No ${status} bot ${key.botId} for ${key.personId} on ${key.exchange}`,
        'BOT_NOT_FOUND',
        ErrorCategory.VALIDATION,
        ErrorSeverity.MEDIUM,
        { operation: 'read', component: COMPONENT, botId: key.botId, timestamp: new Date() },
        { originalError: error instanceof Error ? error : undefined, isRetryable: false }
      );
    }
    return parseSnapshot(JSON.parse(content), path);
  }

  async changeStatus(key: BotKey, from: BotStatus, to: BotStatus): Promise<void> {
    if (from === to) {
      return;
    }
    const target = this.pathFor(key, to);
    await mkdir(dirname(target), { recursive: true });
    await rename(this.pathFor(key, from), target);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function corrupt(path: string, reason: string): ApplicationError {
  return new ApplicationError(
    `Corrupt bot snapshot ${path}: ${reason}`,
    'CORRUPT_SNAPSHOT',
    ErrorCategory.SYSTEM,
    ErrorSeverity.HIGH,
    { operation: 'read', component: COMPONENT, timestamp: new Date() },
    { isRetryable: false }
  );
}

function parseSnapshot(value: unknown, path: string): StrategySnapshot {
  if (!isRecord(value) || typeof value.strategyType !== 'string' || !isRecord(value.params) || !isRecord(value.ledger)) {
    throw corrupt(path, 'expected strategyType, params and ledger');
  }
  const dataPipeline = value.dataPipeline === undefined ? undefined : parseDataPipeline(value.dataPipeline, path);
  return {
    strategyType: value.strategyType,
    params: value.params,
    ledger: parseLedger(value.ledger, path),
    ...(dataPipeline !== undefined && { dataPipeline })
  };
}

function parseDataPipeline(value: unknown, path: string): DataPipelineSnapshot {
  if (!isRecord(value) || value.kind !== 'file' || typeof value.path !== 'string') {
    throw corrupt(path, 'malformed dataPipeline');
  }
  return { kind: 'file', path: value.path };
}

function parseLedger(value: Record<string, unknown>, path: string): LedgerSnapshot {
  const { base, totalBase, totalQuote, numberOfTransactions, orders, filledOrderIds, cancelledOrderIds } = value;
  if (
    typeof base !== 'string' ||
    typeof totalBase !== 'number' ||
    typeof totalQuote !== 'number' ||
    typeof numberOfTransactions !== 'number' ||
    !Array.isArray(orders) ||
    !isStringArray(filledOrderIds) ||
    !isStringArray(cancelledOrderIds)
  ) {
    throw corrupt(path, 'malformed ledger');
  }

  return {
    base,
    totalBase,
    totalQuote,
    numberOfTransactions,
    orders: orders.map((order: unknown, index: number) => {
      if (!isRecord(order)) {
        throw corrupt(path, `order ${index} is not an object`);
      }
      const { orderId, exchange, market, side, limitPrice, onHold, status, timeCreated, isTaker } = order;
      if (
        typeof orderId !== 'string' ||
        typeof exchange !== 'string' ||
        typeof market !== 'string' ||
        (side !== 'buy' && side !== 'sell') ||
        (limitPrice !== undefined && typeof limitPrice !== 'number') ||
        typeof onHold !== 'number' ||
        (status !== 'open' && status !== 'filled' && status !== 'cancelled') ||
        typeof timeCreated !== 'number' ||
        typeof isTaker !== 'boolean'
      ) {
        throw corrupt(path, `order ${index} is malformed`);
      }
      return { orderId, exchange, market, side, limitPrice, onHold, status, timeCreated, isTaker };
    }),
    filledOrderIds,
    cancelledOrderIds
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}
