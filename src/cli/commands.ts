/**
 * Command implementations behind the candle-replay CLI
 */

import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import { ConfigurationManager, EnvironmentVariables } from '../config/ConfigurationManager';
import { FileDataPipeline } from '../connectors/DataPipeline';
import { SimulatedExecutionClient } from '../connectors/SimulatedExecutionClient';
import { Ledger } from '../models/Ledger';
import { AuditService } from '../services/AuditService';
import { BacktestDriver, BacktestReport } from '../services/BacktestDriver';
import { AssetHandling, BotCoordinator, ConnectorFactory } from '../services/BotCoordinator';
import { EnvCredentialsRepository } from '../services/CredentialsRepository';
import { StrategySnapshot } from '../services/Strategy';
import { BotKey, BotStatus, LocalStrategyRepository } from '../services/StrategyRepository';
import { RsiStrategy, createDefaultRegistry } from '../strategies';

export type Logger = (line: string) => void;

export interface BacktestCommandOptions {
  data: string;
  base: string;
  quote: number;
  lower: number;
  higher: number;
  period: number;
  window: number;
  config?: string;
  output?: string;
  /** Writes the audit journal as JSON */
  audit?: string;
}

export interface BotCommandOptions {
  person: string;
  exchange: string;
  bot: string;
  status: BotStatus;
  data?: string;
  config?: string;
  audit?: string;
}

function formatPercent(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

async function writeAuditLog(auditService: AuditService, file: string | undefined, log: Logger): Promise<void> {
  if (!file) {
    return;
  }
  const events = auditService.exportAuditLog();
  await writeFile(resolve(file), JSON.stringify(events, null, 2), 'utf8');
  log(`Wrote ${events.length} audit events to ${file}`);
}

export async function runBacktestCommand(
  options: BacktestCommandOptions,
  log: Logger,
  env: EnvironmentVariables = process.env
): Promise<BacktestReport> {
  const auditService = new AuditService();
  const configuration = await new ConfigurationManager(options.config, env, auditService).loadConfiguration();
  const executor = new SimulatedExecutionClient(
    new Ledger({ base: options.base, totalQuote: options.quote }),
    { ...configuration.execution, auditService }
  );
  const strategy = new RsiStrategy(executor, {
    lowerThreshold: options.lower,
    higherThreshold: options.higher,
    period: options.period,
    analysisWindowMinutes: options.window
  });

  const records = await new FileDataPipeline(resolve(options.data)).run();
  log(`Loaded ${records.length} candles from ${options.data}`);

  const report = await new BacktestDriver({ auditService }).run(strategy, records);
  const last = report.rows[report.rows.length - 1];

  log(`Simulated ${report.candlesSimulated} candles`);
  log(`Start value: ${report.startValueInQuote.toFixed(2)}`);
  log(`End value: ${report.endValueInQuote.toFixed(2)}`);
  log(`Return: ${formatPercent(report.totalReturn)} (market ${formatPercent(last.marketReturnSinceStart)})`);
  log(`Transactions: ${report.numberOfTransactions}`);

  if (options.output) {
    await writeFile(resolve(options.output), JSON.stringify(report.rows, null, 2), 'utf8');
    log(`Wrote ${report.rows.length} rows to ${options.output}`);
  }
  await writeAuditLog(auditService, options.audit, log);

  return report;
}

async function createCoordinator(
  options: BotCommandOptions,
  env: EnvironmentVariables,
  auditService: AuditService,
  connectors: Record<string, ConnectorFactory>
): Promise<BotCoordinator> {
  const manager = new ConfigurationManager(options.config, env, auditService);
  const configuration = await manager.loadConfiguration();
  const data = options.data;

  return new BotCoordinator({
    repository: new LocalStrategyRepository(configuration.storage.botStorageDir),
    registry: createDefaultRegistry(),
    fees: configuration.execution,
    credentials: new EnvCredentialsRepository(env),
    connectors,
    connectorProtection: manager.getConnectorProtection(),
    auditService,
    resolvePipeline: data ? () => new FileDataPipeline(resolve(data)) : undefined
  });
}

function botKey(options: BotCommandOptions): BotKey {
  return { personId: options.person, exchange: options.exchange, botId: options.bot };
}

export async function runBotCommand(
  options: BotCommandOptions,
  log: Logger,
  env: EnvironmentVariables = process.env,
  connectors: Record<string, ConnectorFactory> = {}
): Promise<StrategySnapshot> {
  const auditService = new AuditService();
  const coordinator = await createCoordinator(options, env, auditService, connectors);
  try {
    const snapshot = await coordinator.run(botKey(options), options.status);
    log(`Bot ${options.bot}: ${snapshot.ledger.numberOfTransactions} transactions, ${snapshot.ledger.orders.length} orders`);
    return snapshot;
  } finally {
    await writeAuditLog(auditService, options.audit, log);
  }
}

export async function stopBotCommand(
  options: BotCommandOptions & { assets: AssetHandling },
  log: Logger,
  env: EnvironmentVariables = process.env,
  connectors: Record<string, ConnectorFactory> = {}
): Promise<StrategySnapshot | undefined> {
  const auditService = new AuditService();
  const coordinator = await createCoordinator(options, env, auditService, connectors);
  try {
    const snapshot = await coordinator.stop(botKey(options), options.status, options.assets);
    if (snapshot) {
      log(`Bot ${options.bot} stopped with ${snapshot.ledger.totalBase} base and ${snapshot.ledger.totalQuote} quote`);
    } else {
      log(`Bot ${options.bot} was already stopped`);
    }
    return snapshot;
  } finally {
    await writeAuditLog(auditService, options.audit, log);
  }
}
