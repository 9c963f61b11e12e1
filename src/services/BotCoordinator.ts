/**
 * Bot coordinator
 * Resumes persisted strategies for one step at a time and winds them down on stop
 */

import { Strategy, StrategySnapshot } from './Strategy';
import { StrategyRegistry } from './StrategyRegistry';
import { BotKey, BotStatus, StrategyRepository } from './StrategyRepository';
import { CredentialsRepository } from './CredentialsRepository';
import { AuditService } from './AuditService';
import { IExecutionClient } from '../connectors/ExecutionClient';
import { ConnectorProtectionConfig, IExchangeConnector, ExchangeCredentials } from '../connectors/ExchangeConnector';
import { LiveExecutionClient } from '../connectors/LiveExecutionClient';
import { SIMULATED_EXCHANGE, SimulatedExecutionClient } from '../connectors/SimulatedExecutionClient';
import { DataPipeline } from '../connectors/DataPipeline';
import { Candle } from '../models/Candle';
import { Ledger, LedgerSnapshot } from '../models/Ledger';
import { SeriesValidator } from '../utils/SeriesValidator';
import { ExchangeNotSupportedError, MissingCandleError } from '../utils/TradingErrors';

export type AssetHandling = 'base_only' | 'quote_only' | 'ignore';

export type ConnectorFactory = (credentials: ExchangeCredentials, protection: ConnectorProtectionConfig) => IExchangeConnector;

export type DataPipelineResolver = (strategy: Strategy) => DataPipeline;

export interface BotCoordinatorOptions {
  repository: StrategyRepository;
  registry: StrategyRegistry;
  fees: { feeLimitOrder: number; feeMarketOrder: number };
  credentials?: CredentialsRepository;
  connectors?: Record<string, ConnectorFactory>;
  /** Handed to every connector factory */
  connectorProtection?: ConnectorProtectionConfig;
  auditService?: AuditService;
  /** Defaults to the strategy's own pipeline */
  resolvePipeline?: DataPipelineResolver;
}

const COMPONENT = 'BotCoordinator';

export class BotCoordinator {
  private readonly options: BotCoordinatorOptions;

  constructor(options: BotCoordinatorOptions) {
    this.options = options;
  }

  /**
   * Runs one step of a persisted bot and stores the result.
   * A failing step stores the ledger as it stands and pauses the bot;
   * a failure to load the bot or its candles leaves it where it is.
   */
  async run(key: BotKey, status: BotStatus): Promise<StrategySnapshot> {
    const strategy = await this.restore(key, status);
    const candles = await this.fetchCandles(strategy);

    return this.guard(key, status, strategy, 'run', async () => {
      const last = candles[candles.length - 1];
      const windowStart = last.time.getTime() - strategy.analysisWindowMinutes * 60000;

      strategy.executor.setCurrentCandle(last);
      await strategy.run(candles.filter(candle => candle.time.getTime() >= windowStart));

      const snapshot = strategy.toSnapshot();
      await this.options.repository.store(key, status, snapshot);
      this.options.auditService?.logEvent('BOT_RUN_SUCCEEDED', {
        personId: key.personId,
        numberOfTransactions: snapshot.ledger.numberOfTransactions
      }, key.botId, key.exchange);
      return snapshot;
    });
  }

  /**
   * Cancels every open order, settles the holdings per `assetHandling` and moves the bot to stopped
   */
  async stop(key: BotKey, status: BotStatus, assetHandling: AssetHandling): Promise<StrategySnapshot | undefined> {
    if (status === 'stopped') {
      return undefined;
    }

    const strategy = await this.restore(key, status);
    // Simulated fills need a price to sell or buy at
    const candles = strategy.executor.kind === 'simulated' ? await this.fetchCandles(strategy) : undefined;

    return this.guard(key, status, strategy, 'stop', async () => {
      const executor = strategy.executor;
      if (candles) {
        executor.setCurrentCandle(candles[candles.length - 1]);
      }

      for (const order of strategy.state.openOrders) {
        await executor.cancelOrder(order);
      }

      const state = strategy.state;
      if (assetHandling === 'base_only' && state.quoteAvailable > 0) {
        await executor.placeMarketBuyOrder(state.base, state.quoteAvailable);
      } else if (assetHandling === 'quote_only' && state.baseAvailable > 0) {
        await executor.placeMarketSellOrder(state.base, state.baseAvailable);
      }

      const snapshot = strategy.toSnapshot();
      await this.options.repository.store(key, status, snapshot);
      await this.options.repository.changeStatus(key, status, 'stopped');
      this.options.auditService?.logEvent('BOT_STOPPED', {
        personId: key.personId,
        assetHandling,
        totalBase: snapshot.ledger.totalBase,
        totalQuote: snapshot.ledger.totalQuote
      }, key.botId, key.exchange);
      return snapshot;
    });
  }

  private async guard<T>(
    key: BotKey,
    status: BotStatus,
    strategy: Strategy,
    operation: string,
    body: () => Promise<T>
  ): Promise<T> {
    try {
      return await body();
    } catch (error) {
      await this.options.repository.store(key, status, strategy.toSnapshot());
      await this.options.repository.changeStatus(key, status, 'paused');
      this.options.auditService?.logEvent('BOT_RUN_FAILED', {
        personId: key.personId,
        operation,
        error: error instanceof Error ? error.message : String(error)
      }, key.botId, key.exchange);
      throw error;
    }
  }

  private async restore(key: BotKey, status: BotStatus): Promise<Strategy> {
    const snapshot = await this.options.repository.read(key, status);
    const executor = await this.buildExecutor(key, snapshot.ledger);
    return this.options.registry.restore(snapshot, executor);
  }

  private async buildExecutor(key: BotKey, ledgerSnapshot: LedgerSnapshot): Promise<IExecutionClient> {
    const ledger = Ledger.fromSnapshot(ledgerSnapshot);
    const auditService = this.options.auditService;

    if (key.exchange === SIMULATED_EXCHANGE) {
      return new SimulatedExecutionClient(ledger, { ...this.options.fees, auditService });
    }

    const factory = this.options.connectors?.[key.exchange];
    const credentials = this.options.credentials;
    if (!factory || !credentials) {
      throw new ExchangeNotSupportedError(key.exchange, { operation: 'buildExecutor', component: COMPONENT, botId: key.botId });
    }

    const connector = factory(await credentials.getCredentials(key.personId, key.exchange), this.options.connectorProtection ?? {});
    return new LiveExecutionClient(ledger, connector, auditService);
  }

  private async fetchCandles(strategy: Strategy): Promise<Candle[]> {
    const pipeline = this.options.resolvePipeline ? this.options.resolvePipeline(strategy) : strategy.getDataPipeline();
    const candles = SeriesValidator.validate(await pipeline.run());
    if (candles.length === 0) {
      throw new MissingCandleError('Data pipeline returned no candles', { operation: 'fetchCandles', component: COMPONENT });
    }
    return candles;
  }
}
