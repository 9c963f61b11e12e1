/**
 * Exchange Connector interface and base implementation
 * Boundary between the live execution client and a remote exchange
 */

import { OrderSide } from '../models/Order';
import { ConnectorStatus, ConnectorHealthStatus } from '../models/ConnectorStatus';

export interface ExchangeCredentials {
  apiKey: string;
  secret: string;
}

export interface PlaceOrderParams {
  market: string;
  side: OrderSide;
  orderType: 'limit' | 'market';
  /** Quote for buys, base for sells */
  amount: number;
  /** Required for limit orders */
  limitPrice?: number;
}

export type RemoteOrderStatus = 'open' | 'filled' | 'cancelled';

/**
 * Order as the exchange reports it
 */
export interface RemoteOrder {
  orderId: string;
  status: RemoteOrderStatus;
  timestamp: Date;
  /** Net amount of the acquired asset, known once filled */
  received?: number;
}

/**
 * Standardized interface for exchange connectors
 */
export interface IExchangeConnector {
  readonly connectorId: string;

  placeOrder(params: PlaceOrderParams): Promise<RemoteOrder>;

  cancelOrder(orderId: string): Promise<boolean>;

  /**
   * Current remote state of an order, or null when the exchange does not know it
   */
  getOrder(orderId: string): Promise<RemoteOrder | null>;

  healthCheck(): Promise<boolean>;

  getStatus(): ConnectorStatus;
}

export type CircuitBreakerState = 'closed' | 'open' | 'half-open';

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryTimeout: number;
  monitoringPeriod: number;
}

export interface RateLimiterConfig {
  requestsPerSecond: number;
}

export interface RetryConfig {
  maxRetries: number;
  baseDelay: number;
  maxDelay: number;
  backoffMultiplier: number;
}

export interface ConnectorProtectionConfig {
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  rateLimiter?: Partial<RateLimiterConfig>;
  retry?: Partial<RetryConfig>;
}

export const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerConfig = {
  failureThreshold: 5,
  recoveryTimeout: 60000,
  monitoringPeriod: 300000
};

export const DEFAULT_RATE_LIMITER: RateLimiterConfig = {
  requestsPerSecond: 10
};

export const DEFAULT_RETRY: RetryConfig = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 10000,
  backoffMultiplier: 2
};

/**
 * Base connector. Every remote call goes through executeWithProtection:
 * circuit breaker, then rate limiter, then retry with exponential backoff.
 */
export abstract class BaseExchangeConnector implements IExchangeConnector {
  readonly connectorId: string;
  protected readonly name: string;

  private circuitBreakerState: CircuitBreakerState = 'closed';
  private failureCount: number = 0;
  private lastFailureTime: number = 0;
  private readonly circuitBreakerConfig: CircuitBreakerConfig;

  private requestTimes: number[] = [];
  private readonly rateLimiterConfig: RateLimiterConfig;

  private readonly retryConfig: RetryConfig;

  private lastHealthCheck: Date = new Date();
  private latency: number = 0;
  private errorRate: number = 0;
  private recentErrors: number[] = [];
  private recentRequests: number[] = [];

  constructor(connectorId: string, name: string, protection: ConnectorProtectionConfig = {}) {
    this.connectorId = connectorId;
    this.name = name;
    this.circuitBreakerConfig = { ...DEFAULT_CIRCUIT_BREAKER, ...protection.circuitBreaker };
    this.rateLimiterConfig = { ...DEFAULT_RATE_LIMITER, ...protection.rateLimiter };
    this.retryConfig = { ...DEFAULT_RETRY, ...protection.retry };
  }

  async placeOrder(params: PlaceOrderParams): Promise<RemoteOrder> {
    return this.executeWithProtection(() => this.submitOrder(params), 'placeOrder');
  }

  async cancelOrder(orderId: string): Promise<boolean> {
    return this.executeWithProtection(() => this.submitCancel(orderId), 'cancelOrder');
  }

  async getOrder(orderId: string): Promise<RemoteOrder | null> {
    return this.executeWithProtection(() => this.fetchOrder(orderId), 'getOrder');
  }

  protected abstract submitOrder(params: PlaceOrderParams): Promise<RemoteOrder>;
  protected abstract submitCancel(orderId: string): Promise<boolean>;
  protected abstract fetchOrder(orderId: string): Promise<RemoteOrder | null>;
  protected abstract performHealthCheck(): Promise<boolean>;

  protected async executeWithProtection<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    if (!this.isCircuitBreakerClosed()) {
      throw new Error(`Circuit breaker is ${this.circuitBreakerState} for ${this.name}`);
    }

    await this.applyRateLimit();

    return this.executeWithRetry(operation, operationName);
  }

  getCircuitBreakerState(): CircuitBreakerState {
    return this.circuitBreakerState;
  }

  private isCircuitBreakerClosed(): boolean {
    switch (this.circuitBreakerState) {
      case 'closed':
      case 'half-open':
        return true;
      case 'open':
        if (Date.now() - this.lastFailureTime > this.circuitBreakerConfig.recoveryTimeout) {
          this.circuitBreakerState = 'half-open';
          return true;
        }
        return false;
    }
  }

  private recordSuccess(): void {
    this.failureCount = 0;
    if (this.circuitBreakerState === 'half-open') {
      this.circuitBreakerState = 'closed';
    }
  }

  private recordFailure(): void {
    this.failureCount++;
    this.lastFailureTime = Date.now();

    // A failed probe reopens immediately
    if (this.circuitBreakerState === 'half-open' || this.failureCount >= this.circuitBreakerConfig.failureThreshold) {
      this.circuitBreakerState = 'open';
    }

    this.recentErrors.push(this.lastFailureTime);
    this.updateErrorRate();
  }

  private async applyRateLimit(): Promise<void> {
    const now = Date.now();
    this.requestTimes = this.requestTimes.filter(time => now - time < 1000);

    if (this.requestTimes.length >= this.rateLimiterConfig.requestsPerSecond) {
      const oldestRequest = Math.min(...this.requestTimes);
      const waitTime = 1000 - (now - oldestRequest);
      if (waitTime > 0) {
        await this.sleep(waitTime);
      }
    }

    this.requestTimes.push(Date.now());
  }

  private async executeWithRetry<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    let lastError: Error | undefined;

    for (let attempt = 0; attempt <= this.retryConfig.maxRetries; attempt++) {
      const startTime = Date.now();
      this.recentRequests.push(startTime);
      try {
        const result = await operation();
        this.latency = Date.now() - startTime;
        this.recordSuccess();
        this.updateErrorRate();
        return result;
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));
        this.recordFailure();

        if (attempt === this.retryConfig.maxRetries || this.circuitBreakerState === 'open') {
          break;
        }

        const delay = Math.min(
          this.retryConfig.baseDelay * Math.pow(this.retryConfig.backoffMultiplier, attempt),
          this.retryConfig.maxDelay
        );
        await this.sleep(delay);
      }
    }

    throw new Error(`${operationName} failed on exchange ${this.name}: ${lastError?.message ?? 'Unknown error'}`);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }

  private updateErrorRate(): void {
    const cutoff = Date.now() - this.circuitBreakerConfig.monitoringPeriod;
    this.recentErrors = this.recentErrors.filter(time => time > cutoff);
    this.recentRequests = this.recentRequests.filter(time => time > cutoff);
    this.errorRate = this.recentRequests.length > 0 ? this.recentErrors.length / this.recentRequests.length : 0;
  }

  async healthCheck(): Promise<boolean> {
    const startTime = Date.now();
    try {
      const isHealthy = await this.performHealthCheck();
      this.latency = Date.now() - startTime;
      return isHealthy;
    } catch (error) {
      this.recordFailure();
      return false;
    } finally {
      this.lastHealthCheck = new Date();
    }
  }

  getStatus(): ConnectorStatus {
    let status: ConnectorHealthStatus;

    if (this.circuitBreakerState === 'open') {
      status = 'offline';
    } else if (this.circuitBreakerState === 'half-open' || this.errorRate > 0.1) {
      status = 'degraded';
    } else {
      status = 'healthy';
    }

    return {
      connectorId: this.connectorId,
      name: this.name,
      status,
      lastHealthCheck: this.lastHealthCheck,
      latency: this.latency,
      errorRate: this.errorRate
    };
  }

  protected validateCredentials(credentials: ExchangeCredentials): void {
    if (!credentials.apiKey || !credentials.secret) {
      throw new Error('Invalid credentials: API key and secret are required');
    }
  }
}
