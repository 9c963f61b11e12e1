/**
 * Execution client interface
 * Strategies place and cancel orders through this interface only, so the same
 * strategy runs against the simulated market or a live exchange unchanged.
 */

import type { Order } from '../models/Order';
import type { CandlePrices } from '../models/Candle';
import type { ReadonlyLedger } from '../models/Ledger';

export type ExecutionClientKind = 'simulated' | 'live';

export interface IExecutionClient {
  readonly kind: ExecutionClientKind;

  /**
   * The ledger this client settles into, read-only for everyone else
   */
  readonly state: ReadonlyLedger;

  /**
   * Reserves `amountInQuote` and opens a buy that fills once price trades at or below `limitPrice`
   */
  placeLimitBuyOrder(base: string, limitPrice: number, amountInQuote: number): Promise<Order>;

  /**
   * Reserves `amountInBase` and opens a sell that fills once price trades at or above `limitPrice`
   */
  placeLimitSellOrder(base: string, limitPrice: number, amountInBase: number): Promise<Order>;

  placeMarketBuyOrder(base: string, amountInQuote: number): Promise<Order>;

  placeMarketSellOrder(base: string, amountInBase: number): Promise<Order>;

  /**
   * Cancels an open order and releases its hold. Accepts a stale handle; the stored record decides.
   */
  cancelOrder(order: Order): Promise<Order>;

  /**
   * Current stored record for the order's id
   */
  getOrderInfo(order: Order): Promise<Order>;

  /**
   * Sets the reference prices for the next reconciliation and market order
   */
  setCurrentCandle(candle: CandlePrices): void;

  /**
   * Reconciles open orders, returning those that reached a terminal status
   */
  updateState(): Promise<Order[]>;
}
