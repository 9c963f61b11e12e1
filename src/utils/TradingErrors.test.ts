import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  ApplicationError,
  ErrorCategory,
  ErrorSeverity,
  InsufficientBalanceError,
  MissingColumnError,
  toApplicationError
} from './TradingErrors';

const context = { operation: 'placeLimitBuyOrder', component: 'Test' };

describe('TradingErrors', () => {
  it('carries code, category and context', () => {
    const error = new InsufficientBalanceError('not enough', context);

    expect(error).toBeInstanceOf(ApplicationError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('InsufficientBalanceError');
    expect(error.code).toBe('INSUFFICIENT_BALANCE');
    expect(error.category).toBe(ErrorCategory.BUSINESS_LOGIC);
    expect(error.isRetryable).toBe(false);
    expect(error.context.operation).toBe('placeLimitBuyOrder');
    expect(error.context.timestamp).toBeInstanceOf(Date);
    expect(error.toJSON()).toMatchObject({ code: 'INSUFFICIENT_BALANCE', message: 'not enough' });
  });

  it('names the missing column', () => {
    const error = new MissingColumnError('volume', context);
    expect(error.column).toBe('volume');
    expect(error.message).toBe('Candle series is missing the "volume" field');
  });

  it('classifies foreign errors by message', () => {
    const network = toApplicationError(new Error('Connection reset'), context);
    const exchange = toApplicationError(new Error('Order rejected'), context);
    const unknown = toApplicationError('boom', context);

    expect([network.code, network.category, network.isRetryable]).toEqual(['NETWORK_ERROR', ErrorCategory.NETWORK, true]);
    expect([exchange.code, exchange.category, exchange.isRetryable]).toEqual(['EXTERNAL_SERVICE_ERROR', ErrorCategory.EXTERNAL_SERVICE, true]);
    expect([unknown.code, unknown.category, unknown.isRetryable]).toEqual(['UNKNOWN_ERROR', ErrorCategory.SYSTEM, false]);
    expect(network.originalError?.message).toBe('Connection reset');
    expect(unknown.severity).toBe(ErrorSeverity.MEDIUM);
  });

  it('returns application errors unchanged', () => {
    fc.assert(
      fc.property(fc.string(), message => {
        const error = new InsufficientBalanceError(message, context);
        expect(toApplicationError(error, context)).toBe(error);
      }),
      { numRuns: 50 }
    );
  });
});
