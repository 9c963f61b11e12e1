/**
 * Error taxonomy for the ledger, execution clients and backtest driver
 * Every failure carries a code, a category and the context it was raised in
 */

export enum ErrorSeverity {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical'
}

export enum ErrorCategory {
  NETWORK = 'network',
  VALIDATION = 'validation',
  BUSINESS_LOGIC = 'business_logic',
  SYSTEM = 'system',
  EXTERNAL_SERVICE = 'external_service'
}

export interface ErrorContext {
  operation: string;
  component: string;
  orderId?: string;
  botId?: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface ApplicationErrorOptions {
  originalError?: Error;
  isRetryable?: boolean;
  userMessage?: string;
}

/**
 * Base error for everything raised by this package
 */
export class ApplicationError extends Error {
  public readonly code: string;
  public readonly category: ErrorCategory;
  public readonly severity: ErrorSeverity;
  public readonly context: ErrorContext;
  public readonly originalError?: Error;
  public readonly isRetryable: boolean;
  public readonly userMessage: string;

  constructor(
    message: string,
    code: string,
    category: ErrorCategory,
    severity: ErrorSeverity,
    context: ErrorContext,
    options: ApplicationErrorOptions = {}
  ) {
    super(message);
    this.name = 'ApplicationError';
    this.code = code;
    this.category = category;
    this.severity = severity;
    this.context = context;
    this.originalError = options.originalError;
    this.isRetryable = options.isRetryable ?? this.determineRetryability();
    this.userMessage = options.userMessage ?? this.generateUserMessage();
  }

  private determineRetryability(): boolean {
    if (this.category === ErrorCategory.NETWORK || this.category === ErrorCategory.EXTERNAL_SERVICE) {
      return true;
    }

    if (this.category === ErrorCategory.SYSTEM && this.severity !== ErrorSeverity.CRITICAL) {
      return true;
    }

    return false;
  }

  private generateUserMessage(): string {
    switch (this.category) {
      case ErrorCategory.NETWORK:
        return 'Could not reach the exchange. The ledger was left unchanged.';
      case ErrorCategory.VALIDATION:
        return 'The input was rejected. Check the order parameters or the candle series.';
      case ErrorCategory.BUSINESS_LOGIC:
        return 'The operation is not allowed in the current ledger state.';
      case ErrorCategory.EXTERNAL_SERVICE:
        return 'The exchange rejected or failed the request. The ledger was left unchanged.';
      case ErrorCategory.SYSTEM:
        return 'An internal error occurred.';
      default:
        return 'An unexpected error occurred.';
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      category: this.category,
      severity: this.severity,
      context: this.context,
      isRetryable: this.isRetryable,
      userMessage: this.userMessage
    };
  }
}

export type ErrorContextInput = Omit<ErrorContext, 'timestamp'>;

function withTimestamp(context: ErrorContextInput): ErrorContext {
  return { ...context, timestamp: new Date() };
}

/**
 * A placement asks for more than the available balance, or for a non-positive limit price
 */
export class InsufficientBalanceError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'INSUFFICIENT_BALANCE', ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM, withTimestamp(context));
    this.name = 'InsufficientBalanceError';
  }
}

export class OrderNotCancellableError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'ORDER_NOT_CANCELLABLE', ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.LOW, withTimestamp(context));
    this.name = 'OrderNotCancellableError';
  }
}

export class OrderNotFoundError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'ORDER_NOT_FOUND', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, withTimestamp(context));
    this.name = 'OrderNotFoundError';
  }
}

export class InvalidOrderError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'INVALID_ORDER', ErrorCategory.VALIDATION, ErrorSeverity.LOW, withTimestamp(context));
    this.name = 'InvalidOrderError';
  }
}

/**
 * A market order or fill needs a reference candle and none was set
 */
export class MissingCandleError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'MISSING_CANDLE', ErrorCategory.BUSINESS_LOGIC, ErrorSeverity.MEDIUM, withTimestamp(context));
    this.name = 'MissingCandleError';
  }
}

export class InvalidExecutorError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'INVALID_EXECUTOR', ErrorCategory.VALIDATION, ErrorSeverity.HIGH, withTimestamp(context));
    this.name = 'InvalidExecutorError';
  }
}

export class InsufficientHistoryError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'INSUFFICIENT_HISTORY', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, withTimestamp(context));
    this.name = 'InsufficientHistoryError';
  }
}

export class MissingColumnError extends ApplicationError {
  public readonly column: string;

  constructor(column: string, context: ErrorContextInput) {
    super(`Candle series is missing the "${column}" field`, 'MISSING_COLUMN', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, withTimestamp(context));
    this.name = 'MissingColumnError';
    this.column = column;
  }
}

export class InvalidColumnTypeError extends ApplicationError {
  public readonly column: string;

  constructor(column: string, message: string, context: ErrorContextInput) {
    super(message, 'INVALID_COLUMN_TYPE', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, withTimestamp(context));
    this.name = 'InvalidColumnTypeError';
    this.column = column;
  }
}

export class UnsortedSeriesError extends ApplicationError {
  constructor(message: string, context: ErrorContextInput) {
    super(message, 'UNSORTED_SERIES', ErrorCategory.VALIDATION, ErrorSeverity.MEDIUM, withTimestamp(context));
    this.name = 'UnsortedSeriesError';
  }
}

export class StrategyNotRegisteredError extends ApplicationError {
  constructor(strategyType: string, context: ErrorContextInput) {
    super(`No strategy registered for type: ${strategyType}`, 'STRATEGY_NOT_REGISTERED', ErrorCategory.SYSTEM, ErrorSeverity.HIGH, withTimestamp(context), { isRetryable: false });
    this.name = 'StrategyNotRegisteredError';
  }
}

export class ExchangeNotSupportedError extends ApplicationError {
  constructor(exchange: string, context: ErrorContextInput) {
    super(`Exchange not supported: ${exchange}`, 'EXCHANGE_NOT_SUPPORTED', ErrorCategory.SYSTEM, ErrorSeverity.HIGH, withTimestamp(context), { isRetryable: false });
    this.name = 'ExchangeNotSupportedError';
  }
}

/**
 * Wraps a foreign error into an ApplicationError, keeping ApplicationErrors as they are
 */
export function toApplicationError(error: unknown, context: ErrorContextInput): ApplicationError {
  if (error instanceof ApplicationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();
  let category = ErrorCategory.SYSTEM;
  let code = 'UNKNOWN_ERROR';
  let isRetryable = false;

  if (lower.includes('network') || lower.includes('timeout') || lower.includes('connection') || lower.includes('circuit breaker')) {
    category = ErrorCategory.NETWORK;
    code = 'NETWORK_ERROR';
    isRetryable = true;
  } else if (lower.includes('exchange') || lower.includes('api') || lower.includes('rejected')) {
    category = ErrorCategory.EXTERNAL_SERVICE;
    code = 'EXTERNAL_SERVICE_ERROR';
    isRetryable = true;
  }

  return new ApplicationError(
    message,
    code,
    category,
    ErrorSeverity.MEDIUM,
    withTimestamp(context),
    { originalError: error instanceof Error ? error : undefined, isRetryable }
  );
}
