/**
 * Base domain exception class
 */
export class DomainException extends Error {
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'DOMAIN_ERROR',
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainException';
    this.code = code;
    this.timestamp = new Date();
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A funding precondition failed (finish date reached, negative funding,
 * buying power below one day of funding). Not recoverable within the process.
 */
export class FundingPreconditionException extends DomainException {
  public readonly precondition: string;

  constructor(
    message: string,
    precondition: string,
    context?: Record<string, unknown>,
  ) {
    super(message, 'FUNDING_PRECONDITION_VIOLATED', context);
    this.name = 'FundingPreconditionException';
    this.precondition = precondition;
  }
}

/**
 * Broker request failed (network, auth, unexpected payload)
 */
export class BrokerageException extends DomainException {
  public readonly broker: string;

  constructor(message: string, broker: string, context?: Record<string, unknown>) {
    super(`[${broker}] ${message}`, 'BROKERAGE_ERROR', context);
    this.name = 'BrokerageException';
    this.broker = broker;
  }
}

/**
 * Order submission exception
 */
export class OrderSubmissionException extends DomainException {
  public readonly symbol: string;
  public readonly broker: string;

  constructor(
    message: string,
    symbol: string,
    broker: string,
    context?: Record<string, unknown>,
  ) {
    super(`Order submission failed for ${symbol}: ${message}`, 'ORDER_SUBMISSION_ERROR', context);
    this.name = 'OrderSubmissionException';
    this.symbol = symbol;
    this.broker = broker;
  }
}

export class CheckpointInitializationException extends DomainException {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CHECKPOINT_INITIALIZATION_ERROR', context);
    this.name = 'CheckpointInitializationException';
  }
}

export class CheckpointPersistenceException extends DomainException {
  public readonly filePath: string;

  constructor(message: string, filePath: string, context?: Record<string, unknown>) {
    super(`Failed to persist checkpoint to ${filePath}: ${message}`, 'CHECKPOINT_PERSISTENCE_ERROR', context);
    this.name = 'CheckpointPersistenceException';
    this.filePath = filePath;
  }
}

export class TradingCalendarException extends DomainException {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'TRADING_CALENDAR_ERROR', context);
    this.name = 'TradingCalendarException';
  }
}
