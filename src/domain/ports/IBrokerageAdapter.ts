import { Decimal } from 'decimal.js';
import { BuyOrderRequest, BuyOrderResponse } from '../value-objects/BuyOrder';

/**
 * Account balances at the time of the request
 */
export interface AccountSnapshot {
  equity: Decimal;
  cash: Decimal;
  buyingPower: Decimal;
}

/**
 * One held position. The order of the list returned by the broker fixes the
 * asset indexing for a whole funding cycle.
 */
export interface PositionSnapshot {
  symbol: string;
  marketValue: Decimal;
  currentPrice: Decimal;
  quantity: Decimal;
}

/**
 * One exchange trading session, in exchange local time
 */
export interface TradingSession {
  date: string; // YYYY-MM-DD
  open: string; // HH:MM
  close: string; // HH:MM
}

/**
 * IBrokerageAdapter - Interface for brokerage connectivity
 *
 * Implementations do not retry; failures surface as BrokerageException or
 * OrderSubmissionException.
 */
export interface IBrokerageAdapter {
  /**
   * Get the broker name used in logs and errors
   */
  getBrokerName(): string;

  getAccount(): Promise<AccountSnapshot>;

  getPositions(): Promise<PositionSnapshot[]>;

  /**
   * Trading sessions between two exchange-local dates (inclusive)
   */
  getCalendar(start: string, end: string): Promise<TradingSession[]>;

  /**
   * Submit a buy order
   * @throws OrderSubmissionException if the broker rejects the order
   */
  placeBuyOrder(order: BuyOrderRequest): Promise<BuyOrderResponse>;
}

export const BROKERAGE_ADAPTER = 'IBrokerageAdapter';
