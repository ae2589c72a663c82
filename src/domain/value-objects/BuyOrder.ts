import { Decimal } from 'decimal.js';
import { Percentage } from './Percentage';

export enum TimeInForce {
  DAY = 'day',
  GTC = 'gtc',
}

export enum OrderStatus {
  NEW = 'new',
  ACCEPTED = 'accepted',
  PENDING_NEW = 'pending_new',
  PARTIALLY_FILLED = 'partially_filled',
  FILLED = 'filled',
  CANCELED = 'canceled',
  EXPIRED = 'expired',
  REJECTED = 'rejected',
}

/** Limit orders sit this far below the reference price by default (0.1%) */
export const DEFAULT_LIMIT_DISCOUNT = Percentage.fromDecimal(0.001);

/**
 * BuyOrderRequest - Value object for a whole-share limit buy
 */
export class BuyOrderRequest {
  constructor(
    public readonly symbol: string,
    public readonly quantity: number, // Whole shares
    public readonly limitPrice: Decimal, // Sent to the broker with 2 decimals
    public readonly timeInForce: TimeInForce = TimeInForce.DAY,
    public readonly clientOrderId?: string,
  ) {
    if (!Number.isInteger(quantity) || quantity <= 0) {
      throw new Error(`Order quantity must be a positive whole number, got ${quantity}`);
    }

    if (limitPrice.lte(0)) {
      throw new Error('Limit price must be greater than 0');
    }
  }

  /**
   * Size a limit buy for a dollar amount.
   *
   * The limit sits `discount` below `referencePrice`; the quantity is the
   * number of whole shares the amount buys at the unrounded limit. Returns null
   * when the amount does not cover a single share.
   */
  static forFunds(
    symbol: string,
    referencePrice: Decimal.Value,
    dollarAmount: Decimal.Value,
    discount: Percentage = DEFAULT_LIMIT_DISCOUNT,
  ): BuyOrderRequest | null {
    const funds = new Decimal(dollarAmount);
    if (funds.lte(0)) {
      throw new Error(`Order funds must be greater than 0, got ${funds.toString()}`);
    }

    const limitPrice = new Decimal(referencePrice).mul(discount.complement().toDecimal());
    if (limitPrice.lte(0)) {
      throw new Error(`Limit price for ${symbol} must be greater than 0`);
    }

    const quantity = funds.div(limitPrice).floor().toNumber();
    if (quantity === 0) {
      return null;
    }

    return new BuyOrderRequest(
      symbol,
      quantity,
      limitPrice.toDecimalPlaces(2, Decimal.ROUND_HALF_UP),
    );
  }

  /**
   * Limit price formatted for the broker (e.g. "99.90")
   */
  formattedLimitPrice(): string {
    return this.limitPrice.toFixed(2);
  }

  /**
   * Notional value at the limit price
   */
  notional(): Decimal {
    return this.limitPrice.mul(this.quantity);
  }
}

/**
 * BuyOrderResponse - Value object for an accepted order
 */
export class BuyOrderResponse {
  constructor(
    public readonly orderId: string,
    public readonly symbol: string,
    public readonly quantity: number,
    public readonly status: OrderStatus,
    public readonly submittedAt: Date = new Date(),
    public readonly clientOrderId?: string,
  ) {
    if (!orderId) {
      throw new Error('Order ID is required');
    }
  }

  isRejected(): boolean {
    return this.status === OrderStatus.REJECTED;
  }
}
