import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import { Decimal } from 'decimal.js';
import { z } from 'zod';
import {
  AccountSnapshot,
  IBrokerageAdapter,
  PositionSnapshot,
  TradingSession,
} from '../../../domain/ports/IBrokerageAdapter';
import {
  BuyOrderRequest,
  BuyOrderResponse,
  OrderStatus,
} from '../../../domain/value-objects/BuyOrder';
import {
  BrokerageException,
  DomainException,
  OrderSubmissionException,
} from '../../../domain/exceptions/DomainException';

const BROKER_NAME = 'Alpaca';

const accountSchema = z.object({
  equity: z.string(),
  cash: z.string(),
  buying_power: z.string(),
});

const positionSchema = z.object({
  symbol: z.string(),
  qty: z.string(),
  market_value: z.string().nullish(),
  current_price: z.string().nullish(),
});

const calendarSchema = z.array(
  z.object({
    date: z.string(),
    open: z.string(),
    close: z.string(),
  }),
);

const orderSchema = z.object({
  id: z.string(),
  client_order_id: z.string().nullish(),
  symbol: z.string(),
  qty: z.string().nullish(),
  status: z.string(),
  submitted_at: z.string().nullish(),
});

const ORDER_STATUSES: readonly string[] = Object.values(OrderStatus);

function isOrderStatus(value: string): value is OrderStatus {
  return ORDER_STATUSES.includes(value);
}

/**
 * Parse a numeric string from the broker, or undefined if it is not a number
 */
function parseDecimal(value: string | null | undefined): Decimal | undefined {
  if (value === null || value === undefined || value.trim() === '') {
    return undefined;
  }
  try {
    const parsed = new Decimal(value);
    return parsed.isFinite() ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function describeError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    const body = data && typeof data === 'object' && 'message' in data ? String(data.message) : undefined;
    const status = error.response?.status;
    return [status ? `HTTP ${status}` : undefined, body ?? error.message]
      .filter((part) => part !== undefined)
      .join(': ');
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * AlpacaBrokerageAdapter - Implements IBrokerageAdapter over the Alpaca
 * trading API v2
 *
 * Paper trading by default; point APCA_API_BASE_URL at the live endpoint to
 * trade for real.
 */
@Injectable()
export class AlpacaBrokerageAdapter implements IBrokerageAdapter {
  private readonly logger = new Logger(AlpacaBrokerageAdapter.name);
  private readonly client: AxiosInstance;
  private readonly baseUrl: string;

  constructor(private readonly configService: ConfigService) {
    this.baseUrl =
      this.configService.get<string>('APCA_API_BASE_URL') ||
      'https://paper-api.alpaca.markets';
    const keyId = this.configService.get<string>('APCA_API_KEY_ID');
    const secretKey = this.configService.get<string>('APCA_API_SECRET_KEY');

    if (!keyId) {
      throw new Error('Alpaca adapter requires APCA_API_KEY_ID');
    }
    if (!secretKey) {
      throw new Error('Alpaca adapter requires APCA_API_SECRET_KEY');
    }

    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: 30000,
      headers: {
        'APCA-API-KEY-ID': keyId,
        'APCA-API-SECRET-KEY': secretKey,
        'Content-Type': 'application/json',
      },
    });
  }

  getBrokerName(): string {
    return BROKER_NAME;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  async getAccount(): Promise<AccountSnapshot> {
    const data = await this.request('fetch account', () => this.client.get('/v2/account'));
    const parsed = accountSchema.safeParse(data);
    if (!parsed.success) {
      throw new BrokerageException('Unexpected account payload', BROKER_NAME, {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const equity = parseDecimal(parsed.data.equity);
    const cash = parseDecimal(parsed.data.cash);
    const buyingPower = parseDecimal(parsed.data.buying_power);
    if (!equity || !cash || !buyingPower) {
      throw new BrokerageException('Account balances are not numeric', BROKER_NAME, {
        account: parsed.data,
      });
    }

    return { equity, cash, buyingPower };
  }

  async getPositions(): Promise<PositionSnapshot[]> {
    const data = await this.request('fetch positions', () => this.client.get('/v2/positions'));
    if (!Array.isArray(data)) {
      throw new BrokerageException('Unexpected positions payload', BROKER_NAME);
    }

    const positions: PositionSnapshot[] = [];
    for (const item of data) {
      const parsed = positionSchema.safeParse(item);
      if (!parsed.success) {
        this.logger.warn(`Skipping malformed position: ${JSON.stringify(item)}`);
        continue;
      }

      const { symbol } = parsed.data;
      const marketValue = parseDecimal(parsed.data.market_value);
      const currentPrice = parseDecimal(parsed.data.current_price);
      const quantity = parseDecimal(parsed.data.qty);

      if (!marketValue || marketValue.isNegative()) {
        this.logger.warn(`Skipping ${symbol}: no usable market value`);
        continue;
      }
      if (!currentPrice || currentPrice.lte(0)) {
        this.logger.warn(`Skipping ${symbol}: no positive current price`);
        continue;
      }

      positions.push({
        symbol,
        marketValue,
        currentPrice,
        quantity: quantity ?? new Decimal(0),
      });
    }

    return positions;
  }

  async getCalendar(start: string, end: string): Promise<TradingSession[]> {
    const data = await this.request('fetch calendar', () =>
      this.client.get('/v2/calendar', { params: { start, end } }),
    );
    const parsed = calendarSchema.safeParse(data);
    if (!parsed.success) {
      throw new BrokerageException('Unexpected calendar payload', BROKER_NAME, {
        start,
        end,
      });
    }

    return parsed.data.map(({ date, open, close }) => ({ date, open, close }));
  }

  async placeBuyOrder(order: BuyOrderRequest): Promise<BuyOrderResponse> {
    this.logger.log(
      `Placing limit buy: ${order.quantity} ${order.symbol} @ $${order.formattedLimitPrice()} (${order.timeInForce})`,
    );

    let data: unknown;
    try {
      const response = await this.client.post('/v2/orders', {
        symbol: order.symbol,
        qty: String(order.quantity),
        side: 'buy',
        type: 'limit',
        time_in_force: order.timeInForce,
        limit_price: order.formattedLimitPrice(),
        ...(order.clientOrderId ? { client_order_id: order.clientOrderId } : {}),
      });
      data = response.data;
    } catch (error: unknown) {
      const message = describeError(error);
      this.logger.error(`Failed to place order for ${order.symbol}: ${message}`);
      throw new OrderSubmissionException(message, order.symbol, BROKER_NAME);
    }

    const parsed = orderSchema.safeParse(data);
    if (!parsed.success) {
      throw new OrderSubmissionException('Unexpected order payload', order.symbol, BROKER_NAME);
    }

    const status = isOrderStatus(parsed.data.status) ? parsed.data.status : OrderStatus.NEW;
    const submittedAt = parsed.data.submitted_at ? new Date(parsed.data.submitted_at) : new Date();

    const response = new BuyOrderResponse(
      parsed.data.id,
      parsed.data.symbol,
      order.quantity,
      status,
      Number.isNaN(submittedAt.getTime()) ? new Date() : submittedAt,
      parsed.data.client_order_id ?? undefined,
    );

    if (response.isRejected()) {
      throw new OrderSubmissionException('Order rejected by broker', order.symbol, BROKER_NAME, {
        orderId: response.orderId,
      });
    }

    this.logger.log(`Order placed: ${response.orderId} (${parsed.data.status})`);
    return response;
  }

  private async request(
    action: string,
    call: () => Promise<{ data: unknown }>,
  ): Promise<unknown> {
    try {
      const response = await call();
      return response.data;
    } catch (error: unknown) {
      if (error instanceof DomainException) {
        throw error;
      }
      const message = describeError(error);
      this.logger.error(`Failed to ${action}: ${message}`);
      throw new BrokerageException(`Failed to ${action}: ${message}`, BROKER_NAME);
    }
  }
}
