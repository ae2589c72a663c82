import { Inject, Injectable, Logger } from '@nestjs/common';
import { Checkpoint } from '../../domain/entities/Checkpoint';
import { AssetState } from '../../domain/entities/AssetState';
import {
  BROKERAGE_ADAPTER,
  IBrokerageAdapter,
} from '../../domain/ports/IBrokerageAdapter';
import {
  CHECKPOINT_REPOSITORY,
  ICheckpointRepository,
} from '../../domain/ports/ICheckpointRepository';
import { FundingDecision, FundingScheduler } from '../../domain/services/FundingScheduler';
import { TradingCalendar } from '../../domain/services/TradingCalendar';
import {
  AllocationPlanner,
  PurchasePlan,
} from '../../domain/services/allocation/AllocationPlanner';
import { BuyOrderRequest, OrderStatus } from '../../domain/value-objects/BuyOrder';
import { RebalancerConfig } from '../../domain/value-objects/RebalancerConfig';

/**
 * One increment chosen by the planner
 */
export interface PlannedPurchase {
  symbol: string;
  amount: number;
  price: number;
}

export interface SubmittedOrder {
  symbol: string;
  amount: number;
  quantity: number;
  limitPrice: string;
  orderId: string | null; // null in dry-run mode
  status: OrderStatus | 'dry_run';
}

export interface FundingPreview {
  generatedAt: Date;
  decision: FundingDecision;
  purchases: PlannedPurchase[];
  totalPlanned: number;
  projectedEquities: Record<string, number>;
}

export interface FundingCycleResult {
  outcome: 'skipped' | 'funded';
  startedAt: Date;
  completedAt: Date;
  dryRun: boolean;
  decision: FundingDecision;
  orders: SubmittedOrder[];
  unsizedPurchases: PlannedPurchase[]; // Increments too small for one whole share
}

interface PreparedCycle {
  decision: FundingDecision;
  assets: AssetState[];
  plan: PurchasePlan;
}

/**
 * RebalancerService - Runs one funding cycle against the brokerage
 *
 * Loads (or samples) the checkpoint, works out today's budget, plans the
 * purchases and submits them in plan order. The checkpoint only moves forward
 * once every order of the plan went through.
 */
@Injectable()
export class RebalancerService {
  private readonly logger = new Logger(RebalancerService.name);
  private checkpoint: Checkpoint | null = null;
  private lastResult: FundingCycleResult | null = null;

  constructor(
    @Inject(BROKERAGE_ADAPTER) private readonly brokerage: IBrokerageAdapter,
    @Inject(CHECKPOINT_REPOSITORY) private readonly repository: ICheckpointRepository,
    private readonly fundingScheduler: FundingScheduler,
    private readonly planner: AllocationPlanner,
    private readonly calendar: TradingCalendar,
    private readonly config: RebalancerConfig,
  ) {}

  getCheckpoint(): Checkpoint | null {
    return this.checkpoint;
  }

  getLastResult(): FundingCycleResult | null {
    return this.lastResult;
  }

  /**
   * Load the stored checkpoint, or sample the live portfolio and store a new one
   */
  async loadOrInitializeCheckpoint(now: Date = new Date()): Promise<Checkpoint> {
    const stored = await this.loadCheckpoint();
    if (stored) {
      return stored;
    }

    const checkpoint = await this.sampleCheckpoint(now);
    await this.repository.save(checkpoint);

    this.logger.log(
      `Initialized checkpoint: ` +
        Object.entries(checkpoint.idealAllocations)
          .map(([symbol, fraction]) => `${symbol}=${(fraction * 100).toFixed(2)}%`)
          .join(', ') +
        `; finish ${checkpoint.finishDate.toISOString()}`,
    );

    this.checkpoint = checkpoint;
    return checkpoint;
  }

  /**
   * UTC instant of the next funding cycle.
   *
   * `lastAttemptedAt` is the funding time of the last cycle that ran, whatever
   * its outcome; the next cycle falls on a later session than both it and the
   * last funding.
   */
  async resolveNextFundingTime(
    now: Date = new Date(),
    lastAttemptedAt: Date | null = null,
  ): Promise<Date> {
    const checkpoint = await this.loadOrInitializeCheckpoint(now);
    const lastFundingDate = checkpoint.lastFundingDate;
    const after =
      lastAttemptedAt && (!lastFundingDate || lastAttemptedAt > lastFundingDate)
        ? lastAttemptedAt
        : lastFundingDate;
    const earliest = this.calendar.earliestFundingTime(now, after);
    const window = this.calendar.calendarWindow(
      earliest,
      this.config.timeZone,
      this.config.calendarLookaheadDays,
    );

    const sessions = await this.brokerage.getCalendar(window.start, window.end);
    const next = this.calendar.nextFundingTime(
      sessions,
      this.config.openOffsetMinutes,
      this.config.timeZone,
    );

    this.logger.log(
      `Next funding at ${next.toISOString()} (earliest ${earliest.toISOString()}, ` +
        `${sessions.length} sessions in ${window.start}..${window.end})`,
    );
    return next;
  }

  /**
   * Today's budget and plan, without submitting anything or touching the checkpoint.
   * With no stored checkpoint the plan runs against an unsaved sample.
   */
  async previewFundingCycle(now: Date = new Date()): Promise<FundingPreview> {
    const checkpoint = (await this.loadCheckpoint()) ?? (await this.sampleCheckpoint(now));
    const { decision, assets, plan } = await this.prepareCycle(checkpoint, now);
    const purchases = this.describePurchases(assets, plan);

    return {
      generatedAt: now,
      decision,
      purchases,
      totalPlanned: AllocationPlanner.totalAmount(plan),
      projectedEquities: Object.fromEntries(
        assets.map((asset, i) => [asset.symbol, plan.equities[i]]),
      ),
    };
  }

  /**
   * Run one funding cycle.
   *
   * @throws FundingPreconditionException when the cycle cannot be funded
   * @throws OrderSubmissionException on the first failed order; orders
   *   already placed stand and the checkpoint is left as it was
   */
  async runFundingCycle(now: Date = new Date()): Promise<FundingCycleResult> {
    const checkpoint = await this.loadOrInitializeCheckpoint(now);
    const { decision, assets, plan } = await this.prepareCycle(checkpoint, now);

    if (!this.fundingScheduler.shouldFund(decision)) {
      this.logger.log(
        `Nothing to fund today (daily $${decision.dailyFunding.toFixed(2)} x ${decision.daysElapsed} days)`,
      );
      const skipped: FundingCycleResult = {
        outcome: 'skipped',
        startedAt: now,
        completedAt: new Date(),
        dryRun: this.config.dryRun,
        decision,
        orders: [],
        unsizedPurchases: [],
      };
      this.lastResult = skipped;
      return skipped;
    }

    this.logger.log(
      `Funding $${decision.fundingToday.toFixed(2)} across ${plan.purchases.length} purchases` +
        (this.config.dryRun ? ' (dry run)' : ''),
    );

    const orders: SubmittedOrder[] = [];
    const unsizedPurchases: PlannedPurchase[] = [];

    for (const purchase of this.describePurchases(assets, plan)) {
      const order = BuyOrderRequest.forFunds(
        purchase.symbol,
        purchase.price,
        purchase.amount,
        this.config.limitDiscount,
      );

      if (!order) {
        this.logger.warn(
          `Skipping ${purchase.symbol}: $${purchase.amount.toFixed(2)} does not buy one share at the limit price`,
        );
        unsizedPurchases.push(purchase);
        continue;
      }

      if (this.config.dryRun) {
        this.logger.log(
          `[DRY RUN] Would buy ${order.quantity} ${order.symbol} @ $${order.formattedLimitPrice()} ` +
            `($${order.notional().toFixed(2)})`,
        );
        orders.push({
          symbol: order.symbol,
          amount: purchase.amount,
          quantity: order.quantity,
          limitPrice: order.formattedLimitPrice(),
          orderId: null,
          status: 'dry_run',
        });
        continue;
      }

      try {
        const response = await this.brokerage.placeBuyOrder(order);
        orders.push({
          symbol: order.symbol,
          amount: purchase.amount,
          quantity: order.quantity,
          limitPrice: order.formattedLimitPrice(),
          orderId: response.orderId,
          status: response.status,
        });
      } catch (error: unknown) {
        this.logger.error(
          `Aborting funding cycle after ${orders.length} placed orders; checkpoint not advanced`,
        );
        throw error;
      }
    }

    const fundedAt = new Date();
    const funded = this.fundingScheduler.markFunded(checkpoint, fundedAt);
    await this.repository.save(funded);
    this.checkpoint = funded;

    const result: FundingCycleResult = {
      outcome: 'funded',
      startedAt: now,
      completedAt: fundedAt,
      dryRun: this.config.dryRun,
      decision,
      orders,
      unsizedPurchases,
    };
    this.lastResult = result;

    this.logger.log(
      `Funding cycle complete: ${orders.length} orders, ${unsizedPurchases.length} skipped, ` +
        `checkpoint advanced to ${fundedAt.toISOString()}`,
    );
    return result;
  }

  private async loadCheckpoint(): Promise<Checkpoint | null> {
    const stored = await this.repository.load();
    if (stored) {
      this.checkpoint = stored;
    }
    return stored;
  }

  private async sampleCheckpoint(now: Date): Promise<Checkpoint> {
    const positions = await this.brokerage.getPositions();
    return Checkpoint.fromHoldings(
      positions.map((position) => ({
        symbol: position.symbol,
        marketValue: position.marketValue.toNumber(),
      })),
      this.config.checkpointDefaults,
      now,
    );
  }

  private async prepareCycle(checkpoint: Checkpoint, now: Date): Promise<PreparedCycle> {
    const account = await this.brokerage.getAccount();
    const decision = this.fundingScheduler.computeFunding(
      checkpoint,
      {
        equity: account.equity.toNumber(),
        cash: account.cash.toNumber(),
        buyingPower: account.buyingPower.toNumber(),
      },
      now,
    );

    if (!this.fundingScheduler.shouldFund(decision)) {
      return { decision, assets: [], plan: { purchases: [], equities: [] } };
    }

    const positions = await this.brokerage.getPositions();
    const assets = positions.map((position) => AssetState.fromSnapshot(position));
    const plan = this.planner.plan(
      assets.map((asset) => asset.equity),
      assets.map((asset) => asset.price),
      checkpoint.idealFractionsFor(assets.map((asset) => asset.symbol)),
      decision.fundingToday,
    );

    return { decision, assets, plan };
  }

  private describePurchases(assets: readonly AssetState[], plan: PurchasePlan): PlannedPurchase[] {
    return plan.purchases.map(({ assetIndex, amount }) => ({
      symbol: assets[assetIndex].symbol,
      amount,
      price: assets[assetIndex].price,
    }));
  }
}
