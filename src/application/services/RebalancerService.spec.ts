import { Test, TestingModule } from '@nestjs/testing';
import { Decimal } from 'decimal.js';
import { RebalancerService } from './RebalancerService';
import { Checkpoint } from '../../domain/entities/Checkpoint';
import {
  BROKERAGE_ADAPTER,
  IBrokerageAdapter,
  PositionSnapshot,
} from '../../domain/ports/IBrokerageAdapter';
import {
  CHECKPOINT_REPOSITORY,
  ICheckpointRepository,
} from '../../domain/ports/ICheckpointRepository';
import { FundingScheduler } from '../../domain/services/FundingScheduler';
import { TradingCalendar } from '../../domain/services/TradingCalendar';
import { AllocationPlanner } from '../../domain/services/allocation/AllocationPlanner';
import {
  BuyOrderRequest,
  BuyOrderResponse,
  OrderStatus,
} from '../../domain/value-objects/BuyOrder';
import { RebalancerConfig } from '../../domain/value-objects/RebalancerConfig';
import {
  CheckpointInitializationException,
  FundingPreconditionException,
  OrderSubmissionException,
} from '../../domain/exceptions/DomainException';

const DAY = 24 * 60 * 60 * 1000;

describe('RebalancerService', () => {
  let service: RebalancerService;
  let brokerage: jest.Mocked<IBrokerageAdapter>;
  let repository: jest.Mocked<ICheckpointRepository>;

  const now = new Date('2025-06-02T15:30:00.000Z');

  const position = (symbol: string, marketValue: number, price: number): PositionSnapshot => ({
    symbol,
    marketValue: new Decimal(marketValue),
    currentPrice: new Decimal(price),
    quantity: new Decimal(marketValue / price),
  });

  // VTI is overweight against a 50/50 target, so every increment goes to BND
  const positions = [position('VTI', 600, 4), position('BND', 400, 3)];

  const storedCheckpoint = new Checkpoint(
    null,
    { VTI: 600, BND: 400 },
    { VTI: 0.5, BND: 0.5 },
    1,
    new Date(now.getTime() + 100 * DAY),
  );

  const account = (equity: number, cash: number, buyingPower: number) => ({
    equity: new Decimal(equity),
    cash: new Decimal(cash),
    buyingPower: new Decimal(buyingPower),
  });

  const createService = async (config: RebalancerConfig): Promise<RebalancerService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        RebalancerService,
        FundingScheduler,
        AllocationPlanner,
        TradingCalendar,
        { provide: RebalancerConfig, useValue: config },
        { provide: BROKERAGE_ADAPTER, useValue: brokerage },
        { provide: CHECKPOINT_REPOSITORY, useValue: repository },
      ],
    }).compile();

    return module.get<RebalancerService>(RebalancerService);
  };

  beforeEach(async () => {
    let orderCount = 0;
    brokerage = {
      getBrokerName: jest.fn().mockReturnValue('Test'),
      // invested 1000 of 2000 with 100 days left: $10 a day
      getAccount: jest.fn().mockResolvedValue(account(2000, 1000, 1000)),
      getPositions: jest.fn().mockResolvedValue(positions),
      getCalendar: jest.fn().mockResolvedValue([]),
      placeBuyOrder: jest.fn((order: BuyOrderRequest) => {
        orderCount += 1;
        return Promise.resolve(
          new BuyOrderResponse(`order-${orderCount}`, order.symbol, order.quantity, OrderStatus.ACCEPTED),
        );
      }),
    } as any;

    repository = {
      load: jest.fn().mockResolvedValue(storedCheckpoint),
      save: jest.fn().mockResolvedValue(undefined),
    } as any;

    service = await createService(RebalancerConfig.withDefaults('test-state.json'));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('loadOrInitializeCheckpoint', () => {
    it('should return the stored checkpoint', async () => {
      const checkpoint = await service.loadOrInitializeCheckpoint(now);

      expect(checkpoint).toBe(storedCheckpoint);
      expect(service.getCheckpoint()).toBe(storedCheckpoint);
      expect(brokerage.getPositions).not.toHaveBeenCalled();
      expect(repository.save).not.toHaveBeenCalled();
    });

    it('should sample the portfolio when nothing is stored', async () => {
      repository.load.mockResolvedValue(null);

      const checkpoint = await service.loadOrInitializeCheckpoint(now);

      expect(checkpoint.idealAllocations).toEqual({ VTI: 0.6, BND: 0.4 });
      expect(checkpoint.referenceEquities).toEqual({ VTI: 600, BND: 400 });
      expect(checkpoint.isNeverFunded()).toBe(true);
      expect(checkpoint.finishDate.toISOString()).toBe('2026-06-02T15:30:00.000Z');
      expect(repository.save).toHaveBeenCalledWith(checkpoint);
    });

    it('should refuse to initialize from an empty portfolio', async () => {
      repository.load.mockResolvedValue(null);
      brokerage.getPositions.mockResolvedValue([]);

      await expect(service.loadOrInitializeCheckpoint(now)).rejects.toThrow(
        CheckpointInitializationException,
      );
      expect(repository.save).not.toHaveBeenCalled();
    });
  });

  describe('resolveNextFundingTime', () => {
    it('should look up sessions from one day after the last funding', async () => {
      repository.load.mockResolvedValue(
        storedCheckpoint.withFundingDate(new Date('2025-06-02T14:30:00.000Z')),
      );
      brokerage.getCalendar.mockResolvedValue([
        { date: '2025-06-03', open: '09:30', close: '16:00' },
        { date: '2025-06-04', open: '09:30', close: '16:00' },
      ]);

      const next = await service.resolveNextFundingTime(new Date('2025-06-02T18:00:00.000Z'));

      expect(brokerage.getCalendar).toHaveBeenCalledWith('2025-06-03', '2025-06-10');
      expect(next.toISOString()).toBe('2025-06-03T14:30:00.000Z');
    });

    it('should look past a session that was already attempted', async () => {
      brokerage.getCalendar.mockResolvedValue([{ date: '2025-06-04', open: '09:30', close: '16:00' }]);

      const next = await service.resolveNextFundingTime(
        new Date('2025-06-03T15:00:00.000Z'),
        new Date('2025-06-03T14:30:00.000Z'),
      );

      expect(brokerage.getCalendar).toHaveBeenCalledWith('2025-06-04', '2025-06-11');
      expect(next.toISOString()).toBe('2025-06-04T14:30:00.000Z');
    });

    it('should keep the last funding when it is later than the last attempt', async () => {
      repository.load.mockResolvedValue(
        storedCheckpoint.withFundingDate(new Date('2025-06-04T14:30:00.000Z')),
      );
      brokerage.getCalendar.mockResolvedValue([{ date: '2025-06-05', open: '09:30', close: '16:00' }]);

      await service.resolveNextFundingTime(
        new Date('2025-06-04T15:00:00.000Z'),
        new Date('2025-06-03T14:30:00.000Z'),
      );

      expect(brokerage.getCalendar).toHaveBeenCalledWith('2025-06-05', '2025-06-12');
    });

    it('should fail when the broker returns no sessions', async () => {
      await expect(service.resolveNextFundingTime(now)).rejects.toThrow(
        'No trading session in the calendar window',
      );
    });
  });

  describe('runFundingCycle', () => {
    it('should submit each purchase in plan order and advance the checkpoint', async () => {
      const result = await service.runFundingCycle(now);

      expect(brokerage.placeBuyOrder).toHaveBeenCalledTimes(3);
      for (const [order] of brokerage.placeBuyOrder.mock.calls) {
        expect(order.symbol).toBe('BND');
        expect(order.quantity).toBe(1);
        expect(order.formattedLimitPrice()).toBe('3.00');
      }

      expect(result.outcome).toBe('funded');
      expect(result.decision.fundingToday).toBe(10);
      expect(result.orders.map((o) => o.orderId)).toEqual(['order-1', 'order-2', 'order-3']);
      expect(result.unsizedPurchases).toEqual([]);

      expect(repository.save).toHaveBeenCalledTimes(1);
      const saved = repository.save.mock.calls[0][0];
      expect(saved.lastFundingDate).toBe(result.completedAt);
      expect(saved.idealAllocations).toEqual({ VTI: 0.5, BND: 0.5 });
      expect(service.getCheckpoint()).toBe(saved);
      expect(service.getLastResult()).toBe(result);
    });

    it('should skip the cycle when there is nothing to fund', async () => {
      brokerage.getAccount.mockResolvedValue(account(2000, 0, 1000));

      const result = await service.runFundingCycle(now);

      expect(result.outcome).toBe('skipped');
      expect(result.decision.fundingToday).toBe(0);
      expect(brokerage.getPositions).not.toHaveBeenCalled();
      expect(brokerage.placeBuyOrder).not.toHaveBeenCalled();
      expect(repository.save).not.toHaveBeenCalled();
    });

    it('should stop at the first failed order and keep the checkpoint', async () => {
      brokerage.placeBuyOrder
        .mockResolvedValueOnce(new BuyOrderResponse('order-1', 'BND', 1, OrderStatus.ACCEPTED))
        .mockRejectedValueOnce(new OrderSubmissionException('insufficient buying power', 'BND', 'Test'));

      await expect(service.runFundingCycle(now)).rejects.toThrow(OrderSubmissionException);

      expect(brokerage.placeBuyOrder).toHaveBeenCalledTimes(2);
      expect(repository.save).not.toHaveBeenCalled();
      expect(service.getLastResult()).toBeNull();
    });

    it('should propagate funding precondition violations', async () => {
      brokerage.getAccount.mockResolvedValue(account(2000, 1000, 5));

      await expect(service.runFundingCycle(now)).rejects.toThrow(FundingPreconditionException);
      expect(brokerage.placeBuyOrder).not.toHaveBeenCalled();
    });

    it('should skip purchases that do not size to a whole share', async () => {
      jest.spyOn(BuyOrderRequest, 'forFunds').mockReturnValueOnce(null);

      const result = await service.runFundingCycle(now);

      expect(brokerage.placeBuyOrder).toHaveBeenCalledTimes(2);
      expect(result.unsizedPurchases).toEqual([{ symbol: 'BND', amount: 3, price: 3 }]);
      expect(repository.save).toHaveBeenCalledTimes(1);
    });

    it('should only log orders in dry-run mode', async () => {
      const dryRunService = await createService(RebalancerConfig.withDefaults('test-state.json', true));

      const result = await dryRunService.runFundingCycle(now);

      expect(brokerage.placeBuyOrder).not.toHaveBeenCalled();
      expect(result.dryRun).toBe(true);
      expect(result.orders).toHaveLength(3);
      expect(result.orders[0]).toEqual({
        symbol: 'BND',
        amount: 3,
        quantity: 1,
        limitPrice: '3.00',
        orderId: null,
        status: 'dry_run',
      });
      expect(repository.save).toHaveBeenCalledTimes(1);
    });
  });

  describe('previewFundingCycle', () => {
    it('should plan without submitting or saving', async () => {
      const preview = await service.previewFundingCycle(now);

      expect(preview.decision.fundingToday).toBe(10);
      expect(preview.purchases).toEqual([
        { symbol: 'BND', amount: 3, price: 3 },
        { symbol: 'BND', amount: 3, price: 3 },
        { symbol: 'BND', amount: 3, price: 3 },
      ]);
      expect(preview.totalPlanned).toBe(9);
      expect(preview.projectedEquities).toEqual({ VTI: 600, BND: 409 });
      expect(brokerage.placeBuyOrder).not.toHaveBeenCalled();
      expect(repository.save).not.toHaveBeenCalled();
    });

    it('should preview against an unsaved sample when nothing is stored', async () => {
      repository.load.mockResolvedValue(null);

      const preview = await service.previewFundingCycle(now);

      // sampled finish date is a year out: 1000 / 365 buys nothing at 3 or 4
      expect(preview.decision.daysRemaining).toBe(365);
      expect(preview.decision.fundingToday).toBeCloseTo(2.7397, 4);
      expect(preview.purchases).toEqual([]);
      expect(repository.save).not.toHaveBeenCalled();
      expect(service.getCheckpoint()).toBeNull();
    });
  });
});
