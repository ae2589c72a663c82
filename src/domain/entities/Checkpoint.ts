import { CheckpointInitializationException } from '../exceptions/DomainException';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Market value of one position when the checkpoint is sampled
 */
export interface SampledHolding {
  symbol: string;
  marketValue: number;
}

export interface CheckpointDefaults {
  targetInvestmentEquityRatio: number;
  horizonDays: number;
}

/**
 * Checkpoint entity - persisted funding state and ideal allocation
 *
 * Only `lastFundingDate` changes after creation, and only once a whole
 * funding cycle has been submitted.
 */
export class Checkpoint {
  constructor(
    public readonly lastFundingDate: Date | null, // null until the first funded cycle
    public readonly referenceEquities: Readonly<Record<string, number>>,
    public readonly idealAllocations: Readonly<Record<string, number>>,
    public readonly targetInvestmentEquityRatio: number, // Target (equity - cash) / equity
    public readonly finishDate: Date,
  ) {
    if (!(targetInvestmentEquityRatio >= 0 && targetInvestmentEquityRatio <= 1)) {
      throw new Error(
        `targetInvestmentEquityRatio must be between 0 and 1, got ${targetInvestmentEquityRatio}`,
      );
    }

    if (Number.isNaN(finishDate.getTime())) {
      throw new Error('finishDate must be a valid date');
    }
  }

  /**
   * Sample the live portfolio: the ideal allocation is each position's
   * current share of the invested total.
   */
  static fromHoldings(
    holdings: readonly SampledHolding[],
    defaults: CheckpointDefaults,
    now: Date = new Date(),
  ): Checkpoint {
    const totalInvested = holdings.reduce((sum, h) => sum + h.marketValue, 0);
    if (!(totalInvested > 0)) {
      throw new CheckpointInitializationException(
        'Cannot derive an ideal allocation from a portfolio with no invested value',
        { positions: holdings.length, totalInvested },
      );
    }

    const referenceEquities: Record<string, number> = {};
    const idealAllocations: Record<string, number> = {};
    for (const holding of holdings) {
      referenceEquities[holding.symbol] = holding.marketValue;
      idealAllocations[holding.symbol] = holding.marketValue / totalInvested;
    }

    return new Checkpoint(
      null,
      referenceEquities,
      idealAllocations,
      defaults.targetInvestmentEquityRatio,
      new Date(now.getTime() + defaults.horizonDays * MS_PER_DAY),
    );
  }

  isNeverFunded(): boolean {
    return this.lastFundingDate === null;
  }

  /**
   * Returns a copy recording a completed funding cycle
   */
  withFundingDate(fundedAt: Date): Checkpoint {
    return new Checkpoint(
      fundedAt,
      this.referenceEquities,
      this.idealAllocations,
      this.targetInvestmentEquityRatio,
      this.finishDate,
    );
  }

  /**
   * Ideal fraction per symbol, in the given order. Symbols outside the
   * allocation get 0.
   */
  idealFractionsFor(symbols: readonly string[]): number[] {
    return symbols.map((symbol) => this.idealAllocations[symbol] ?? 0);
  }
}
