import { Injectable, Logger } from '@nestjs/common';
import { Checkpoint } from '../entities/Checkpoint';
import { FundingPreconditionException } from '../exceptions/DomainException';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Account figures the funding decision depends on
 */
export interface FundingAccountState {
  equity: number;
  cash: number;
  buyingPower: number;
}

/**
 * FundingDecision - How much to invest today and how it was derived
 */
export interface FundingDecision {
  totalInvested: number;
  daysRemaining: number;
  additionalNeeded: number;
  dailyFunding: number;
  daysElapsed: number;
  fundingToday: number;
}

/**
 * Whole days from `from` to `to`, truncated toward zero
 */
export function wholeDaysBetween(from: Date, to: Date): number {
  return Math.trunc((to.getTime() - from.getTime()) / MS_PER_DAY);
}

/**
 * FundingScheduler - Decides today's dollar budget
 *
 * Spreads the gap between the target invested ratio and what is already
 * invested evenly over the days left until the finish date. Days skipped
 * since the last funded cycle are caught up in one go; the first cycle funds
 * a single day.
 */
@Injectable()
export class FundingScheduler {
  private readonly logger = new Logger(FundingScheduler.name);

  /**
   * @throws FundingPreconditionException when the finish date has been
   *   reached or buying power does not cover one day of funding
   */
  computeFunding(
    checkpoint: Checkpoint,
    account: FundingAccountState,
    now: Date,
  ): FundingDecision {
    const totalInvested = account.equity - account.cash;
    const daysRemaining = wholeDaysBetween(now, checkpoint.finishDate);

    if (!(daysRemaining > 0)) {
      throw new FundingPreconditionException(
        `Finish date ${checkpoint.finishDate.toISOString()} leaves ${daysRemaining} whole days of funding`,
        'DAYS_REMAINING',
        { finishDate: checkpoint.finishDate.toISOString(), now: now.toISOString(), daysRemaining },
      );
    }

    const additionalNeeded =
      account.equity * checkpoint.targetInvestmentEquityRatio - totalInvested;
    const dailyFunding = Math.max(0, additionalNeeded / daysRemaining);

    if (!(dailyFunding >= 0)) {
      throw new FundingPreconditionException(
        `Daily funding must be non-negative, got ${dailyFunding}`,
        'DAILY_FUNDING',
        { additionalNeeded, daysRemaining },
      );
    }

    if (!(account.buyingPower >= dailyFunding)) {
      throw new FundingPreconditionException(
        `Buying power $${account.buyingPower.toFixed(2)} does not cover daily funding $${dailyFunding.toFixed(2)}`,
        'BUYING_POWER',
        { buyingPower: account.buyingPower, dailyFunding },
      );
    }

    const daysElapsed = checkpoint.lastFundingDate
      ? wholeDaysBetween(checkpoint.lastFundingDate, now)
      : 1;
    const fundingToday = dailyFunding * daysElapsed;

    this.logger.debug(
      `Funding: invested=$${totalInvested.toFixed(2)}, needed=$${additionalNeeded.toFixed(2)}, ` +
        `daysRemaining=${daysRemaining}, daily=$${dailyFunding.toFixed(2)}, ` +
        `daysElapsed=${daysElapsed}, today=$${fundingToday.toFixed(2)}`,
    );

    return {
      totalInvested,
      daysRemaining,
      additionalNeeded,
      dailyFunding,
      daysElapsed,
      fundingToday,
    };
  }

  /**
   * A cycle with nothing to invest builds no plan and leaves the checkpoint alone
   */
  shouldFund(decision: FundingDecision): boolean {
    return decision.fundingToday > 0;
  }

  /**
   * Advance the checkpoint after every order of the plan went through
   */
  markFunded(checkpoint: Checkpoint, fundedAt: Date): Checkpoint {
    return checkpoint.withFundingDate(fundedAt);
  }
}
