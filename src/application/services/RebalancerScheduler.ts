import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { Interval } from '@nestjs/schedule';
import { RebalancerService } from './RebalancerService';
import { RebalancerConfig } from '../../domain/value-objects/RebalancerConfig';
import { FundingPreconditionException } from '../../domain/exceptions/DomainException';

export const POLL_INTERVAL_MS = 10000;

export interface SchedulerStatus {
  enabled: boolean;
  halted: boolean;
  running: boolean;
  nextFundingAt: Date | null;
  lastAttemptedAt: Date | null;
  lastError: string | null;
}

/**
 * RebalancerScheduler - Waits for the next funding time and runs the cycle
 *
 * Polls every 10s. The next funding time is resolved on the first poll after
 * a cycle, so it always reflects the checkpoint as last saved. A cycle runs at
 * most once per session: after a skipped or failed cycle the next time comes
 * from a later session, and the catch-up in `daysElapsed` covers the gap.
 */
@Injectable()
export class RebalancerScheduler implements OnModuleInit {
  private readonly logger = new Logger(RebalancerScheduler.name);
  private isRunning = false;
  private halted = false;
  private nextFundingAt: Date | null = null;
  private lastAttemptedAt: Date | null = null; // in memory only
  private lastError: string | null = null;

  constructor(
    private readonly rebalancer: RebalancerService,
    private readonly config: RebalancerConfig,
  ) {}

  onModuleInit(): void {
    if (!this.config.enabled) {
      this.logger.warn('Rebalancer disabled (REBALANCER_ENABLED=false); polling is off');
      return;
    }
    this.logger.log(
      `Rebalancer scheduler started: polling every ${POLL_INTERVAL_MS / 1000}s, ` +
        `${this.config.openOffsetMinutes}m after the ${this.config.timeZone} open, ` +
        `limit ${this.config.limitDiscount} below the last price` +
        (this.config.dryRun ? ', DRY RUN' : ''),
    );
  }

  getStatus(): SchedulerStatus {
    return {
      enabled: this.config.enabled,
      halted: this.halted,
      running: this.isRunning,
      nextFundingAt: this.nextFundingAt,
      lastAttemptedAt: this.lastAttemptedAt,
      lastError: this.lastError,
    };
  }

  @Interval(POLL_INTERVAL_MS)
  async poll(): Promise<void> {
    if (!this.config.enabled || this.halted || this.isRunning) return;

    this.isRunning = true;
    try {
      await this.tick(new Date());
    } finally {
      this.isRunning = false;
    }
  }

  /**
   * One poll: resolve the next funding time if needed, and run the cycle
   * once it has passed
   */
  async tick(now: Date): Promise<void> {
    try {
      if (!this.nextFundingAt) {
        this.nextFundingAt = await this.rebalancer.resolveNextFundingTime(
          now,
          this.lastAttemptedAt,
        );
      }

      if (now.getTime() < this.nextFundingAt.getTime()) {
        return;
      }

      this.lastAttemptedAt = this.nextFundingAt;
      await this.rebalancer.runFundingCycle(now);
      this.nextFundingAt = null;
      this.lastError = null;
    } catch (error: unknown) {
      this.nextFundingAt = null;
      this.lastError = error instanceof Error ? error.message : String(error);

      if (error instanceof FundingPreconditionException) {
        this.halted = true;
        this.logger.error(
          `Halting rebalancer: ${error.message} (${error.precondition}). ` +
            'Fix the checkpoint or account and restart.',
        );
        return;
      }

      this.logger.error(
        `Funding cycle failed: ${this.lastError}`,
        error instanceof Error ? error.stack : undefined,
      );
    }
  }
}
