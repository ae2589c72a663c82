import { ConfigService } from '@nestjs/config';
import { Percentage } from './Percentage';
import { DEFAULT_LIMIT_DISCOUNT } from './BuyOrder';
import { CheckpointDefaults } from '../entities/Checkpoint';

/**
 * Rebalancer configuration value object
 * Everything the funding cycle reads from the environment
 */
export class RebalancerConfig {
  constructor(
    public readonly stateFilePath: string,
    public readonly targetInvestmentEquityRatio: number, // For new checkpoints only
    public readonly horizonDays: number, // Finish date offset for new checkpoints
    public readonly limitDiscount: Percentage,
    public readonly openOffsetMinutes: number,
    public readonly timeZone: string,
    public readonly calendarLookaheadDays: number,
    public readonly dryRun: boolean = false,
    public readonly enabled: boolean = true,
  ) {
    if (!stateFilePath) {
      throw new Error('stateFilePath must not be empty');
    }

    if (!(targetInvestmentEquityRatio >= 0 && targetInvestmentEquityRatio <= 1)) {
      throw new Error(
        `targetInvestmentEquityRatio must be between 0 and 1, got ${targetInvestmentEquityRatio}`,
      );
    }

    if (!(horizonDays > 0)) {
      throw new Error(`horizonDays must be greater than 0, got ${horizonDays}`);
    }

    if (!(limitDiscount.toDecimal() >= 0 && limitDiscount.toDecimal() < 1)) {
      throw new Error(`limitDiscount must be in [0, 1), got ${limitDiscount.toDecimal()}`);
    }

    if (!(openOffsetMinutes >= 0)) {
      throw new Error(`openOffsetMinutes must be non-negative, got ${openOffsetMinutes}`);
    }

    if (!Number.isInteger(calendarLookaheadDays) || calendarLookaheadDays < 1) {
      throw new Error(
        `calendarLookaheadDays must be a whole number of at least 1, got ${calendarLookaheadDays}`,
      );
    }

    try {
      new Intl.DateTimeFormat('en-US', { timeZone });
    } catch {
      throw new Error(`Unknown timeZone: ${timeZone}`);
    }
  }

  get checkpointDefaults(): CheckpointDefaults {
    return {
      targetInvestmentEquityRatio: this.targetInvestmentEquityRatio,
      horizonDays: this.horizonDays,
    };
  }

  /**
   * Create RebalancerConfig from ConfigService
   */
  static fromConfigService(configService: ConfigService): RebalancerConfig {
    const stateFilePath =
      configService.get<string>('REBALANCER_STATE_FILE') || 'data/state.json';
    const targetRatio = parseFloat(
      configService.get<string>('REBALANCER_TARGET_RATIO') || '1.0',
    );
    const horizonDays = parseFloat(
      configService.get<string>('REBALANCER_HORIZON_DAYS') || '365',
    );
    const limitDiscount = Percentage.fromDecimal(
      parseFloat(
        configService.get<string>('REBALANCER_LIMIT_DISCOUNT') ||
          String(DEFAULT_LIMIT_DISCOUNT.toDecimal()),
      ),
    );
    const openOffsetMinutes = parseFloat(
      configService.get<string>('REBALANCER_OPEN_OFFSET_MINUTES') || '60',
    );
    const timeZone =
      configService.get<string>('REBALANCER_TIMEZONE') || 'America/New_York';
    const calendarLookaheadDays = parseInt(
      configService.get<string>('REBALANCER_CALENDAR_LOOKAHEAD_DAYS') || '7',
      10,
    );

    const dryRun = configService.get<string>('REBALANCER_DRY_RUN') === 'true';
    const enabled = configService.get<string>('REBALANCER_ENABLED') !== 'false';

    return new RebalancerConfig(
      stateFilePath,
      targetRatio,
      horizonDays,
      limitDiscount,
      openOffsetMinutes,
      timeZone,
      calendarLookaheadDays,
      dryRun,
      enabled,
    );
  }

  /**
   * Create RebalancerConfig with default values
   */
  static withDefaults(
    stateFilePath: string = 'data/state.json',
    dryRun: boolean = false,
  ): RebalancerConfig {
    return new RebalancerConfig(
      stateFilePath,
      1.0, // fully invested
      365, // horizonDays
      DEFAULT_LIMIT_DISCOUNT,
      60, // one hour after the open
      'America/New_York',
      7, // calendarLookaheadDays
      dryRun,
      true,
    );
  }
}
