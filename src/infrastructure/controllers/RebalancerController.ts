import { Controller, Get, HttpCode, Post } from '@nestjs/common';
import {
  FundingPreview,
  RebalancerService,
} from '../../application/services/RebalancerService';
import { RebalancerScheduler } from '../../application/services/RebalancerScheduler';
import { toCheckpointDocument } from '../repositories/FileCheckpointRepository';

@Controller('rebalancer')
export class RebalancerController {
  constructor(
    private readonly rebalancer: RebalancerService,
    private readonly scheduler: RebalancerScheduler,
  ) {}

  /**
   * Checkpoint, schedule and last cycle
   * GET /rebalancer/status
   */
  @Get('status')
  getStatus() {
    const checkpoint = this.rebalancer.getCheckpoint();

    return {
      ...this.scheduler.getStatus(),
      checkpoint: checkpoint ? toCheckpointDocument(checkpoint) : null,
      lastResult: this.rebalancer.getLastResult(),
      timestamp: new Date(),
    };
  }

  /**
   * Today's funding and plan, without placing orders
   * POST /rebalancer/preview
   */
  @Post('preview')
  @HttpCode(200)
  async preview(): Promise<FundingPreview> {
    return this.rebalancer.previewFundingCycle(new Date());
  }
}
