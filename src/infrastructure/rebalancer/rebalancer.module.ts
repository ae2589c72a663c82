import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { RebalancerConfig } from '../../domain/value-objects/RebalancerConfig';
import { BROKERAGE_ADAPTER } from '../../domain/ports/IBrokerageAdapter';
import { CHECKPOINT_REPOSITORY } from '../../domain/ports/ICheckpointRepository';
import { FundingScheduler } from '../../domain/services/FundingScheduler';
import { TradingCalendar } from '../../domain/services/TradingCalendar';
import { AllocationPlanner } from '../../domain/services/allocation/AllocationPlanner';
import { AlpacaBrokerageAdapter } from '../adapters/alpaca/AlpacaBrokerageAdapter';
import { FileCheckpointRepository } from '../repositories/FileCheckpointRepository';
import { RebalancerService } from '../../application/services/RebalancerService';
import { RebalancerScheduler } from '../../application/services/RebalancerScheduler';
import { RebalancerController } from '../controllers/RebalancerController';

@Module({
  controllers: [RebalancerController],
  providers: [
    {
      provide: RebalancerConfig,
      useFactory: (configService: ConfigService) => {
        return RebalancerConfig.fromConfigService(configService);
      },
      inject: [ConfigService],
    },

    // Ports
    { provide: BROKERAGE_ADAPTER, useClass: AlpacaBrokerageAdapter },
    { provide: CHECKPOINT_REPOSITORY, useClass: FileCheckpointRepository },

    // Domain services
    FundingScheduler,
    TradingCalendar,
    AllocationPlanner,

    RebalancerService,
    RebalancerScheduler,
  ],
  exports: [RebalancerService, RebalancerScheduler],
})
export class RebalancerModule {}
