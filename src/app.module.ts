import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { RebalancerModule } from './infrastructure/rebalancer/rebalancer.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    ScheduleModule.forRoot(),
    RebalancerModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
