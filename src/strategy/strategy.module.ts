import { Module } from '@nestjs/common';
import { TRADING_CONFIG, TradingConfig } from '../config/trading-config';
import { MomentumStrategy } from './momentum.strategy';
import { StrategyEngineService } from './strategy-engine.service';
import { TRADING_STRATEGIES, TradingStrategy } from './strategy.interface';

@Module({
  providers: [
    {
      provide: TRADING_STRATEGIES,
      inject: [TRADING_CONFIG],
      useFactory: (config: TradingConfig): TradingStrategy[] => [
        new MomentumStrategy(
          config.momentum.lookbackPeriod,
          config.momentum.threshold,
          config.momentum.minAverageVolume,
          config.momentum.orderQuantity,
        ),
      ],
    },
    StrategyEngineService,
  ],
  exports: [StrategyEngineService],
})
export class StrategyModule {}
