import { Module } from '@nestjs/common';
import { ExchangeModule } from '../exchange/exchange.module';
import { MarketDataModule } from '../market-data/market-data.module';
import { StrategyModule } from '../strategy/strategy.module';
import { RiskModule } from '../risk/risk.module';
import { ExecutionModule } from '../execution/execution.module';
import { TradingController } from './trading.controller';
import { TradingOrchestratorService } from './trading-orchestrator.service';
import { TradingQueryService } from './trading-query.service';

@Module({
  imports: [ExchangeModule, MarketDataModule, StrategyModule, RiskModule, ExecutionModule],
  controllers: [TradingController],
  providers: [
    TradingOrchestratorService, // Mutations: start, stop, decision cycle
    TradingQueryService,        // Queries: positions, pending orders, price history
  ],
  exports: [TradingOrchestratorService],
})
export class TradingModule {}
