import { Module } from '@nestjs/common';
import { ExchangeModule } from '../exchange/exchange.module';
import { PriceHistoryService } from './price-history.service';
import { MarketDataCollectorService } from './market-data-collector.service';

@Module({
  imports: [ExchangeModule],
  providers: [PriceHistoryService, MarketDataCollectorService],
  exports: [PriceHistoryService, MarketDataCollectorService],
})
export class MarketDataModule {}
