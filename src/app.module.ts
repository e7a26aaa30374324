import { Module } from '@nestjs/common';
import { AppController } from './app.controller';
import { ConfigModule } from './config/config.module';
import { TradingModule } from './trading/trading.module';

@Module({
  imports: [ConfigModule, TradingModule],
  controllers: [AppController],
})
export class AppModule {}
