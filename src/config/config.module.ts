import { Global, Module } from '@nestjs/common';
import { Config, TRADING_CONFIG } from './trading-config';

@Global()
@Module({
  providers: [
    {
      provide: TRADING_CONFIG,
      useFactory: () => Config.load(),
    },
  ],
  exports: [TRADING_CONFIG],
})
export class ConfigModule {}
