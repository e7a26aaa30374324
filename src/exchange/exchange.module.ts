import { Module } from '@nestjs/common';
import axios from 'axios';
import { TRADING_CONFIG, TradingConfig } from '../config/trading-config';
import { EXCHANGE_CLIENT, EXCHANGE_HTTP } from './exchange-client.interface';
import { RestExchangeClient } from './rest-exchange.client';

@Module({
  providers: [
    {
      provide: EXCHANGE_HTTP,
      inject: [TRADING_CONFIG],
      useFactory: (config: TradingConfig) =>
        axios.create({
          baseURL: config.exchange.baseUrl,
          timeout: config.exchange.requestTimeoutMs,
        }),
    },
    RestExchangeClient,
    { provide: EXCHANGE_CLIENT, useExisting: RestExchangeClient },
  ],
  exports: [EXCHANGE_CLIENT, RestExchangeClient],
})
export class ExchangeModule {}
