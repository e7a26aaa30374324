import { Inject, Injectable, Logger } from '@nestjs/common';
import { TRADING_CONFIG, TradingConfig } from '../config/trading-config';
import { EXCHANGE_CLIENT, ExchangeClient } from '../exchange/exchange-client.interface';
import { sleep } from '../common/utils/sleep.util';
import { errorMessage } from '../common/utils/error.util';
import { PriceHistoryService } from './price-history.service';

/**
 * Per-instrument sampling loop.
 * One run() per instrument; a failed fetch is logged and the cycle skipped, never retried early.
 */
@Injectable()
export class MarketDataCollectorService {
  private readonly logger = new Logger(MarketDataCollectorService.name);

  constructor(
    @Inject(EXCHANGE_CLIENT) private readonly exchange: ExchangeClient,
    private readonly history: PriceHistoryService,
    @Inject(TRADING_CONFIG) private readonly config: TradingConfig,
  ) {}

  /** Samples until `signal` aborts. Resolves the number of points recorded; never rejects. */
  async run(instrument: string, signal: AbortSignal): Promise<number> {
    let recorded = 0;
    this.logger.log(`Collector started for ${instrument}`);

    while (!signal.aborted) {
      if (await this.collectOnce(instrument)) {
        recorded++;
      }
      await sleep(this.config.trading.collectIntervalMs, signal);
    }

    this.logger.log(`Collector stopped for ${instrument} after ${recorded} samples`);
    return recorded;
  }

  /** One fetch-and-append cycle. Returns false when the sample was dropped. */
  async collectOnce(instrument: string): Promise<boolean> {
    try {
      const fetched = await this.exchange.getPrice(instrument);
      // history is keyed by the requested instrument, whatever casing the venue echoes back
      const point = fetched.instrument === instrument ? fetched : { ...fetched, instrument };
      await this.history.append(point);
      this.logger.debug(`${instrument} @ ${point.price.toString()} (volume ${point.volume.toString()})`);
      return true;
    } catch (error) {
      this.logger.error(`Error fetching price for ${instrument}: ${errorMessage(error)}`);
      return false;
    }
  }
}
