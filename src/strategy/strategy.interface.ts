import { PricePoint } from '../market-data/entities/price-point.entity';
import { OrderBookSnapshot } from '../market-data/entities/order-book.entity';
import { TradingSignal } from './entities/trading-signal.entity';

export const TRADING_STRATEGIES = Symbol('TRADING_STRATEGIES');

/**
 * Signal generator plugged into the strategy engine.
 * `history` is oldest first; at most one signal per call.
 */
export interface TradingStrategy {
  readonly name: string;
  analyze(history: readonly PricePoint[], orderBook: OrderBookSnapshot): TradingSignal | null;
}
