import Decimal from 'decimal.js';
import { PricePoint } from '../market-data/entities/price-point.entity';
import { OrderBookSnapshot } from '../market-data/entities/order-book.entity';
import { OrderSide } from '../execution/entities/order.entity';
import { average, DecimalLike, toDecimal } from '../common/utils/decimal.util';
import { TradingSignal } from './entities/trading-signal.entity';
import { TradingStrategy } from './strategy.interface';

export const DEFAULT_MIN_AVERAGE_VOLUME = 1000;
export const DEFAULT_ORDER_QUANTITY = 0.001;

/**
 * Trades in the direction of the relative price change across the lookback window,
 * provided the window traded enough volume.
 */
export class MomentumStrategy implements TradingStrategy {
  readonly name = 'MomentumStrategy';

  private readonly threshold: Decimal;
  private readonly minAverageVolume: Decimal;
  private readonly orderQuantity: Decimal;

  constructor(
    private readonly lookbackPeriod: number,
    momentumThreshold: DecimalLike,
    minAverageVolume: DecimalLike = DEFAULT_MIN_AVERAGE_VOLUME,
    orderQuantity: DecimalLike = DEFAULT_ORDER_QUANTITY,
  ) {
    if (!Number.isInteger(lookbackPeriod) || lookbackPeriod < 2) {
      throw new Error(`Lookback period must be an integer of at least 2, got ${lookbackPeriod}`);
    }
    this.threshold = toDecimal(momentumThreshold);
    this.minAverageVolume = toDecimal(minAverageVolume);
    this.orderQuantity = toDecimal(orderQuantity);
  }

  analyze(history: readonly PricePoint[], _orderBook: OrderBookSnapshot): TradingSignal | null {
    // newest first
    const window = history.slice(-this.lookbackPeriod).reverse();
    if (window.length < 2) {
      return null;
    }

    const newest = window[0];
    const oldest = window[window.length - 1];
    if (oldest.price.isZero()) {
      return null;
    }

    const change = newest.price.minus(oldest.price).dividedBy(oldest.price);
    const averageVolume = average(window.map((point) => point.volume));

    if (!change.abs().greaterThan(this.threshold) || !averageVolume.greaterThan(this.minAverageVolume)) {
      return null;
    }

    return {
      instrument: newest.instrument,
      action: change.greaterThan(0) ? OrderSide.BUY : OrderSide.SELL,
      confidence: Decimal.min(change.abs(), 1).toNumber(),
      targetPrice: newest.price,
      quantity: this.orderQuantity,
    };
  }
}
