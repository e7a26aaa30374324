import { Inject, Injectable, Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import Decimal from 'decimal.js';
import { RiskLimits, TRADING_CONFIG, TradingConfig } from '../config/trading-config';
import { ReadWriteLock } from '../common/utils/read-write-lock';
import { DecimalLike, toDecimal } from '../common/utils/decimal.util';
import { Order, signedQuantity } from '../execution/entities/order.entity';
import { Position, ProtectiveLevels } from './entities/position.entity';

export enum RiskRejection {
  DAILY_LOSS_LIMIT = 'daily_loss_limit',
  POSITION_SIZE_LIMIT = 'position_size_limit',
  LOSS_PER_TRADE_LIMIT = 'loss_per_trade_limit',
}

/**
 * Pre-trade gate and position book.
 * Positions sit behind a reader/writer lock, the daily PnL accumulator behind a mutex.
 * The two are read independently; no lock spans both.
 */
@Injectable()
export class RiskService {
  private readonly logger = new Logger(RiskService.name);
  private readonly limits: RiskLimits;

  private readonly positionsLock = new ReadWriteLock();
  private readonly positions: Map<string, Position> = new Map();

  private readonly dailyPnlLock = new Mutex();
  private dailyPnl = new Decimal(0);

  constructor(@Inject(TRADING_CONFIG) config: TradingConfig) {
    this.limits = config.risk;
  }

  /**
   * Runs the gates in fixed order and stops at the first failure:
   * daily loss, resulting position size, potential loss of this trade.
   * Rejections are logged with their reason.
   */
  async validateOrder(order: Order, referencePrice: DecimalLike): Promise<boolean> {
    const rejection = await this.findRejection(order, toDecimal(referencePrice));
    if (rejection) {
      this.logger.warn(`Order ${order.id} rejected (${rejection.reason}): ${rejection.detail}`);
      return false;
    }
    return true;
  }

  /**
   * Applies a fill to the instrument's position, creating it if needed.
   * avg = (qty * avg + fillQty * fillPrice) / newQty, left unchanged when newQty is exactly zero.
   */
  async updatePosition(instrument: string, quantity: DecimalLike, fillPrice: DecimalLike): Promise<Position> {
    const fillQuantity = toDecimal(quantity);
    const price = toDecimal(fillPrice);

    return this.positionsLock.write(() => {
      let position = this.positions.get(instrument);
      if (!position) {
        position = {
          instrument,
          quantity: new Decimal(0),
          averagePrice: new Decimal(0),
          unrealizedPnl: new Decimal(0),
        };
        this.positions.set(instrument, position);
      }

      const totalCost = position.quantity.times(position.averagePrice).plus(fillQuantity.times(price));
      position.quantity = position.quantity.plus(fillQuantity);
      if (!position.quantity.isZero()) {
        position.averagePrice = totalCost.dividedBy(position.quantity);
      }

      this.logger.log(
        `Position ${instrument}: ${position.quantity.toString()} @ ${position.averagePrice.toString()}`,
      );
      return { ...position };
    });
  }

  /** Copy of the position, undefined before the first fill */
  async getPosition(instrument: string): Promise<Position | undefined> {
    return this.positionsLock.read(() => {
      const position = this.positions.get(instrument);
      return position ? { ...position } : undefined;
    });
  }

  async getAllPositions(): Promise<Position[]> {
    return this.positionsLock.read(() => Array.from(this.positions.values(), (position) => ({ ...position })));
  }

  async getDailyPnl(): Promise<Decimal> {
    return this.dailyPnlLock.runExclusive(() => this.dailyPnl);
  }

  /**
   * Adds a realized PnL delta to today's accumulator.
   * Fills never call this on their own; whoever realizes PnL reports it here.
   */
  async recordRealizedPnl(delta: DecimalLike): Promise<Decimal> {
    return this.dailyPnlLock.runExclusive(() => {
      this.dailyPnl = this.dailyPnl.plus(toDecimal(delta));
      return this.dailyPnl;
    });
  }

  /** Start-of-day reset of the accumulator */
  async resetDailyPnl(): Promise<void> {
    await this.dailyPnlLock.runExclusive(() => {
      this.dailyPnl = new Decimal(0);
    });
  }

  /** Stop-loss / take-profit prices around the entry, mirrored for shorts; undefined when flat */
  getProtectiveLevels(position: Position): ProtectiveLevels | undefined {
    if (position.quantity.isZero()) {
      return undefined;
    }
    const stopLossPct = toDecimal(this.limits.stopLossPct);
    const takeProfitPct = toDecimal(this.limits.takeProfitPct);
    const entry = position.averagePrice;

    if (position.quantity.greaterThan(0)) {
      return {
        stopLoss: entry.times(new Decimal(1).minus(stopLossPct)),
        takeProfit: entry.times(new Decimal(1).plus(takeProfitPct)),
      };
    }
    return {
      stopLoss: entry.times(new Decimal(1).plus(stopLossPct)),
      takeProfit: entry.times(new Decimal(1).minus(takeProfitPct)),
    };
  }

  /** Clears positions and PnL - test harness only */
  async reset(): Promise<void> {
    await this.positionsLock.write(() => this.positions.clear());
    await this.resetDailyPnl();
  }

  private async findRejection(
    order: Order,
    referencePrice: Decimal,
  ): Promise<{ reason: RiskRejection; detail: string } | undefined> {
    const dailyPnl = await this.getDailyPnl();
    const maxDailyLoss = toDecimal(this.limits.maxDailyLoss);
    if (dailyPnl.lessThan(maxDailyLoss.negated())) {
      return {
        reason: RiskRejection.DAILY_LOSS_LIMIT,
        detail: `daily PnL ${dailyPnl.toString()} is below -${maxDailyLoss.toString()}`,
      };
    }

    // size is only checked against a position already on the book
    const currentQuantity = await this.positionsLock.read(() => this.positions.get(order.instrument)?.quantity);
    if (currentQuantity) {
      const resultingQuantity = currentQuantity.plus(signedQuantity(order.side, order.quantity));
      if (resultingQuantity.abs().greaterThan(this.limits.maxPositionSize)) {
        return {
          reason: RiskRejection.POSITION_SIZE_LIMIT,
          detail: `resulting position ${resultingQuantity.toString()} exceeds ${this.limits.maxPositionSize}`,
        };
      }
    }

    const potentialLoss = order.quantity.times(referencePrice).times(this.limits.stopLossPct);
    if (potentialLoss.greaterThan(this.limits.maxLossPerTrade)) {
      return {
        reason: RiskRejection.LOSS_PER_TRADE_LIMIT,
        detail: `potential loss ${potentialLoss.toString()} exceeds ${this.limits.maxLossPerTrade}`,
      };
    }

    return undefined;
  }
}
