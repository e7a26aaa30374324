import { Inject, Injectable } from '@nestjs/common';
import { TRADING_CONFIG, TradingConfig } from '../config/trading-config';
import { ReadWriteLock } from '../common/utils/read-write-lock';
import { PricePoint } from './entities/price-point.entity';

interface PriceSeries {
  readonly lock: ReadWriteLock;
  points: PricePoint[];   // arrival order, oldest first
}

// Bounded per-instrument price history shared by the collectors (writers) and the decision loop (reader).
// Each series has its own reader/writer lock so instruments never contend with each other.
@Injectable()
export class PriceHistoryService {
  private readonly registryLock = new ReadWriteLock();
  private readonly series: Map<string, PriceSeries> = new Map();
  private readonly limit: number;

  constructor(@Inject(TRADING_CONFIG) config: TradingConfig) {
    this.limit = config.trading.historyLimit;
  }

  getLimit(): number {
    return this.limit;
  }

  /** Appends in arrival order, evicting the oldest points beyond the limit */
  async append(point: PricePoint): Promise<void> {
    const entry = await this.seriesFor(point.instrument);
    await entry.lock.write(() => {
      entry.points.push(point);
      if (entry.points.length > this.limit) {
        entry.points.splice(0, entry.points.length - this.limit);
      }
    });
  }

  /** Copy of the instrument's history, oldest first; empty when nothing was recorded */
  async getHistory(instrument: string): Promise<PricePoint[]> {
    const entry = await this.registryLock.read(() => this.series.get(instrument));
    if (!entry) {
      return [];
    }
    return entry.lock.read(() => [...entry.points]);
  }

  /** Most recent point or undefined */
  async getLatest(instrument: string): Promise<PricePoint | undefined> {
    const entry = await this.registryLock.read(() => this.series.get(instrument));
    if (!entry) {
      return undefined;
    }
    return entry.lock.read(() => entry.points[entry.points.length - 1]);
  }

  /** Instruments with at least one recorded point, in first-seen order */
  async getInstruments(): Promise<string[]> {
    return this.registryLock.read(() => Array.from(this.series.keys()));
  }

  /** Drops every series - test harness / fresh run only */
  async clear(): Promise<void> {
    await this.registryLock.write(() => this.series.clear());
  }

  // Series are created lazily under the registry write lock; lookups only take the read lock.
  private async seriesFor(instrument: string): Promise<PriceSeries> {
    const existing = await this.registryLock.read(() => this.series.get(instrument));
    if (existing) {
      return existing;
    }
    return this.registryLock.write(() => {
      let entry = this.series.get(instrument);
      if (!entry) {
        entry = { lock: new ReadWriteLock(), points: [] };
        this.series.set(instrument, entry);
      }
      return entry;
    });
  }
}
