import { Inject, Injectable, Logger } from '@nestjs/common';
import { PricePoint } from '../market-data/entities/price-point.entity';
import { OrderBookSnapshot } from '../market-data/entities/order-book.entity';
import { errorMessage } from '../common/utils/error.util';
import { TradingSignal } from './entities/trading-signal.entity';
import { TRADING_STRATEGIES, TradingStrategy } from './strategy.interface';

export interface StrategyEvaluation {
  strategy: string;
  signal: TradingSignal;
}

// Registry of signal generators. Every registered strategy runs every cycle;
// all emitted signals are returned, there is no "best signal" selection.
@Injectable()
export class StrategyEngineService {
  private readonly logger = new Logger(StrategyEngineService.name);
  private readonly strategies: Map<string, TradingStrategy> = new Map();

  constructor(@Inject(TRADING_STRATEGIES) initial: TradingStrategy[]) {
    initial.forEach((strategy) => this.register(strategy));
  }

  /**
   * Adds a strategy to the registry.
   * @throws Error if a strategy with the same name is already registered
   */
  register(strategy: TradingStrategy): void {
    if (this.strategies.has(strategy.name)) {
      throw new Error(`Strategy already registered: ${strategy.name}`);
    }
    this.strategies.set(strategy.name, strategy);
  }

  /** Removes by name; false if it was not registered */
  unregister(name: string): boolean {
    return this.strategies.delete(name);
  }

  getStrategies(): TradingStrategy[] {
    return Array.from(this.strategies.values());
  }

  /** Runs every strategy in registration order. A throwing strategy is logged and skipped. */
  evaluate(history: readonly PricePoint[], orderBook: OrderBookSnapshot): StrategyEvaluation[] {
    const evaluations: StrategyEvaluation[] = [];

    this.strategies.forEach((strategy) => {
      try {
        const signal = strategy.analyze(history, orderBook);
        if (signal) {
          evaluations.push({ strategy: strategy.name, signal });
        }
      } catch (error) {
        this.logger.error(`${strategy.name} failed on ${orderBook.instrument}: ${errorMessage(error)}`);
      }
    });

    return evaluations;
  }
}
