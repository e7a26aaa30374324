import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  OnApplicationShutdown,
} from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { v4 as uuidv4 } from 'uuid';
import { TRADING_CONFIG, TradingConfig } from '../config/trading-config';
import { EXCHANGE_CLIENT, ExchangeClient } from '../exchange/exchange-client.interface';
import { sleep, unixSeconds } from '../common/utils/sleep.util';
import { errorMessage } from '../common/utils/error.util';
import { MarketDataCollectorService } from '../market-data/market-data-collector.service';
import { PriceHistoryService } from '../market-data/price-history.service';
import { OrderBookSnapshot } from '../market-data/entities/order-book.entity';
import { StrategyEngineService } from '../strategy/strategy-engine.service';
import { TradingSignal } from '../strategy/entities/trading-signal.entity';
import { RiskService } from '../risk/risk.service';
import { OrderExecutionService } from '../execution/order-execution.service';
import { Order, OrderType, signedQuantity } from '../execution/entities/order.entity';

export enum TradingState {
  STOPPED = 'stopped',
  RUNNING = 'running',
}

export interface TradingCounters {
  cycles: number;
  signals: number;
  approved: number;
  rejected: number;
  submitted: number;
  failed: number;
}

export interface TradingStatus {
  state: TradingState;
  symbols: string[];
  startedAt: string | null;
  stoppedAt: string | null;
  counters: TradingCounters;
}

/** A launched run; `done` settles once its collectors and decision loop have exited */
export interface TradingRun {
  done: Promise<void>;
}

/** What happened to one signal on its way through the risk gate and the venue */
export type SignalOutcome = 'rejected' | 'failed' | 'filled';

function emptyCounters(): TradingCounters {
  return { cycles: 0, signals: 0, approved: 0, rejected: 0, submitted: 0, failed: 0 };
}

/**
 * Owns the run/stop lifecycle.
 * A run is one collector per instrument plus one decision loop, all sharing an AbortSignal;
 * stop() aborts it and every loop exits at its next loop-top check.
 */
@Injectable()
export class TradingOrchestratorService implements OnApplicationShutdown {
  private readonly logger = new Logger(TradingOrchestratorService.name);
  private readonly lifecycleLock = new Mutex();

  private state = TradingState.STOPPED;
  private controller: AbortController | null = null;
  private symbols: string[] = [];
  private startedAt: Date | null = null;
  private stoppedAt: Date | null = null;
  private counters: TradingCounters = emptyCounters();

  constructor(
    @Inject(TRADING_CONFIG) private readonly config: TradingConfig,
    @Inject(EXCHANGE_CLIENT) private readonly exchange: ExchangeClient,
    private readonly collector: MarketDataCollectorService,
    private readonly history: PriceHistoryService,
    private readonly strategies: StrategyEngineService,
    private readonly risk: RiskService,
    private readonly execution: OrderExecutionService,
  ) {}

  /**
   * Runs collectors for `symbols` and the decision loop until stop() is called.
   * Resolves once every task has exited.
   * @throws BadRequestException for an empty instrument list
   * @throws ConflictException when a run is already in progress
   */
  async start(symbols: string[]): Promise<void> {
    const run = await this.launch(symbols);
    await run.done;
  }

  /**
   * Registers a run and spawns its tasks, returning as soon as the state is RUNNING.
   * `done` settles when every task of this run has exited.
   */
  async launch(symbols: string[]): Promise<TradingRun> {
    const instruments = Array.from(new Set(symbols.map((symbol) => symbol.trim()).filter(Boolean)));
    if (instruments.length === 0) {
      throw new BadRequestException('At least one instrument is required to start trading');
    }

    const signal = await this.lifecycleLock.runExclusive(() => {
      if (this.state === TradingState.RUNNING) {
        throw new ConflictException(`Trading is already running for ${this.symbols.join(', ')}`);
      }
      const controller = new AbortController();
      this.controller = controller;
      this.state = TradingState.RUNNING;
      this.symbols = instruments;
      this.startedAt = new Date();
      this.stoppedAt = null;
      this.counters = emptyCounters();
      return controller.signal;
    });

    // a fresh run starts from an empty store so instruments of an earlier run are not traded on stale prices
    await this.history.clear();

    this.logger.log(
      `Starting trading for ${instruments.join(', ')} (${this.config.exchange.simulation ? 'simulation' : 'live'} mode)`,
    );

    return { done: this.runTasks(instruments, signal) };
  }

  /** Signals every task of the current run to exit. No-op when already stopped. */
  async stop(): Promise<void> {
    await this.lifecycleLock.runExclusive(() => {
      if (this.state === TradingState.STOPPED || !this.controller) {
        return;
      }
      this.controller.abort();
      this.controller = null;
      this.state = TradingState.STOPPED;
      this.stoppedAt = new Date();
      this.logger.log('Trading stopped');
    });
  }

  isRunning(): boolean {
    return this.state === TradingState.RUNNING;
  }

  getStatus(): TradingStatus {
    return {
      state: this.state,
      symbols: [...this.symbols],
      startedAt: this.startedAt?.toISOString() ?? null,
      stoppedAt: this.stoppedAt?.toISOString() ?? null,
      counters: { ...this.counters },
    };
  }

  async onApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  /**
   * One decision pass over every instrument with enough history:
   * fresh order book, every strategy, every signal through risk and execution.
   * @param scope - instruments to consider; every instrument in the store when omitted
   */
  async runDecisionCycle(scope?: readonly string[]): Promise<void> {
    this.counters.cycles++;
    const instruments = scope ?? (await this.history.getInstruments());

    for (const instrument of instruments) {
      const prices = await this.history.getHistory(instrument);
      this.logger.debug(`Checking ${instrument} with ${prices.length} price points`);
      if (prices.length < this.config.trading.minHistoryPoints) {
        continue;
      }

      let orderBook: OrderBookSnapshot;
      try {
        orderBook = await this.exchange.getOrderBook(instrument);
      } catch (error) {
        this.logger.error(`Error fetching order book for ${instrument}: ${errorMessage(error)}`);
        continue;
      }

      for (const evaluation of this.strategies.evaluate(prices, orderBook)) {
        await this.processSignal(evaluation.strategy, evaluation.signal);
      }
    }
  }

  /**
   * Turns a signal into a MARKET order and walks it through the gate and the venue.
   * Position is only touched after the venue accepted the order; failures drop the signal.
   */
  async processSignal(strategy: string, signal: TradingSignal): Promise<SignalOutcome> {
    this.counters.signals++;
    this.logger.log(
      `Signal from ${strategy}: ${signal.action} ${signal.quantity.toString()} ${signal.instrument} ` +
        `@ ${signal.targetPrice.toString()} (confidence ${signal.confidence.toFixed(4)})`,
    );

    const order: Order = {
      id: uuidv4(),
      instrument: signal.instrument,
      side: signal.action,
      type: OrderType.MARKET,
      quantity: signal.quantity,
      createdAt: unixSeconds(),
    };

    const approved = await this.risk.validateOrder(order, signal.targetPrice);
    if (!approved) {
      this.counters.rejected++;
      return 'rejected';
    }
    this.counters.approved++;

    try {
      await this.execution.submitOrder(order);
    } catch (error) {
      this.counters.failed++;
      this.logger.warn(`Signal for ${signal.instrument} dropped: ${errorMessage(error)}`);
      return 'failed';
    }
    this.counters.submitted++;

    // not atomic with the submission above; a crash in between leaves the position stale
    await this.risk.updatePosition(order.instrument, signedQuantity(order.side, order.quantity), signal.targetPrice);
    return 'filled';
  }

  private async runTasks(instruments: string[], signal: AbortSignal): Promise<void> {
    try {
      await Promise.all([
        ...instruments.map((instrument) => this.collector.run(instrument, signal)),
        this.runDecisionLoop(instruments, signal),
      ]);
    } finally {
      await this.lifecycleLock.runExclusive(() => {
        // a stop() followed by a new start() must not be undone by the old run finishing
        if (this.controller?.signal === signal) {
          this.controller = null;
          this.state = TradingState.STOPPED;
          this.stoppedAt = new Date();
        }
      });
      this.logger.log(`Trading tasks exited for ${instruments.join(', ')}`);
    }
  }

  private async runDecisionLoop(instruments: readonly string[], signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.runDecisionCycle(instruments);
      } catch (error) {
        this.logger.error(`Decision cycle failed: ${errorMessage(error)}`);
      }
      await sleep(this.config.trading.decisionIntervalMs, signal);
    }
  }
}
