import Decimal from 'decimal.js';
import { buildConfig, TradingConfig } from '../config/trading-config';
import { ExchangeClient } from '../exchange/exchange-client.interface';
import { ExchangeError } from '../exchange/exchange.error';
import { PricePoint } from '../market-data/entities/price-point.entity';
import { OrderBookSnapshot } from '../market-data/entities/order-book.entity';
import { Order, OrderSide, OrderType } from '../execution/entities/order.entity';

const TEST_ENV: Record<string, string> = {
  EXCHANGE_API_KEY: 'test-key',
  EXCHANGE_SECRET_KEY: 'test-secret',
  EXCHANGE_BASE_URL: 'http://exchange.test',
  EXCHANGE_SIMULATED_LATENCY_MS: '0',
  COLLECT_INTERVAL_MS: '5',
  DECISION_INTERVAL_MS: '5',
};

/** Valid configuration with fast loops; `env` entries override the defaults */
export function buildTestConfig(env: Record<string, string> = {}): TradingConfig {
  return buildConfig({ ...TEST_ENV, ...env });
}

export function pricePoint(instrument: string, price: number, volume = 5000, observedAt = 1_700_000_000): PricePoint {
  return {
    instrument,
    price: new Decimal(price),
    observedAt,
    volume: new Decimal(volume),
  };
}

export function orderBook(instrument: string): OrderBookSnapshot {
  return {
    instrument,
    bids: [{ price: new Decimal(99), quantity: new Decimal(2) }],
    asks: [{ price: new Decimal(101), quantity: new Decimal(3) }],
    observedAt: 1_700_000_000,
  };
}

let orderCounter = 1;

export function buildOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: `order-${orderCounter++}`,
    instrument: 'BTCUSDT',
    side: OrderSide.BUY,
    type: OrderType.MARKET,
    quantity: new Decimal(1),
    createdAt: 1_700_000_000,
    ...overrides,
  };
}

/** In-process venue: queued quotes per instrument, switchable failures, records order flow */
export class FakeExchangeClient implements ExchangeClient {
  readonly submitted: Order[] = [];
  readonly cancelled: string[] = [];
  readonly failPriceFor = new Set<string>();
  readonly failOrderBookFor = new Set<string>();
  submitError: Error | null = null;
  priceCalls = 0;
  orderBookCalls = 0;

  private readonly queued: Map<string, Array<[number, number]>> = new Map();
  private readonly last: Map<string, [number, number]> = new Map();

  /** Quotes returned by successive getPrice calls; the last one repeats once the queue drains */
  queuePrices(instrument: string, prices: number[], volume = 5000): void {
    const queue = this.queued.get(instrument) ?? [];
    prices.forEach((price) => queue.push([price, volume]));
    this.queued.set(instrument, queue);
  }

  async getPrice(instrument: string): Promise<PricePoint> {
    this.priceCalls++;
    if (this.failPriceFor.has(instrument)) {
      throw new ExchangeError(`Request failed: price feed down for ${instrument}`);
    }
    const next = this.queued.get(instrument)?.shift() ?? this.last.get(instrument) ?? [100, 5000];
    this.last.set(instrument, next);
    return pricePoint(instrument, next[0], next[1]);
  }

  async getOrderBook(instrument: string): Promise<OrderBookSnapshot> {
    this.orderBookCalls++;
    if (this.failOrderBookFor.has(instrument)) {
      throw new ExchangeError(`Request failed: depth unavailable for ${instrument}`);
    }
    return orderBook(instrument);
  }

  async submitOrder(order: Order): Promise<string> {
    if (this.submitError) {
      throw this.submitError;
    }
    this.submitted.push(order);
    return `sim_${order.id}`;
  }

  async cancelOrder(orderId: string): Promise<void> {
    this.cancelled.push(orderId);
  }
}

/** Polls until `condition` holds or the timeout elapses */
export async function waitFor(condition: () => boolean | Promise<boolean>, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!(await condition())) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
