import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import { createHmac } from 'crypto';
import { z } from 'zod';
import { TRADING_CONFIG, TradingConfig } from '../config/trading-config';
import { parseDecimal } from '../common/utils/decimal.util';
import { sleep, unixSeconds } from '../common/utils/sleep.util';
import { errorMessage } from '../common/utils/error.util';
import { PricePoint } from '../market-data/entities/price-point.entity';
import { OrderBookLevel, OrderBookSnapshot } from '../market-data/entities/order-book.entity';
import { Order } from '../execution/entities/order.entity';
import { EXCHANGE_HTTP, ExchangeClient } from './exchange-client.interface';
import { ExchangeError } from './exchange.error';
import Decimal from 'decimal.js';

const DEPTH_LIMIT = 10;

const TickerPriceSchema = z.object({
  symbol: z.string(),
  price: z.string(),
});

const Ticker24hSchema = z.object({
  symbol: z.string(),
  volume: z.string(),
});

const DepthSchema = z.object({
  lastUpdateId: z.number(),
  bids: z.array(z.tuple([z.string(), z.string()])),
  asks: z.array(z.tuple([z.string(), z.string()])),
});

const AccountSchema = z.object({
  canTrade: z.boolean(),
  balances: z.array(
    z.object({
      asset: z.string(),
      free: z.string(),
      locked: z.string(),
    }),
  ),
});

export type AccountSnapshot = z.infer<typeof AccountSchema>;

/** HMAC-SHA256 of the query string, hex encoded, as signed REST endpoints expect */
export function signQuery(queryString: string, secretKey: string): string {
  return createHmac('sha256', secretKey).update(queryString).digest('hex');
}

/**
 * REST venue client.
 * Market data always comes from the configured endpoint; order flow is simulated
 * unless the configuration switches to live, where it is refused outright.
 */
@Injectable()
export class RestExchangeClient implements ExchangeClient {
  private readonly logger = new Logger(RestExchangeClient.name);

  constructor(
    @Inject(TRADING_CONFIG) private readonly config: TradingConfig,
    @Inject(EXCHANGE_HTTP) private readonly http: AxiosInstance,
  ) {}

  async getPrice(instrument: string): Promise<PricePoint> {
    const ticker = await this.request('/api/v3/ticker/price', TickerPriceSchema, { symbol: instrument });
    const price = parseDecimal(ticker.price);
    if (!price || price.lessThanOrEqualTo(0)) {
      throw new ExchangeError(`Failed to parse price for ${instrument}: ${ticker.price}`);
    }

    // volume comes from a second call; a failed lookup is not worth losing the price for
    let volume = new Decimal(0);
    try {
      volume = await this.get24hVolume(instrument);
    } catch (error) {
      this.logger.warn(`Volume unavailable for ${instrument}: ${errorMessage(error)}`);
    }

    return {
      instrument: ticker.symbol,
      price,
      observedAt: unixSeconds(),
      volume,
    };
  }

  async getOrderBook(instrument: string): Promise<OrderBookSnapshot> {
    const depth = await this.request('/api/v3/depth', DepthSchema, {
      symbol: instrument,
      limit: DEPTH_LIMIT,
    });

    return {
      instrument,
      bids: depth.bids.map((level) => toLevel(level, 'bid')),
      asks: depth.asks.map((level) => toLevel(level, 'ask')),
      observedAt: unixSeconds(),
    };
  }

  async submitOrder(order: Order): Promise<string> {
    if (!this.config.exchange.simulation) {
      throw new ExchangeError('Live trading is disabled; switch EXCHANGE_SIMULATION on to submit orders');
    }
    this.logger.log(
      `SIMULATION: accepting ${order.side} ${order.quantity.toString()} ${order.instrument} (${order.type}) as ${order.id}`,
    );
    await sleep(this.config.exchange.simulatedLatencyMs);
    return `sim_${order.id}`;
  }

  async cancelOrder(orderId: string): Promise<void> {
    if (!this.config.exchange.simulation) {
      throw new ExchangeError('Live trading is disabled; cannot cancel orders');
    }
    this.logger.log(`SIMULATION: cancelling ${orderId}`);
  }

  /** Signed account snapshot, used as the startup credentials check */
  async getAccount(): Promise<AccountSnapshot> {
    const query = new URLSearchParams({ timestamp: String(Date.now()) }).toString();
    const signature = signQuery(query, this.config.exchange.secretKey);
    return this.request(`/api/v3/account?${query}&signature=${signature}`, AccountSchema, undefined, {
      'X-MBX-APIKEY': this.config.exchange.apiKey,
    });
  }

  private async get24hVolume(instrument: string): Promise<Decimal> {
    const ticker = await this.request('/api/v3/ticker/24hr', Ticker24hSchema, { symbol: instrument });
    const volume = parseDecimal(ticker.volume);
    if (!volume) {
      throw new ExchangeError(`Failed to parse volume for ${instrument}: ${ticker.volume}`);
    }
    return volume;
  }

  private async request<T>(
    url: string,
    schema: z.ZodType<T>,
    params?: Record<string, string | number>,
    headers?: Record<string, string>,
  ): Promise<T> {
    let data: unknown;
    try {
      const response = await this.http.get<unknown>(url, { params, headers });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.response) {
          throw new ExchangeError(`API error: ${error.response.status} on ${url}`, error.response.status);
        }
        throw new ExchangeError(`Request failed: ${error.message}`);
      }
      throw error;
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ExchangeError(`Failed to parse response from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid payload'}`);
    }
    return parsed.data;
  }
}

function toLevel([rawPrice, rawQuantity]: [string, string], side: 'bid' | 'ask'): OrderBookLevel {
  const price = parseDecimal(rawPrice);
  const quantity = parseDecimal(rawQuantity);
  if (!price || !quantity) {
    throw new ExchangeError(`Failed to parse ${side} level: ${rawPrice}@${rawQuantity}`);
  }
  return { price, quantity };
}
