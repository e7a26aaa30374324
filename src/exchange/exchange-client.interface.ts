import { PricePoint } from '../market-data/entities/price-point.entity';
import { OrderBookSnapshot } from '../market-data/entities/order-book.entity';
import { Order } from '../execution/entities/order.entity';

export const EXCHANGE_CLIENT = Symbol('EXCHANGE_CLIENT');
export const EXCHANGE_HTTP = Symbol('EXCHANGE_HTTP');

/**
 * Venue boundary used by the collectors, the decision loop and the execution coordinator.
 * Every method rejects with ExchangeError on failure.
 */
export interface ExchangeClient {
  getPrice(instrument: string): Promise<PricePoint>;
  getOrderBook(instrument: string): Promise<OrderBookSnapshot>;
  /** Resolves the venue's order id */
  submitOrder(order: Order): Promise<string>;
  cancelOrder(orderId: string): Promise<void>;
}
