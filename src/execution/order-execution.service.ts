import { Inject, Injectable, Logger } from '@nestjs/common';
import { Mutex } from 'async-mutex';
import { EXCHANGE_CLIENT, ExchangeClient } from '../exchange/exchange-client.interface';
import { Order } from './entities/order.entity';
import { OrderSubmissionError } from './order-submission.error';

// Sends approved orders to the venue and keeps the list of orders known to have been sent.
// "Pending" means sent, not open: accepted orders stay until cancelled, failed ones are rolled back.
@Injectable()
export class OrderExecutionService {
  private readonly logger = new Logger(OrderExecutionService.name);
  private readonly pendingLock = new Mutex();
  private pendingOrders: Order[] = [];

  constructor(@Inject(EXCHANGE_CLIENT) private readonly exchange: ExchangeClient) {}

  /**
   * Records the order as pending, then submits it.
   * @returns venue order id
   * @throws OrderSubmissionError after removing the pending record when the venue call fails
   */
  async submitOrder(order: Order): Promise<string> {
    await this.pendingLock.runExclusive(() => {
      this.pendingOrders.push(order);
    });

    try {
      const venueOrderId = await this.exchange.submitOrder(order);
      this.logger.log(`Order submitted: ${order.id} -> ${venueOrderId}`);
      return venueOrderId;
    } catch (error) {
      await this.removePending(order.id);
      const failure = new OrderSubmissionError(order.id, error);
      this.logger.error(failure.message);
      throw failure;
    }
  }

  /**
   * Drops the order from the pending list. Unknown ids are a no-op.
   * Nothing is sent to the venue; the in-memory record is the only thing cancelled.
   */
  async cancelOrder(orderId: string): Promise<void> {
    const removed = await this.removePending(orderId);
    if (removed) {
      this.logger.log(`Order cancelled: ${orderId}`);
    } else {
      this.logger.debug(`Cancel for unknown order ${orderId} ignored`);
    }
  }

  /** Snapshot in submission order */
  async getPendingOrders(): Promise<Order[]> {
    return this.pendingLock.runExclusive(() => [...this.pendingOrders]);
  }

  /** Empties the pending list - test harness only */
  async clear(): Promise<void> {
    await this.pendingLock.runExclusive(() => {
      this.pendingOrders = [];
    });
  }

  private async removePending(orderId: string): Promise<boolean> {
    return this.pendingLock.runExclusive(() => {
      const before = this.pendingOrders.length;
      this.pendingOrders = this.pendingOrders.filter((pending) => pending.id !== orderId);
      return this.pendingOrders.length !== before;
    });
  }
}
