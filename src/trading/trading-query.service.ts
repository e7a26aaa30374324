import { Injectable } from '@nestjs/common';
import Decimal from 'decimal.js';
import { toNumber } from '../common/utils/decimal.util';
import { PriceHistoryService } from '../market-data/price-history.service';
import { RiskService } from '../risk/risk.service';
import { OrderExecutionService } from '../execution/order-execution.service';
import { PositionsResponseDto, PositionDto } from './dto/position-response.dto';
import { PendingOrderDto, PricePointDto } from './dto/order-response.dto';

// Read-only views over the shared trading state.
// Queries kept apart from the orchestrator, which owns all mutations.
@Injectable()
export class TradingQueryService {
  constructor(
    private readonly history: PriceHistoryService,
    private readonly risk: RiskService,
    private readonly execution: OrderExecutionService,
  ) {}

  /**
   * Positions marked to the newest recorded price.
   * Computed on read; the stored unrealizedPnl field is left untouched.
   *
   * @param symbol - Optional filter for a single instrument
   */
  async getPositions(symbol?: string): Promise<PositionsResponseDto> {
    let positions = await this.risk.getAllPositions();
    if (symbol) {
      positions = positions.filter((position) => position.instrument === symbol);
    }

    const views: PositionDto[] = [];
    let totalUnrealized = new Decimal(0);

    for (const position of positions) {
      const latest = await this.history.getLatest(position.instrument);
      const unrealized = latest
        ? latest.price.minus(position.averagePrice).times(position.quantity)
        : new Decimal(0);
      const levels = this.risk.getProtectiveLevels(position);
      totalUnrealized = totalUnrealized.plus(unrealized);

      views.push({
        instrument: position.instrument,
        quantity: toNumber(position.quantity),
        averagePrice: toNumber(position.averagePrice),
        markPrice: latest ? toNumber(latest.price) : null,
        unrealizedPnl: toNumber(unrealized),
        stopLossPrice: levels ? toNumber(levels.stopLoss) : null,
        takeProfitPrice: levels ? toNumber(levels.takeProfit) : null,
      });
    }

    return {
      positions: views,
      totalUnrealizedPnl: toNumber(totalUnrealized.toDecimalPlaces(2)),
      dailyPnl: toNumber(await this.risk.getDailyPnl()),
    };
  }

  async getPendingOrders(): Promise<PendingOrderDto[]> {
    const orders = await this.execution.getPendingOrders();
    return orders.map((order) => ({
      id: order.id,
      instrument: order.instrument,
      side: order.side,
      type: order.type,
      quantity: toNumber(order.quantity),
      limitPrice: order.limitPrice ? toNumber(order.limitPrice) : null,
      createdAt: order.createdAt,
    }));
  }

  /** Recorded samples for one instrument, oldest first */
  async getPriceHistory(symbol: string): Promise<PricePointDto[]> {
    const points = await this.history.getHistory(symbol);
    return points.map((point) => ({
      instrument: point.instrument,
      price: toNumber(point.price),
      volume: toNumber(point.volume),
      observedAt: point.observedAt,
    }));
  }
}
