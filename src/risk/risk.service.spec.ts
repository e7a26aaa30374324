import { Test, TestingModule } from '@nestjs/testing';
import Decimal from 'decimal.js';
import { TRADING_CONFIG } from '../config/trading-config';
import { OrderSide } from '../execution/entities/order.entity';
import { buildOrder, buildTestConfig } from '../testing/fixtures';
import { RiskService } from './risk.service';

describe('RiskService', () => {
  let service: RiskService;

  beforeEach(async () => {
    // maxPositionSize 1000, maxLossPerTrade 100, maxDailyLoss 500, stopLossPct 0.02, takeProfitPct 0.04
    const module: TestingModule = await Test.createTestingModule({
      providers: [RiskService, { provide: TRADING_CONFIG, useValue: buildTestConfig() }],
    }).compile();

    service = module.get<RiskService>(RiskService);
  });

  afterEach(async () => {
    await service.reset();
  });

  describe('validateOrder', () => {
    it('should accept an order within every limit', async () => {
      const order = buildOrder({ quantity: new Decimal(1) });

      await expect(service.validateOrder(order, 100)).resolves.toBe(true);
    });

    it('should reject when daily PnL is below the daily loss limit regardless of the order', async () => {
      await service.recordRealizedPnl(-501);
      const order = buildOrder({ quantity: new Decimal(0.001) });

      await expect(service.validateOrder(order, 1)).resolves.toBe(false);
    });

    it('should accept when daily PnL sits exactly at the limit', async () => {
      await service.recordRealizedPnl(-500);

      await expect(service.validateOrder(buildOrder(), 100)).resolves.toBe(true);
    });

    it('should reject when a buy would push the position past the size limit', async () => {
      await service.updatePosition('BTCUSDT', 999, 0.01);

      const buy = buildOrder({ side: OrderSide.BUY, quantity: new Decimal(2) });
      const sell = buildOrder({ side: OrderSide.SELL, quantity: new Decimal(2) });

      await expect(service.validateOrder(buy, 0.01)).resolves.toBe(false);
      await expect(service.validateOrder(sell, 0.01)).resolves.toBe(true);
    });

    it('should skip the size check before the instrument has a position', async () => {
      // 1500 x 0.001 x 0.02 = 0.03, well inside the per-trade limit
      const buy = buildOrder({ side: OrderSide.BUY, quantity: new Decimal(1500) });

      await expect(service.validateOrder(buy, 0.001)).resolves.toBe(true);
    });

    it('should apply the size check once a flat position is on record', async () => {
      await service.updatePosition('BTCUSDT', 1, 0.001);
      await service.updatePosition('BTCUSDT', -1, 0.001);
      const sell = buildOrder({ side: OrderSide.SELL, quantity: new Decimal(1001) });

      await expect(service.validateOrder(sell, 0.001)).resolves.toBe(false);
    });

    it('should reject when quantity x price x stop-loss exceeds the per-trade loss limit', async () => {
      // 10 * 600 * 0.02 = 120 > 100
      const order = buildOrder({ quantity: new Decimal(10) });

      await expect(service.validateOrder(order, 600)).resolves.toBe(false);
    });

    it('should accept a potential loss exactly at the per-trade limit', async () => {
      // 10 * 500 * 0.02 = 100
      const order = buildOrder({ quantity: new Decimal(10) });

      await expect(service.validateOrder(order, 500)).resolves.toBe(true);
    });

    it('should not touch positions while validating', async () => {
      await service.validateOrder(buildOrder({ instrument: 'ETHUSDT' }), 100);

      expect(await service.getPosition('ETHUSDT')).toBeUndefined();
    });
  });

  describe('updatePosition', () => {
    it('should open, then flatten without dividing by zero', async () => {
      const opened = await service.updatePosition('BTCUSDT', 2, 10);
      expect(opened.quantity.toNumber()).toBe(2);
      expect(opened.averagePrice.toNumber()).toBe(10);

      const flattened = await service.updatePosition('BTCUSDT', -2, 12);
      expect(flattened.quantity.toNumber()).toBe(0);
      expect(flattened.averagePrice.toNumber()).toBe(10);
    });

    it('should volume-weight the average price across buys', async () => {
      await service.updatePosition('BTCUSDT', 1, 10);
      const position = await service.updatePosition('BTCUSDT', 1, 20);

      expect(position.quantity.toNumber()).toBe(2);
      expect(position.averagePrice.toNumber()).toBe(15);
    });

    it('should apply the same formula when a sell flips the position short', async () => {
      await service.updatePosition('BTCUSDT', 2, 10);
      // (2 * 10 + -3 * 12) / -1 = 16
      const position = await service.updatePosition('BTCUSDT', -3, 12);

      expect(position.quantity.toNumber()).toBe(-1);
      expect(position.averagePrice.toNumber()).toBe(16);
    });

    it('should keep a flat position on record', async () => {
      await service.updatePosition('ETHUSDT', 1, 2000);
      await service.updatePosition('ETHUSDT', -1, 2100);

      const positions = await service.getAllPositions();
      expect(positions).toHaveLength(1);
      expect(positions[0].instrument).toBe('ETHUSDT');
      expect(positions[0].quantity.isZero()).toBe(true);
    });

    it('should not accrue daily PnL from fills', async () => {
      await service.updatePosition('BTCUSDT', 1, 100);
      await service.updatePosition('BTCUSDT', -1, 50);

      expect((await service.getDailyPnl()).toNumber()).toBe(0);
    });

    it('should serialize concurrent fills', async () => {
      await Promise.all(Array.from({ length: 10 }, () => service.updatePosition('BTCUSDT', 1, 100)));

      const position = await service.getPosition('BTCUSDT');
      expect(position!.quantity.toNumber()).toBe(10);
      expect(position!.averagePrice.toNumber()).toBe(100);
    });

    it('should hand out copies', async () => {
      const position = await service.updatePosition('BTCUSDT', 1, 100);
      position.quantity = new Decimal(999);

      expect((await service.getPosition('BTCUSDT'))!.quantity.toNumber()).toBe(1);
    });
  });

  describe('daily PnL', () => {
    it('should accumulate and reset', async () => {
      await service.recordRealizedPnl(-120.5);
      const total = await service.recordRealizedPnl(20);
      expect(total.toNumber()).toBe(-100.5);

      await service.resetDailyPnl();
      expect((await service.getDailyPnl()).toNumber()).toBe(0);
    });
  });

  describe('getProtectiveLevels', () => {
    it('should place levels below and above entry for a long', async () => {
      const position = await service.updatePosition('BTCUSDT', 1, 100);

      const levels = service.getProtectiveLevels(position);

      expect(levels!.stopLoss.toNumber()).toBe(98);
      expect(levels!.takeProfit.toNumber()).toBe(104);
    });

    it('should mirror the levels for a short', async () => {
      const position = await service.updatePosition('BTCUSDT', -1, 100);

      const levels = service.getProtectiveLevels(position);

      expect(levels!.stopLoss.toNumber()).toBe(102);
      expect(levels!.takeProfit.toNumber()).toBe(96);
    });

    it('should return nothing for a flat position', async () => {
      await service.updatePosition('BTCUSDT', 1, 100);
      const flat = await service.updatePosition('BTCUSDT', -1, 100);

      expect(service.getProtectiveLevels(flat)).toBeUndefined();
    });
  });
});
