import { Controller, Get, Inject } from '@nestjs/common';
import { HealthResponse } from './common/interfaces/health.interface';
import { TRADING_CONFIG, TradingConfig } from './config/trading-config';
import { TradingOrchestratorService } from './trading/trading-orchestrator.service';

@Controller()
export class AppController {
  constructor(
    private readonly orchestrator: TradingOrchestratorService,
    @Inject(TRADING_CONFIG) private readonly config: TradingConfig,
  ) {}

  /**
   * Health check for load balancers and monitoring.
   * 
   * GET /health
   */
  @Get('health')
  getHealth(): HealthResponse {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      service: 'momentum-trading-orchestrator',
      trading: this.orchestrator.isRunning() ? 'running' : 'stopped',
      mode: this.config.exchange.simulation ? 'simulation' : 'live',
    };
  }

  /**
   * API root - returns service info and available endpoints.
   * 
   * GET /
   */
  @Get()
  getRoot() {
    return {
      message: 'Momentum Trading Orchestrator API',
      version: '1.0.0',
      endpoints: {
        health: '/health',
        status: '/trading/status',
        start: '/trading/start',
        stop: '/trading/stop',
        positions: '/trading/positions',
        pendingOrders: '/trading/orders/pending',
        cancelOrder: 'DELETE /trading/orders/:id',
        history: '/trading/history/:symbol',
      },
    };
  }
}
