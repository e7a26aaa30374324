import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { errorMessage } from '../common/utils/error.util';
import { OrderExecutionService } from '../execution/order-execution.service';
import { StartTradingDto } from './dto/start-trading.dto';
import { PositionsResponseDto } from './dto/position-response.dto';
import { PendingOrderDto, PricePointDto } from './dto/order-response.dto';
import { TradingOrchestratorService, TradingStatus } from './trading-orchestrator.service';
import { TradingQueryService } from './trading-query.service';

@Controller('trading')
export class TradingController {
  private readonly logger = new Logger(TradingController.name);

  constructor(
    private readonly orchestrator: TradingOrchestratorService,
    private readonly queryService: TradingQueryService,
    private readonly execution: OrderExecutionService,
  ) {}

  /**
   * Running/stopped state plus per-run counters.
   *
   * GET /trading/status
   */
  @Get('status')
  @HttpCode(HttpStatus.OK)
  getStatus(): TradingStatus {
    return this.orchestrator.getStatus();
  }

  /**
   * Starts collectors and the decision loop; the run continues in the background.
   * 409 when a run is already in progress.
   *
   * POST /trading/start
   */
  @Post('start')
  @HttpCode(HttpStatus.ACCEPTED)
  async start(@Body() startTradingDto: StartTradingDto): Promise<TradingStatus> {
    const run = await this.orchestrator.launch(startTradingDto.symbols);
    run.done.catch((error: unknown) => {
      this.logger.error(`Trading run ended with error: ${errorMessage(error)}`);
    });
    return this.orchestrator.getStatus();
  }

  /**
   * Signals every task to exit at its next loop-top check.
   *
   * POST /trading/stop
   */
  @Post('stop')
  @HttpCode(HttpStatus.OK)
  async stop(): Promise<TradingStatus> {
    await this.orchestrator.stop();
    return this.orchestrator.getStatus();
  }

  /**
   * Positions with unrealized P&L against the newest recorded price.
   *
   * GET /trading/positions?symbol=BTCUSDT
   */
  @Get('positions')
  @HttpCode(HttpStatus.OK)
  getPositions(@Query('symbol') symbol?: string): Promise<PositionsResponseDto> {
    return this.queryService.getPositions(symbol);
  }

  /**
   * Orders known to have been sent to the venue.
   *
   * GET /trading/orders/pending
   */
  @Get('orders/pending')
  @HttpCode(HttpStatus.OK)
  getPendingOrders(): Promise<PendingOrderDto[]> {
    return this.queryService.getPendingOrders();
  }

  /**
   * Drops an order from the pending list. Unknown ids succeed as well.
   *
   * DELETE /trading/orders/:id
   */
  @Delete('orders/:id')
  @HttpCode(HttpStatus.OK)
  async cancelOrder(@Param('id') orderId: string) {
    await this.execution.cancelOrder(orderId);
    return { message: `Order ${orderId} cancelled`, orderId };
  }

  /**
   * Recorded price samples for one instrument, oldest first.
   *
   * GET /trading/history/:symbol
   */
  @Get('history/:symbol')
  @HttpCode(HttpStatus.OK)
  async getPriceHistory(@Param('symbol') symbol: string): Promise<PricePointDto[]> {
    const points = await this.queryService.getPriceHistory(symbol);
    if (points.length === 0) {
      throw new NotFoundException(`No price history recorded for ${symbol}`);
    }
    return points;
  }
}
