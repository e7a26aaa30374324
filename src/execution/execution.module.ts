import { Module } from '@nestjs/common';
import { ExchangeModule } from '../exchange/exchange.module';
import { OrderExecutionService } from './order-execution.service';

@Module({
  imports: [ExchangeModule],
  providers: [OrderExecutionService],
  exports: [OrderExecutionService],
})
export class ExecutionModule {}
