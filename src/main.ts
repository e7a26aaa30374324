import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { Config } from './config/trading-config';
import { ConfigurationError } from './config/configuration.error';
import { RestExchangeClient } from './exchange/rest-exchange.client';
import { TradingOrchestratorService } from './trading/trading-orchestrator.service';
import { awaitRunWithDeadline } from './trading/run-deadline';
import { errorMessage } from './common/utils/error.util';

const logger = new Logger('Bootstrap');

async function bootstrap(): Promise<void> {
  // fail before Nest spins anything up when credentials are missing
  const config = Config.load();

  const app = await NestFactory.create(AppModule);
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  logger.log(`Starting in ${config.exchange.simulation ? 'SIMULATION' : 'LIVE'} mode against ${config.exchange.baseUrl}`);

  const exchange = app.get(RestExchangeClient);
  const probe = config.trading.symbols[0] ?? 'BTCUSDT';
  const price = await exchange.getPrice(probe);
  logger.log(`API connection successful. ${probe} price: ${price.price.toFixed(2)}`);

  try {
    const account = await exchange.getAccount();
    logger.log(`Account reachable (canTrade=${account.canTrade}, ${account.balances.length} balances)`);
  } catch (error) {
    logger.warn(`Signed account check failed: ${errorMessage(error)}`);
  }

  await app.listen(config.http.port);
  logger.log(`HTTP control surface on port ${config.http.port}`);

  if (config.trading.autoStart) {
    const orchestrator = app.get(TradingOrchestratorService);
    const run = await orchestrator.launch(config.trading.symbols);

    if (config.trading.runSeconds > 0) {
      logger.log(`Run bounded to ${config.trading.runSeconds}s`);
    }
    await awaitRunWithDeadline(run, config.trading.runSeconds, () => {
      logger.log('Run duration elapsed, shutting down');
      app.close().catch((error: unknown) => logger.error(`Shutdown failed: ${errorMessage(error)}`));
    });
  }
}

bootstrap().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.error(`Refusing to start: ${error.message}`);
  } else {
    logger.error(`Startup failed: ${errorMessage(error)}`);
  }
  process.exit(1);
});
