import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './configuration.error';

export const TRADING_CONFIG = Symbol('TRADING_CONFIG');

const LIVE_BASE_URL = 'https://api.binance.com';
const SIMULATION_BASE_URL = 'https://testnet.binance.vision';

const positive = z.coerce.number().positive();

export const TradingConfigSchema = z.object({
  exchange: z.object({
    apiKey: z.string().min(1, 'EXCHANGE_API_KEY is required'),
    secretKey: z.string().min(1, 'EXCHANGE_SECRET_KEY is required'),
    baseUrl: z.string().url(),
    simulation: z.boolean().default(true),
    requestTimeoutMs: z.coerce.number().int().positive().default(10_000),
    simulatedLatencyMs: z.coerce.number().int().nonnegative().default(50),
  }),
  trading: z.object({
    symbols: z.array(z.string().min(1)).default(['BTCUSDT', 'ETHUSDT']),
    autoStart: z.boolean().default(false),
    runSeconds: z.coerce.number().int().nonnegative().default(0),
    historyLimit: z.coerce.number().int().positive().default(100),
    minHistoryPoints: z.coerce.number().int().positive().default(3),
    collectIntervalMs: z.coerce.number().int().positive().default(5_000),
    decisionIntervalMs: z.coerce.number().int().positive().default(10_000),
  }),
  risk: z.object({
    maxPositionSize: positive.default(1000),
    maxLossPerTrade: positive.default(100),
    maxDailyLoss: positive.default(500),
    stopLossPct: positive.default(0.02),
    takeProfitPct: positive.default(0.04),
  }),
  momentum: z.object({
    lookbackPeriod: z.coerce.number().int().min(2).default(5),
    threshold: z.coerce.number().nonnegative().default(0.005),
    minAverageVolume: z.coerce.number().nonnegative().default(1000),
    orderQuantity: positive.default(0.001),
  }),
  http: z.object({
    port: z.coerce.number().int().positive().default(3000),
  }),
});

export type TradingConfig = z.infer<typeof TradingConfigSchema>;
export type RiskLimits = TradingConfig['risk'];

type Env = Record<string, string | undefined>;

/** Reads KEY=VALUE lines into the environment without overriding values already set */
export function loadDotEnv(filePath: string, env: Env = process.env): void {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const content = fs.readFileSync(filePath, 'utf-8');
  content.split('\n').forEach((line) => {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith('#')) {
      return;
    }
    const separator = trimmed.indexOf('=');
    if (separator <= 0) {
      return;
    }
    const key = trimmed.slice(0, separator).trim();
    const value = trimmed.slice(separator + 1).trim();
    if (env[key] === undefined) {
      env[key] = value;
    }
  });
}

function flag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function list(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

function blankToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Builds the configuration from environment variables.
 * @throws ConfigurationError when credentials are missing or a value fails validation
 */
export function buildConfig(env: Env): TradingConfig {
  const simulation = flag(env.EXCHANGE_SIMULATION) ?? true;

  const raw = {
    exchange: {
      apiKey: env.EXCHANGE_API_KEY ?? '',
      secretKey: env.EXCHANGE_SECRET_KEY ?? '',
      baseUrl: blankToUndefined(env.EXCHANGE_BASE_URL) ?? (simulation ? SIMULATION_BASE_URL : LIVE_BASE_URL),
      simulation,
      requestTimeoutMs: blankToUndefined(env.EXCHANGE_TIMEOUT_MS),
      simulatedLatencyMs: blankToUndefined(env.EXCHANGE_SIMULATED_LATENCY_MS),
    },
    trading: {
      symbols: list(env.TRADING_SYMBOLS),
      autoStart: flag(env.TRADING_AUTO_START),
      runSeconds: blankToUndefined(env.TRADING_RUN_SECONDS),
      historyLimit: blankToUndefined(env.PRICE_HISTORY_LIMIT),
      minHistoryPoints: blankToUndefined(env.MIN_HISTORY_POINTS),
      collectIntervalMs: blankToUndefined(env.COLLECT_INTERVAL_MS),
      decisionIntervalMs: blankToUndefined(env.DECISION_INTERVAL_MS),
    },
    risk: {
      maxPositionSize: blankToUndefined(env.RISK_MAX_POSITION_SIZE),
      maxLossPerTrade: blankToUndefined(env.RISK_MAX_LOSS_PER_TRADE),
      maxDailyLoss: blankToUndefined(env.RISK_MAX_DAILY_LOSS),
      stopLossPct: blankToUndefined(env.RISK_STOP_LOSS_PCT),
      takeProfitPct: blankToUndefined(env.RISK_TAKE_PROFIT_PCT),
    },
    momentum: {
      lookbackPeriod: blankToUndefined(env.MOMENTUM_LOOKBACK),
      threshold: blankToUndefined(env.MOMENTUM_THRESHOLD),
      minAverageVolume: blankToUndefined(env.MOMENTUM_MIN_VOLUME),
      orderQuantity: blankToUndefined(env.MOMENTUM_ORDER_QUANTITY),
    },
    http: {
      port: blankToUndefined(env.PORT),
    },
  };

  const result = TradingConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      'Invalid configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return result.data;
}

class ConfigLoader {
  private static instance: TradingConfig | null = null;

  /** Loads `.env` from the working directory once, then validates and caches */
  static load(): TradingConfig {
    if (ConfigLoader.instance) {
      return ConfigLoader.instance;
    }
    loadDotEnv(path.resolve(process.cwd(), '.env'));
    ConfigLoader.instance = buildConfig(process.env);
    return ConfigLoader.instance;
  }

  /** Drops the cached instance - test harness only */
  static reset(): void {
    ConfigLoader.instance = null;
  }
}

export const Config = ConfigLoader;
