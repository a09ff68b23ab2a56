import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigError } from '../execution/errors';
import type { BarInterval, OrderType } from '../execution/types/execution.types';
import { isValidTimeZone } from '../utils/trading-session';

export interface TradingHoursConfig {
  readonly timezone: string;
  /** HH:MM in `timezone`, inclusive; an end before the start crosses midnight */
  readonly start: string;
  readonly end: string;
  /** 0 = Sunday */
  readonly daysOfWeek: readonly number[];
}

export interface TradingConfig {
  readonly symbols: readonly string[];
  readonly pollingIntervalMs: number;
  readonly barInterval: BarInterval;
  readonly lookbackBars: number;
  readonly defaultOrderType: OrderType;
  /** Distance from the quote used to price LIMIT orders */
  readonly limitOffsetPercent: number;
  readonly buyingPowerCap?: number;
  /** Fraction of buying power a full-conviction signal may commit */
  readonly allocationPerTrade: number;
  readonly lotSize: number;
  readonly allowShort: boolean;
  readonly marginMultiplier: number;
  /** No new trades outside this window; absent means always open */
  readonly tradingHours?: TradingHoursConfig;
}

export interface RiskManagementConfig {
  /** Units per symbol, absolute */
  readonly maxPositionSize: number;
  /** Currency */
  readonly maxDailyLoss: number;
  readonly maxOpenOrders: number;
  readonly stopLossPercent?: number;
  readonly takeProfitPercent?: number;
  readonly trailingStopPercent?: number;
}

export type TechnicalIndicatorsConfig = Readonly<Record<string, Readonly<Record<string, number>>>>;

export interface ExecutionSettings {
  readonly maxSubmitAttempts: number;
  readonly submitBackoffMs: number;
  readonly requestTimeoutMs: number;
  readonly dataMaxAttempts: number;
  readonly dataBackoffMs: number;
  readonly maxBackoffMs: number;
  /** Settled orders, closed order ids and audit records kept in memory */
  readonly historyLimit: number;
}

export interface TradeBotConfig {
  readonly trading: TradingConfig;
  readonly risk: RiskManagementConfig;
  readonly indicators: TechnicalIndicatorsConfig;
  readonly execution: ExecutionSettings;
}

export interface ConfigOverrides {
  symbols?: string[];
  pollingIntervalMs?: number;
}

const BAR_INTERVALS = ['1m', '5m', '15m', '30m', '1h', '4h', '1d'] as const;
const WINDOW_PARAMETER = /(period|window|lookback)$/i;

const percent = z.number().finite().gt(0).lt(1);
const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'must be HH:MM');

const tradingHoursSchema = z.object({
  timezone: z.string().trim().min(1).default('UTC'),
  start: clockTime,
  end: clockTime,
  daysOfWeek: z.array(z.number().int().min(0).max(6)).min(1).default([1, 2, 3, 4, 5]),
});

const tradingSchema = z.object({
  symbols: z
    .array(z.string().trim().min(1).transform(symbol => symbol.toUpperCase()))
    .min(1, 'At least one symbol is required'),
  pollingIntervalMs: z.number().int().positive().default(60_000),
  barInterval: z.enum(BAR_INTERVALS).default('5m'),
  lookbackBars: z.number().int().positive().default(50),
  defaultOrderType: z.enum(['MARKET', 'LIMIT']).default('MARKET'),
  limitOffsetPercent: z.number().finite().nonnegative().lt(1).default(0.001),
  buyingPowerCap: z.number().finite().nonnegative().optional(),
  allocationPerTrade: z.number().finite().gt(0).lte(1).default(0.1),
  lotSize: z.number().finite().positive().default(1),
  allowShort: z.boolean().default(false),
  marginMultiplier: z.number().finite().gte(1).default(1),
  tradingHours: tradingHoursSchema.optional(),
});

const riskSchema = z.object({
  maxPositionSize: z.number().finite().nonnegative(),
  maxDailyLoss: z.number().finite().nonnegative(),
  maxOpenOrders: z.number().int().nonnegative().default(5),
  stopLossPercent: percent.optional(),
  takeProfitPercent: percent.optional(),
  trailingStopPercent: percent.optional(),
});

const executionSchema = z.object({
  maxSubmitAttempts: z.number().int().positive().default(3),
  submitBackoffMs: z.number().int().nonnegative().default(500),
  requestTimeoutMs: z.number().int().positive().default(10_000),
  dataMaxAttempts: z.number().int().positive().default(3),
  dataBackoffMs: z.number().int().nonnegative().default(1_000),
  maxBackoffMs: z.number().int().nonnegative().default(30_000),
  historyLimit: z.number().int().positive().default(1_000),
});

const tradeBotSchema = z.object({
  trading: tradingSchema,
  risk: riskSchema,
  indicators: z.record(z.string(), z.record(z.string(), z.number())).default({}),
  execution: executionSchema.default({}),
});

type ParsedTradeBotConfig = z.infer<typeof tradeBotSchema>;

/**
 * Cross-field checks the schema cannot express. Returns every issue found.
 */
export function validateTradeBotConfig(config: ParsedTradeBotConfig): string[] {
  const errors: string[] = [];

  const seen = new Set<string>();
  for (const symbol of config.trading.symbols) {
    if (seen.has(symbol)) {
      errors.push(`trading.symbols: duplicate symbol ${symbol}`);
    }
    seen.add(symbol);
  }

  const { tradingHours } = config.trading;
  if (tradingHours) {
    if (!isValidTimeZone(tradingHours.timezone)) {
      errors.push(`trading.tradingHours.timezone: unknown time zone ${tradingHours.timezone}`);
    }
    if (tradingHours.start === tradingHours.end) {
      errors.push('trading.tradingHours: start and end must differ');
    }
  }

  const { stopLossPercent, takeProfitPercent } = config.risk;
  if (
    stopLossPercent !== undefined &&
    takeProfitPercent !== undefined &&
    stopLossPercent >= takeProfitPercent
  ) {
    errors.push('risk: stopLossPercent must be less than takeProfitPercent');
  }

  if (config.execution.maxBackoffMs < config.execution.submitBackoffMs) {
    errors.push('execution: maxBackoffMs must be at least submitBackoffMs');
  }

  for (const [indicator, parameters] of Object.entries(config.indicators)) {
    for (const [name, value] of Object.entries(parameters)) {
      if (!Number.isFinite(value)) {
        errors.push(`indicators.${indicator}.${name}: must be a finite number`);
      } else if (WINDOW_PARAMETER.test(name) && (!Number.isInteger(value) || value <= 0)) {
        errors.push(`indicators.${indicator}.${name}: window length must be a positive integer`);
      }
    }
  }

  return errors;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

function parseSource(source: unknown): unknown {
  if (typeof source !== 'string') {
    return source;
  }

  try {
    const parsed: unknown = JSON.parse(source);
    return parsed;
  } catch (error) {
    throw new ConfigError([
      `source: invalid JSON (${error instanceof Error ? error.message : 'parse error'})`
    ]);
  }
}

/**
 * Build a validated, deeply frozen configuration from a plain object or JSON text.
 */
export function loadTradeBotConfig(source: unknown, overrides: ConfigOverrides = {}): TradeBotConfig {
  const result = tradeBotSchema.safeParse(parseSource(source));

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }

  const config: ParsedTradeBotConfig = {
    ...result.data,
    trading: {
      ...result.data.trading,
      ...(overrides.symbols ? { symbols: overrides.symbols.map(symbol => symbol.trim().toUpperCase()) } : {}),
      ...(overrides.pollingIntervalMs !== undefined ? { pollingIntervalMs: overrides.pollingIntervalMs } : {}),
    },
  };

  if (config.trading.symbols.some(symbol => symbol.length === 0)) {
    throw new ConfigError(['trading.symbols: symbols must not be empty']);
  }

  if (!Number.isInteger(config.trading.pollingIntervalMs) || config.trading.pollingIntervalMs <= 0) {
    throw new ConfigError(['trading.pollingIntervalMs: must be a positive integer']);
  }

  const errors = validateTradeBotConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  return deepFreeze(config);
}

/**
 * Read and validate a JSON configuration file.
 */
export async function loadTradeBotConfigFile(
  path: string,
  overrides: ConfigOverrides = {}
): Promise<TradeBotConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError([
      `source: cannot read ${path} (${error instanceof Error ? error.message : 'read error'})`
    ]);
  }

  return loadTradeBotConfig(text, overrides);
}

/**
 * Load configuration overrides from environment variables
 */
export function loadConfigOverridesFromEnv(env: NodeJS.ProcessEnv = process.env): ConfigOverrides {
  const overrides: ConfigOverrides = {};

  const symbols = env['TRADE_BOT_SYMBOLS'];
  if (symbols) {
    overrides.symbols = symbols.split(',').filter(symbol => symbol.trim().length > 0);
  }

  const interval = env['TRADE_BOT_POLL_INTERVAL_MS'];
  if (interval) {
    const pollingIntervalMs = parseInt(interval, 10);
    if (!isNaN(pollingIntervalMs)) {
      overrides.pollingIntervalMs = pollingIntervalMs;
    }
  }

  return overrides;
}
