/**
 * Market Data Gateway Service - Fetches, cleans and gap-checks OHLCV series
 */

import type { MarketDataSource, RawBar } from './market-data.interface';
import type { ExecutionSettings } from '../config/trade-bot.config';
import type { Bar, BarGap, BarInterval, MarketDataSeries } from '../execution/types/execution.types';
import { DataUnavailableError, errorMessage } from '../execution/errors';
import { RetryExhaustedError, retryWithBackoff, withTimeout, type Sleep } from '../utils/retry';
import { getLogger } from '../config/logger';
const logger = getLogger();

export const INTERVAL_MS: Record<BarInterval, number> = {
  '1m': 60_000,
  '5m': 5 * 60_000,
  '15m': 15 * 60_000,
  '30m': 30 * 60_000,
  '1h': 60 * 60_000,
  '4h': 4 * 60 * 60_000,
  '1d': 24 * 60 * 60_000
};

type GatewaySettings = Pick<
  ExecutionSettings,
  'dataMaxAttempts' | 'dataBackoffMs' | 'maxBackoffMs' | 'requestTimeoutMs'
>;

class EmptyResponseError extends Error {
  constructor(symbol: string) {
    super(`Empty bar response for ${symbol}`);
    this.name = 'EmptyResponseError';
  }
}

/**
 * Convert an untrusted bar. Returns null when any field is unusable.
 */
export function normalizeBar(raw: RawBar): Bar | null {
  const timestamp = raw.timestamp instanceof Date ? new Date(raw.timestamp.getTime()) : new Date(raw.timestamp);
  if (isNaN(timestamp.getTime())) {
    return null;
  }

  const { open, high, low, close, volume } = raw;
  const prices = [open, high, low, close];
  if (prices.some(price => typeof price !== 'number' || !Number.isFinite(price) || price <= 0)) {
    return null;
  }
  if (typeof volume !== 'number' || !Number.isFinite(volume) || volume < 0) {
    return null;
  }
  if (high < low || high < Math.max(open, close) || low > Math.min(open, close)) {
    return null;
  }

  return { timestamp, open, high, low, close, volume };
}

/**
 * Sort ascending and collapse duplicate timestamps, keeping the latest delivery
 */
export function sortAndDeduplicate(bars: Bar[]): Bar[] {
  const byTime = new Map<number, Bar>();
  for (const bar of bars) {
    byTime.set(bar.timestamp.getTime(), bar);
  }
  return [...byTime.entries()].sort(([a], [b]) => a - b).map(([, bar]) => bar);
}

/**
 * Gaps between consecutive bars wider than one interval. Not interpolated.
 */
export function detectGaps(bars: readonly Bar[], interval: BarInterval): BarGap[] {
  const step = INTERVAL_MS[interval];
  const gaps: BarGap[] = [];

  for (let i = 1; i < bars.length; i++) {
    const previous = bars[i - 1];
    const current = bars[i];
    if (!previous || !current) continue;

    const elapsed = current.timestamp.getTime() - previous.timestamp.getTime();
    if (elapsed > step) {
      gaps.push({
        from: previous.timestamp,
        to: current.timestamp,
        missingBars: Math.round(elapsed / step) - 1
      });
    }
  }

  return gaps.filter(gap => gap.missingBars > 0);
}

export class MarketDataGatewayService {
  constructor(
    private readonly source: MarketDataSource,
    private readonly settings: GatewaySettings,
    private readonly sleep?: Sleep
  ) {}

  /**
   * Fetch `lookback` bars. Empty responses and upstream errors are retried;
   * exhaustion raises DataUnavailableError. Never returns stale data.
   */
  async fetch(symbol: string, lookback: number, interval: BarInterval): Promise<MarketDataSeries> {
    try {
      return await retryWithBackoff(
        async attempt => {
          const raw = await withTimeout(
            this.source.fetchBars(symbol, lookback, interval),
            this.settings.requestTimeoutMs,
            `${this.source.name}.fetchBars(${symbol})`
          );

          const bars = sortAndDeduplicate(
            raw.map(normalizeBar).filter((bar): bar is Bar => bar !== null)
          );
          if (bars.length === 0) {
            throw new EmptyResponseError(symbol);
          }

          if (bars.length < raw.length) {
            logger.warn(
              { symbol, attempt, received: raw.length, kept: bars.length },
              'Dropped malformed or duplicate bars'
            );
          }

          const gaps = detectGaps(bars, interval);
          if (gaps.length > 0) {
            logger.warn({ symbol, interval, gaps: gaps.length }, 'Bar series has gaps');
          }

          return { symbol, interval, bars, gaps };
        },
        {
          maxAttempts: this.settings.dataMaxAttempts,
          baseDelayMs: this.settings.dataBackoffMs,
          maxDelayMs: this.settings.maxBackoffMs,
          jitterFactor: 0.1,
          sleep: this.sleep,
          onRetry: (error, attempt, delayMs) => {
            logger.warn(
              { symbol, attempt, delayMs, error: errorMessage(error) },
              'Market data fetch failed, retrying'
            );
          }
        }
      );
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        logger.error(
          { symbol, attempts: error.attempts, error: errorMessage(error.lastError) },
          'Market data unavailable'
        );
        throw new DataUnavailableError(symbol, error.attempts, error.lastError);
      }
      throw error;
    }
  }

  /**
   * Close of the most recent bar
   */
  latestPrice(series: MarketDataSeries): number {
    const last = series.bars[series.bars.length - 1];
    if (!last) {
      throw new DataUnavailableError(series.symbol, 0);
    }
    return last.close;
  }
}
