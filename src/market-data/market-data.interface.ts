/**
 * Market Data Source Interface - Upstream OHLCV provider consumed by the gateway
 */

import type { BarInterval } from '../execution/types/execution.types';

/**
 * Untrusted bar as delivered by a provider. Fields are validated by the gateway.
 */
export interface RawBar {
  timestamp: Date | string | number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface MarketDataSource {
  readonly name: string;

  fetchBars(symbol: string, lookback: number, interval: BarInterval): Promise<RawBar[]>;
}
