/**
 * Performance Tracker Service - Win rate, P&L and drawdown over closing fills
 *
 * A fill counts as one trade when it reduces an existing position; its
 * realized P&L decides win or loss. Drawdown is measured on the running
 * realized P&L from a peak that starts at zero.
 */

import type { LedgerRecord, TradePerformanceStats, TradePerformanceSummary } from '../types/execution.types';
import { getLogger } from '../../config/logger';
const logger = getLogger();

function roundMoney(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function roundTwo(value: number): number {
  return Math.round(value * 100) / 100;
}

export function emptyPerformanceStats(): TradePerformanceStats {
  return {
    trades: 0,
    wins: 0,
    losses: 0,
    totalPnl: 0,
    grossProfit: 0,
    grossLoss: 0,
    peakPnl: 0,
    maxDrawdown: 0,
    maxDrawdownPercent: 0
  };
}

export class PerformanceTrackerService {
  private stats: TradePerformanceStats;

  constructor(initial: TradePerformanceStats = emptyPerformanceStats()) {
    this.stats = { ...initial };
  }

  static fromRecords(records: readonly LedgerRecord[]): PerformanceTrackerService {
    const tracker = new PerformanceTrackerService();
    records.forEach(record => tracker.recordFill(record));
    return tracker;
  }

  /**
   * Fold one ledger record in. Returns false for records that closed nothing.
   */
  recordFill(record: LedgerRecord): boolean {
    if (record.type !== 'FILL_APPLIED' || !record.closedQuantity || record.closedQuantity <= 0) {
      return false;
    }

    const pnl = record.realizedPnl ?? 0;
    const stats = { ...this.stats, trades: this.stats.trades + 1 };

    if (pnl > 0) {
      stats.wins++;
      stats.grossProfit = roundMoney(stats.grossProfit + pnl);
    } else {
      stats.losses++;
      stats.grossLoss = roundMoney(stats.grossLoss - pnl);
    }

    stats.totalPnl = roundMoney(stats.totalPnl + pnl);
    stats.peakPnl = Math.max(stats.peakPnl, stats.totalPnl);

    const drawdown = roundMoney(stats.peakPnl - stats.totalPnl);
    if (drawdown > stats.maxDrawdown) {
      stats.maxDrawdown = drawdown;
      stats.maxDrawdownPercent = stats.peakPnl > 0 ? (drawdown / stats.peakPnl) * 100 : 0;
    }

    this.stats = stats;
    logger.debug({ symbol: record.symbol, orderId: record.orderId, pnl, trades: stats.trades }, 'Trade recorded');
    return true;
  }

  getStats(): TradePerformanceStats {
    return { ...this.stats };
  }

  summarize(): TradePerformanceSummary {
    const { trades, wins, losses, totalPnl, grossProfit, grossLoss } = this.stats;

    const averageWin = wins > 0 ? grossProfit / wins : 0;
    const averageLoss = losses > 0 ? grossLoss / losses : 0;

    return {
      totalTrades: trades,
      winningTrades: wins,
      losingTrades: losses,
      winRate: roundTwo(trades > 0 ? (wins / trades) * 100 : 0),
      totalPnl: roundTwo(totalPnl),
      averagePnl: roundTwo(trades > 0 ? totalPnl / trades : 0),
      averageWin: roundTwo(averageWin),
      averageLoss: roundTwo(averageLoss),
      profitFactor: roundTwo(grossLoss > 0 ? grossProfit / grossLoss : 0),
      maxDrawdown: roundTwo(this.stats.maxDrawdown),
      maxDrawdownPercent: roundTwo(this.stats.maxDrawdownPercent)
    };
  }
}
