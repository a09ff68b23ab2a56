/**
 * Stop Loss / Take Profit Manager Service - Price-driven exits for positions and working orders
 */

import type { RiskManagementConfig } from '../../config/trade-bot.config';
import type { CancelReason, ExitReason, Order, OrderIntent, Position } from '../types/execution.types';
import { getLogger } from '../../config/logger';
const logger = getLogger();

export type ProtectiveLimits = Pick<
  RiskManagementConfig,
  'stopLossPercent' | 'takeProfitPercent' | 'trailingStopPercent'
>;

export class SLTPManagerService {
  constructor(private readonly limits: ProtectiveLimits) {}

  /**
   * Closing intent when the last price breaches a stop-loss, trailing-stop
   * or take-profit threshold; null otherwise
   */
  evaluatePosition(position: Position, price: number): OrderIntent | null {
    if (position.quantity === 0 || position.averageEntryPrice <= 0 || price <= 0) {
      return null;
    }

    const exitReason = this.exitReasonFor(position, price);
    if (!exitReason) {
      return null;
    }

    logger.info(
      { symbol: position.symbol, exitReason, price, averageEntryPrice: position.averageEntryPrice, watermarkPrice: position.watermarkPrice },
      'Protective exit triggered'
    );

    return {
      symbol: position.symbol,
      side: position.quantity > 0 ? 'SELL' : 'BUY',
      quantity: Math.abs(position.quantity),
      price,
      purpose: 'CLOSE',
      exitReason
    };
  }

  /**
   * Cancel reason for a working opening order whose reference price has
   * moved beyond the stop-loss or take-profit band
   */
  evaluateWorkingOrder(order: Order, price: number): CancelReason | null {
    if (order.purpose !== 'OPEN' || (order.state !== 'SUBMITTED' && order.state !== 'PARTIALLY_FILLED')) {
      return null;
    }
    if (order.referencePrice <= 0 || price <= 0) {
      return null;
    }

    const direction = order.side === 'BUY' ? 1 : -1;
    const move = ((price - order.referencePrice) / order.referencePrice) * direction;
    const { stopLossPercent, takeProfitPercent } = this.limits;

    if (stopLossPercent !== undefined && move <= -stopLossPercent) {
      return 'STOP_LOSS';
    }
    if (takeProfitPercent !== undefined && move >= takeProfitPercent) {
      return 'TAKE_PROFIT';
    }
    return null;
  }

  private exitReasonFor(position: Position, price: number): ExitReason | null {
    const { stopLossPercent, takeProfitPercent, trailingStopPercent } = this.limits;
    const long = position.quantity > 0;
    const change = long
      ? (price - position.averageEntryPrice) / position.averageEntryPrice
      : (position.averageEntryPrice - price) / position.averageEntryPrice;

    if (stopLossPercent !== undefined && change <= -stopLossPercent) {
      return 'STOP_LOSS';
    }

    if (trailingStopPercent !== undefined) {
      const trail = long
        ? price <= position.watermarkPrice * (1 - trailingStopPercent)
        : price >= position.watermarkPrice * (1 + trailingStopPercent);
      if (trail) {
        return 'TRAILING_STOP';
      }
    }

    if (takeProfitPercent !== undefined && change >= takeProfitPercent) {
      return 'TAKE_PROFIT';
    }

    return null;
  }
}
