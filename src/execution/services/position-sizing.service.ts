/**
 * Position Sizing Service - Turns a directional signal into at most one order intent
 */

import type { TradingConfig } from '../../config/trade-bot.config';
import type { OrderIntent, SignalIntent } from '../types/execution.types';
import { floorToLot, isZeroQuantity } from '../../utils/quantity';
import { getLogger } from '../../config/logger';
const logger = getLogger();

export interface PositionSizingParams {
  symbol: string;
  signal: SignalIntent;
  price: number;
  /** Signed quantity currently held */
  positionQuantity: number;
  buyingPower: number;
  trading: Pick<TradingConfig, 'allocationPerTrade' | 'lotSize' | 'allowShort'>;
}

export interface PositionSizingResult {
  intent: OrderIntent | null;
  reason: string;
}

export function clampConviction(conviction: number): number {
  if (!Number.isFinite(conviction)) {
    return 0;
  }
  return Math.min(1, Math.max(0, conviction));
}

export class PositionSizingService {
  /**
   * FLAT closes, an opposite signal closes the held side, otherwise open
   * floor_lot(buyingPower × allocation × conviction / price).
   */
  sizeIntent(params: PositionSizingParams): PositionSizingResult {
    const { symbol, signal, price, positionQuantity, trading } = params;

    if (!Number.isFinite(price) || price <= 0) {
      return { intent: null, reason: `No usable price for ${symbol}` };
    }

    const held = isZeroQuantity(positionQuantity) ? 0 : positionQuantity;

    switch (signal.direction) {
      case 'FLAT':
        if (held === 0) {
          return { intent: null, reason: 'Flat signal with no position' };
        }
        return { intent: this.closingIntent(symbol, held, price), reason: 'Flat signal closes position' };

      case 'LONG':
        if (held < 0) {
          return { intent: this.closingIntent(symbol, held, price), reason: 'Long signal closes short' };
        }
        return this.openingIntent(params, 'BUY');

      case 'SHORT':
        if (held > 0) {
          return { intent: this.closingIntent(symbol, held, price), reason: 'Short signal closes long' };
        }
        if (!trading.allowShort) {
          return { intent: null, reason: 'Short selling disabled' };
        }
        return this.openingIntent(params, 'SELL');
    }
  }

  private closingIntent(symbol: string, held: number, price: number): OrderIntent {
    return {
      symbol,
      side: held > 0 ? 'SELL' : 'BUY',
      quantity: Math.abs(held),
      price,
      purpose: 'CLOSE',
      exitReason: 'SIGNAL'
    };
  }

  private openingIntent(params: PositionSizingParams, side: OrderIntent['side']): PositionSizingResult {
    const { symbol, signal, price, buyingPower, trading } = params;
    const conviction = clampConviction(signal.conviction);
    const budget = Math.max(0, buyingPower) * trading.allocationPerTrade * conviction;
    const quantity = floorToLot(budget / price, trading.lotSize);

    if (quantity <= 0) {
      logger.debug({ symbol, side, conviction, buyingPower, price }, 'Sized to zero');
      return { intent: null, reason: 'Sized to zero lots' };
    }

    return {
      intent: { symbol, side, quantity, price, purpose: 'OPEN' },
      reason: `Sized ${quantity} at conviction ${conviction}`
    };
  }
}
