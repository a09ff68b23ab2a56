/**
 * Position Sizing Tests
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { PositionSizingService, clampConviction, type PositionSizingParams } from '../services/position-sizing.service';
import { priceArbitrary } from './setup';

describe('PositionSizingService', () => {
  const sizing = new PositionSizingService();
  const trading = { allocationPerTrade: 0.1, lotSize: 1, allowShort: false };

  function params(overrides: Partial<PositionSizingParams> = {}): PositionSizingParams {
    return {
      symbol: 'AAPL',
      signal: { direction: 'LONG', conviction: 0.5 },
      price: 20,
      positionQuantity: 0,
      buyingPower: 10_000,
      trading,
      ...overrides
    };
  }

  describe('📈 Opening', () => {
    it('should size by buying power, allocation and conviction', () => {
      expect(sizing.sizeIntent(params())).toEqual({
        intent: { symbol: 'AAPL', side: 'BUY', quantity: 25, price: 20, purpose: 'OPEN' },
        reason: 'Sized 25 at conviction 0.5'
      });
    });

    it('should clamp conviction into [0, 1]', () => {
      expect(sizing.sizeIntent(params({ signal: { direction: 'LONG', conviction: 2 } })).intent?.quantity).toBe(50);
      expect(clampConviction(-1)).toBe(0);
      expect(clampConviction(Number.NaN)).toBe(0);
    });

    it('should produce nothing when the budget buys less than a lot', () => {
      expect(sizing.sizeIntent(params({ buyingPower: 100 }))).toEqual({ intent: null, reason: 'Sized to zero lots' });
    });

    it('should only open shorts when short selling is allowed', () => {
      const short = { direction: 'SHORT' as const, conviction: 0.5 };
      expect(sizing.sizeIntent(params({ signal: short }))).toEqual({ intent: null, reason: 'Short selling disabled' });
      expect(sizing.sizeIntent(params({ signal: short, trading: { ...trading, allowShort: true } })).intent).toMatchObject({
        side: 'SELL',
        quantity: 25,
        purpose: 'OPEN'
      });
    });

    it('should ignore an unusable price', () => {
      expect(sizing.sizeIntent(params({ price: 0 })).intent).toBeNull();
    });
  });

  describe('📉 Closing', () => {
    it('should close a long on a flat signal', () => {
      const result = sizing.sizeIntent(params({ signal: { direction: 'FLAT', conviction: 0 }, positionQuantity: 10 }));
      expect(result.intent).toEqual({ symbol: 'AAPL', side: 'SELL', quantity: 10, price: 20, purpose: 'CLOSE', exitReason: 'SIGNAL' });
    });

    it('should do nothing on a flat signal without a position', () => {
      expect(sizing.sizeIntent(params({ signal: { direction: 'FLAT', conviction: 1 } }))).toEqual({
        intent: null,
        reason: 'Flat signal with no position'
      });
    });

    it('should close the opposite side before opening', () => {
      expect(sizing.sizeIntent(params({ signal: { direction: 'SHORT', conviction: 1 }, positionQuantity: 10 })).intent)
        .toMatchObject({ side: 'SELL', quantity: 10, purpose: 'CLOSE' });
      expect(sizing.sizeIntent(params({ signal: { direction: 'LONG', conviction: 1 }, positionQuantity: -5 })).intent)
        .toMatchObject({ side: 'BUY', quantity: 5, purpose: 'CLOSE' });
    });
  });

  describe('🎲 Property: opening notional stays within the allocation', () => {
    it('should never commit more than buyingPower × allocation', () => {
      fc.assert(
        fc.property(
          priceArbitrary,
          fc.integer({ min: 0, max: 1_000_000 }),
          fc.double({ min: 0, max: 1, noNaN: true }),
          (price, buyingPower, conviction) => {
            const { intent } = sizing.sizeIntent(params({ price, buyingPower, signal: { direction: 'LONG', conviction } }));
            if (intent) {
              expect(intent.quantity * price).toBeLessThanOrEqual(buyingPower * trading.allocationPerTrade * conviction + 1e-3);
            }
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
