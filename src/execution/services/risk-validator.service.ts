/**
 * Risk Validator Service - Enforces position, loss, open-order and buying-power limits
 *
 * Pure: the decision depends only on the intent, the context and the limits.
 */

import type { RiskLimits, RiskValidator } from '../interfaces/risk-validator.interface';
import type {
  OrderIntent,
  RiskAdjustment,
  RiskContext,
  RiskDecision,
  RiskRejectionReason
} from '../types/execution.types';
import { floorToLot, isZeroQuantity, roundQuantity } from '../../utils/quantity';
import { getLogger } from '../../config/logger';
const logger = getLogger();

/**
 * A closing intent reduces an existing position without crossing zero
 */
export function isClosingIntent(positionQuantity: number, intent: Pick<OrderIntent, 'side' | 'quantity'>): boolean {
  if (isZeroQuantity(positionQuantity)) {
    return false;
  }
  const reducesLong = positionQuantity > 0 && intent.side === 'SELL';
  const reducesShort = positionQuantity < 0 && intent.side === 'BUY';
  return (reducesLong || reducesShort) && intent.quantity <= Math.abs(positionQuantity);
}

function reject(reason: RiskRejectionReason, detail: string): RiskDecision {
  return { kind: 'REJECT', reason, detail };
}

export class RiskValidatorService implements RiskValidator {
  evaluate(intent: OrderIntent, context: RiskContext, limits: RiskLimits): RiskDecision {
    const decision = this.decide(intent, context, limits);

    if (decision.kind === 'REJECT') {
      logger.info({ symbol: intent.symbol, side: intent.side, reason: decision.reason, detail: decision.detail }, 'Risk rejected intent');
    } else if (decision.adjustments.length > 0) {
      logger.info(
        { symbol: intent.symbol, requested: decision.requestedQuantity, approved: decision.quantity, adjustments: decision.adjustments },
        'Risk resized intent'
      );
    }

    return decision;
  }

  private decide(intent: OrderIntent, context: RiskContext, limits: RiskLimits): RiskDecision {
    const { trading, risk } = limits;
    const { portfolio } = context;

    if (!Number.isFinite(intent.quantity) || intent.quantity <= 0 || isZeroQuantity(intent.quantity)) {
      return reject('ZERO_QUANTITY', `Quantity ${intent.quantity} is not a tradeable amount`);
    }
    if (!Number.isFinite(intent.price) || intent.price <= 0) {
      return reject('INVALID_PRICE', `Price ${intent.price} is not a valid quote`);
    }

    const positionQuantity = portfolio.positions[intent.symbol]?.quantity ?? 0;
    const closing = isClosingIntent(positionQuantity, intent);
    const adjustments: RiskAdjustment[] = [];
    let quantity = intent.quantity;

    if (!closing) {
      if (portfolio.circuitBreakerTripped) {
        return reject('DAILY_LOSS_LIMIT', 'Circuit breaker tripped for this session');
      }
      if (portfolio.sessionPnl < -risk.maxDailyLoss) {
        return reject(
          'DAILY_LOSS_LIMIT',
          `Session P&L ${portfolio.sessionPnl.toFixed(2)} exceeds max daily loss ${risk.maxDailyLoss}`
        );
      }

      const pending = context.pendingQuantity[intent.symbol] ?? 0;
      const projected = positionQuantity + pending;
      const room = intent.side === 'BUY'
        ? risk.maxPositionSize - projected
        : risk.maxPositionSize + projected;
      const allowed = floorToLot(room, trading.lotSize);

      if (allowed <= 0) {
        return reject(
          'MAX_POSITION_SIZE',
          `${intent.symbol} position ${roundQuantity(projected)} leaves no room under max ${risk.maxPositionSize}`
        );
      }
      if (quantity > allowed) {
        adjustments.push({ rule: 'MAX_POSITION_SIZE', from: quantity, to: allowed });
        quantity = allowed;
      }
    }

    if (context.openOrderCount >= risk.maxOpenOrders) {
      return reject(
        'MAX_OPEN_ORDERS',
        `${context.openOrderCount} open orders, limit ${risk.maxOpenOrders}`
      );
    }

    if (!closing) {
      const available = Math.max(0, portfolio.buyingPower - context.reservedBuyingPower);
      const affordable = floorToLot(available / intent.price, trading.lotSize);

      if (affordable <= 0) {
        return reject(
          'INSUFFICIENT_BUYING_POWER',
          `Buying power ${available.toFixed(2)} cannot cover one lot at ${intent.price}`
        );
      }
      if (quantity > affordable) {
        adjustments.push({ rule: 'BUYING_POWER', from: quantity, to: affordable });
        quantity = affordable;
      }
    }

    return { kind: 'APPROVE', quantity, requestedQuantity: intent.quantity, adjustments };
  }
}
