/**
 * Risk Validator Interface - Enforces risk limits against a portfolio snapshot
 */

import type { OrderIntent, RiskContext, RiskDecision } from '../types/execution.types';
import type { RiskManagementConfig, TradingConfig } from '../../config/trade-bot.config';

export interface RiskLimits {
  trading: TradingConfig;
  risk: RiskManagementConfig;
}

export interface RiskValidator {
  /**
   * Approve (possibly resized) or reject a proposed trade. Must be pure:
   * identical inputs yield identical decisions.
   */
  evaluate(intent: OrderIntent, context: RiskContext, limits: RiskLimits): RiskDecision;
}
