/**
 * Execution Engine Interfaces Export
 */

export type { BrokerAdapter } from './broker-adapter.interface';
export type { StrategySignal } from './strategy-signal.interface';
export type { RiskValidator, RiskLimits } from './risk-validator.interface';
export type { LedgerRepository } from './ledger-repository.interface';
