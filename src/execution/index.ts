/**
 * Trade Bot Execution Engine - Main Export
 *
 * Order lifecycle, risk enforcement and the shared portfolio ledger behind a
 * pluggable strategy, market data source and brokerage.
 */

// Core Services
export { ExecutionEngineService, sessionDateOf } from './services/execution-engine.service';
export type { ExecutionEngineDependencies } from './services/execution-engine.service';
export { OrderLifecycleService, ORDER_STATES } from './services/order-lifecycle.service';
export { OrderManagerService } from './services/order-manager.service';
export { PerformanceTrackerService, emptyPerformanceStats } from './services/performance-tracker.service';
export { PositionLedgerService } from './services/position-ledger.service';
export { PositionSizingService, clampConviction } from './services/position-sizing.service';
export { RiskValidatorService, isClosingIntent } from './services/risk-validator.service';
export { SLTPManagerService } from './services/sl-tp-manager.service';
export { TradeEventLoggerService } from './services/trade-event-logger.service';
export type { EngineEventFilter, EngineEventListener, TradeEventLoggerOptions } from './services/trade-event-logger.service';

// Market Data
export { MarketDataGatewayService } from '../market-data/market-data-gateway.service';
export type { MarketDataSource, RawBar } from '../market-data/market-data.interface';

// Broker Adapters
export { BaseBrokerAdapter } from './adapters/base-broker.adapter';

// Persistence
export { InMemoryLedgerRepository, SupabaseLedgerRepository } from '../repositories/ledger.repository';

// Configuration
export { loadTradeBotConfig, loadTradeBotConfigFile, loadConfigOverridesFromEnv } from '../config/trade-bot.config';
export type { TradeBotConfig, TradingHoursConfig } from '../config/trade-bot.config';
export { TradingSessionFilter } from '../utils/trading-session';

// Errors
export * from './errors';

// Interfaces
export * from './interfaces';

// Types
export * from './types/execution.types';
