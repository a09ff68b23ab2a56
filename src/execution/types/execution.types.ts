/**
 * Core types for the trade bot execution engine
 */

// Order Side
export type OrderSide = 'BUY' | 'SELL';

// Order Types
export type OrderType = 'MARKET' | 'LIMIT';

// Order lifecycle states
export type OrderState =
  | 'PENDING'
  | 'APPROVED'
  | 'SUBMITTED'
  | 'PARTIALLY_FILLED'
  | 'FILLED'
  | 'REJECTED'
  | 'CANCELLED';

// Whether an order adds exposure or reduces an existing position
export type OrderPurpose = 'OPEN' | 'CLOSE';

export type RiskRejectionReason =
  | 'ZERO_QUANTITY'
  | 'INVALID_PRICE'
  | 'MAX_POSITION_SIZE'
  | 'DAILY_LOSS_LIMIT'
  | 'MAX_OPEN_ORDERS'
  | 'INSUFFICIENT_BUYING_POWER';

export type OrderRejectionReason = RiskRejectionReason | 'SUBMISSION_FAILED' | 'BROKER_REJECTED';

export type CancelReason = 'MANUAL' | 'STOP_LOSS' | 'TAKE_PROFIT' | 'BROKER_CANCELLED';

// Why a closing intent was produced
export type ExitReason = 'SIGNAL' | 'STOP_LOSS' | 'TAKE_PROFIT' | 'TRAILING_STOP';

/**
 * Market data
 */
export type BarInterval = '1m' | '5m' | '15m' | '30m' | '1h' | '4h' | '1d';

export interface Bar {
  timestamp: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface BarGap {
  from: Date;
  to: Date;
  missingBars: number;
}

export interface MarketDataSeries {
  symbol: string;
  interval: BarInterval;
  bars: readonly Bar[];
  gaps: readonly BarGap[];
}

/**
 * Strategy signal contract
 */
export type SignalDirection = 'LONG' | 'SHORT' | 'FLAT';

export interface SignalIntent {
  direction: SignalDirection;
  /** Advisory sizing input in [0, 1] */
  conviction: number;
}

/**
 * A concrete trade proposal handed to the risk layer
 */
export interface OrderIntent {
  symbol: string;
  side: OrderSide;
  quantity: number;
  /** Live quote the proposal was formed against */
  price: number;
  purpose: OrderPurpose;
  exitReason?: ExitReason;
}

/**
 * Engine-owned order record
 */
export interface Order {
  id: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  requestedQuantity: number;
  type: OrderType;
  limitPrice?: number;
  referencePrice: number;
  purpose: OrderPurpose;
  state: OrderState;
  brokerOrderId?: string;
  filledQuantity: number;
  averageFillPrice: number;
  submissionAttempts: number;
  rejectionReason?: OrderRejectionReason;
  cancelReason?: CancelReason;
  exitReason?: ExitReason;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A confirmed (partial or full) execution
 */
export interface Fill {
  fillId: string;
  quantity: number;
  price: number;
  timestamp: Date;
}

/**
 * Ledger state
 */
export interface Position {
  symbol: string;
  /** Signed: positive long, negative short */
  quantity: number;
  averageEntryPrice: number;
  lastPrice: number;
  marketValue: number;
  unrealizedPnl: number;
  /** Best price seen since the position opened (highest for longs, lowest for shorts) */
  watermarkPrice: number;
  openedAt: Date;
  updatedAt: Date;
}

export interface PortfolioSnapshot {
  cash: number;
  buyingPower: number;
  positionsMarketValue: number;
  grossExposure: number;
  equity: number;
  realizedPnl: number;
  sessionRealizedPnl: number;
  unrealizedPnl: number;
  /** Change in equity since the session started */
  sessionPnl: number;
  sessionDate: string | null;
  circuitBreakerTripped: boolean;
  positions: Readonly<Record<string, Position>>;
  takenAt: Date;
}

export type LedgerRecordType =
  | 'FILL_APPLIED'
  | 'ORDER_CLOSED'
  | 'SESSION_STARTED'
  | 'CIRCUIT_BREAKER_TRIPPED';

export interface LedgerRecord {
  sequence: number;
  type: LedgerRecordType;
  symbol?: string;
  orderId?: string;
  fillId?: string;
  side?: OrderSide;
  quantity?: number;
  price?: number;
  realizedPnl?: number;
  /** Part of the fill that reduced an existing position */
  closedQuantity?: number;
  positionQuantity?: number;
  cash: number;
  detail?: string;
  timestamp: Date;
}

export interface LedgerCheckpoint {
  ledgerId: string;
  sequence: number;
  cash: number;
  realizedPnl: number;
  sessionRealizedPnl: number;
  sessionStartEquity: number;
  sessionDate: string | null;
  circuitBreakerTripped: boolean;
  positions: Position[];
  /** Fills applied to orders that are not yet closed */
  openOrderFills: Record<string, OrderFillState>;
  /** Most recently closed order ids, oldest first */
  closedOrderIds: string[];
  performance: TradePerformanceStats;
  savedAt: Date;
}

export interface OrderFillState {
  filledQuantity: number;
  fillIds: string[];
}

/**
 * Running totals over fills that closed exposure
 */
export interface TradePerformanceStats {
  trades: number;
  wins: number;
  losses: number;
  totalPnl: number;
  grossProfit: number;
  /** Magnitude of losing trades */
  grossLoss: number;
  peakPnl: number;
  maxDrawdown: number;
  maxDrawdownPercent: number;
}

export interface TradePerformanceSummary {
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
  /** Percent */
  winRate: number;
  totalPnl: number;
  averagePnl: number;
  averageWin: number;
  averageLoss: number;
  profitFactor: number;
  maxDrawdown: number;
  maxDrawdownPercent: number;
}

/**
 * Risk layer
 */
export interface RiskContext {
  portfolio: PortfolioSnapshot;
  /** Orders not yet in a terminal state */
  openOrderCount: number;
  /** Signed quantity still working per symbol (BUY positive) */
  pendingQuantity: Readonly<Record<string, number>>;
  /** Buying power committed to working opening orders */
  reservedBuyingPower: number;
}

export interface RiskAdjustment {
  rule: 'MAX_POSITION_SIZE' | 'BUYING_POWER';
  from: number;
  to: number;
}

export type RiskDecision =
  | {
      kind: 'APPROVE';
      quantity: number;
      requestedQuantity: number;
      adjustments: RiskAdjustment[];
    }
  | {
      kind: 'REJECT';
      reason: RiskRejectionReason;
      detail: string;
    };

/**
 * Broker adapter types
 */
export interface OrderRequest {
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  type: OrderType;
  limitPrice?: number;
}

export type SubmitOrderResult =
  | { ok: true; brokerOrderId: string }
  | { ok: false; reason: string };

export type BrokerOrderState = 'OPEN' | 'PARTIALLY_FILLED' | 'FILLED' | 'CANCELLED' | 'REJECTED';

export interface BrokerOrderStatus {
  brokerOrderId: string;
  state: BrokerOrderState;
  filledQuantity: number;
  averageFillPrice: number;
}

export type CancelOrderResult = 'ACK' | 'NOT_FOUND';

export interface AccountInfo {
  accountId: string;
  cash: number;
  buyingPower: number;
}

/**
 * Engine events
 */
export type EngineEventKind =
  | 'ENGINE_STARTED'
  | 'ENGINE_STOPPED'
  | 'ENGINE_HALTED'
  | 'CYCLE_SKIPPED'
  | 'ORDER_CREATED'
  | 'ORDER_APPROVED'
  | 'ORDER_REJECTED'
  | 'ORDER_SUBMITTED'
  | 'ORDER_SUBMISSION_RETRY'
  | 'ORDER_PARTIALLY_FILLED'
  | 'ORDER_FILLED'
  | 'ORDER_CANCELLED'
  | 'LEDGER_FILL_APPLIED'
  | 'LEDGER_ORDER_CLOSED'
  | 'LEDGER_SESSION_STARTED'
  | 'CIRCUIT_BREAKER_TRIPPED';

export interface EngineEvent {
  id: string;
  timestamp: Date;
  /** Empty for engine-wide events */
  symbol: string;
  kind: EngineEventKind;
  payload: Record<string, unknown>;
}

/**
 * Result of one symbol cycle
 */
export type SymbolCycleOutcome =
  | 'STOPPED'
  | 'OUTSIDE_TRADING_HOURS'
  | 'DATA_UNAVAILABLE'
  | 'NO_ACTION'
  | 'REJECTED'
  | 'SUBMITTED'
  | 'FAILED';

export interface SymbolCycleResult {
  symbol: string;
  outcome: SymbolCycleOutcome;
  orderId?: string;
  detail?: string;
}

export interface CycleReport {
  cycle: number;
  startedAt: Date;
  completedAt: Date;
  results: SymbolCycleResult[];
}
