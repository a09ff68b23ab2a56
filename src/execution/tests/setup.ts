/**
 * Test setup for the execution engine: in-process broker, market data and strategy fakes
 */

import fc from 'fast-check';
import { BaseBrokerAdapter } from '../adapters/base-broker.adapter';
import { ExecutionEngineService } from '../services/execution-engine.service';
import { TradeEventLoggerService } from '../services/trade-event-logger.service';
import { MarketDataGatewayService } from '../../market-data/market-data-gateway.service';
import type { MarketDataSource, RawBar } from '../../market-data/market-data.interface';
import type { StrategySignal } from '../interfaces/strategy-signal.interface';
import { InMemoryLedgerRepository } from '../../repositories/ledger.repository';
import { loadTradeBotConfig, type TradeBotConfig } from '../../config/trade-bot.config';
import type {
  AccountInfo,
  Bar,
  BrokerOrderState,
  BrokerOrderStatus,
  CancelOrderResult,
  Fill,
  Order,
  OrderRequest,
  OrderSide,
  PortfolioSnapshot,
  Position,
  SignalIntent,
  SubmitOrderResult
} from '../types/execution.types';

export const noSleep = async (): Promise<void> => undefined;

export const TEST_TIME = new Date(Date.UTC(2024, 0, 2, 15, 0));

/**
 * Property-based test generators
 */
export const orderSideArbitrary: fc.Arbitrary<OrderSide> = fc.constantFrom<OrderSide>('BUY', 'SELL');

export const priceArbitrary = fc.double({ min: 1, max: 1000, noNaN: true, noDefaultInfinity: true });

export const quantityArbitrary = fc.integer({ min: 1, max: 500 });

export const symbolArbitrary = fc.constantFrom('AAPL', 'MSFT', 'SPY', 'QQQ');

/**
 * Fake brokerage
 */
interface FakeBrokerOrder {
  request: OrderRequest;
  status: BrokerOrderStatus;
}

export type FillPolicy = 'FULL' | 'NONE';

export class FakeBrokerAdapter extends BaseBrokerAdapter {
  readonly submitted: OrderRequest[] = [];
  readonly cancelled: string[] = [];
  readonly orders = new Map<string, FakeBrokerOrder>();
  readonly fillPrices = new Map<string, number>();

  fillPolicy: FillPolicy = 'FULL';
  /** Number of upcoming submissions that fail with a transport error */
  failNextSubmissions = 0;
  /** When set, submissions resolve as refused */
  refuseReason: string | null = null;
  disconnectCalls = 0;
  private nextId = 1;

  constructor(private readonly cash: number = 100_000) {
    super();
  }

  async connect(): Promise<void> {
    this.isConnected = true;
  }

  async disconnect(): Promise<void> {
    this.isConnected = false;
    this.disconnectCalls++;
  }

  async validateAccount(): Promise<AccountInfo> {
    this.ensureConnected();
    return { accountId: 'test-account', cash: this.cash, buyingPower: this.cash };
  }

  protected async placeOrder(order: OrderRequest): Promise<SubmitOrderResult> {
    if (this.failNextSubmissions > 0) {
      this.failNextSubmissions--;
      throw new Error('connection reset');
    }
    if (this.refuseReason !== null) {
      return { ok: false, reason: this.refuseReason };
    }

    const brokerOrderId = `B-${this.nextId++}`;
    this.submitted.push(order);
    this.orders.set(brokerOrderId, {
      request: order,
      status: { brokerOrderId, state: 'OPEN', filledQuantity: 0, averageFillPrice: 0 }
    });
    return { ok: true, brokerOrderId };
  }

  async getOrderStatus(brokerOrderId: string): Promise<BrokerOrderStatus> {
    const order = this.requireOrder(brokerOrderId);

    if (this.fillPolicy === 'FULL' && order.status.state === 'OPEN') {
      const price = order.request.limitPrice ?? this.fillPrices.get(order.request.symbol) ?? 100;
      order.status = {
        brokerOrderId,
        state: 'FILLED',
        filledQuantity: order.request.quantity,
        averageFillPrice: price
      };
    }

    return { ...order.status };
  }

  async cancelOrder(brokerOrderId: string): Promise<CancelOrderResult> {
    const order = this.orders.get(brokerOrderId);
    if (!order) {
      return 'NOT_FOUND';
    }

    this.cancelled.push(brokerOrderId);
    if (order.status.state === 'OPEN' || order.status.state === 'PARTIALLY_FILLED') {
      order.status = { ...order.status, state: 'CANCELLED' };
    }
    return 'ACK';
  }

  /**
   * Script the broker-side status of an order
   */
  setStatus(brokerOrderId: string, state: BrokerOrderState, filledQuantity: number, averageFillPrice: number): void {
    const order = this.requireOrder(brokerOrderId);
    order.status = { brokerOrderId, state, filledQuantity, averageFillPrice };
  }

  private requireOrder(brokerOrderId: string): FakeBrokerOrder {
    const order = this.orders.get(brokerOrderId);
    if (!order) {
      throw new Error(`Unknown broker order ${brokerOrderId}`);
    }
    return order;
  }
}

/**
 * Fake market data feed
 */
export function barsFromCloses(closes: readonly number[], start: Date = new Date(Date.UTC(2024, 0, 2, 14, 30))): RawBar[] {
  return closes.map((close, index) => ({
    timestamp: new Date(start.getTime() + index * 5 * 60_000),
    open: close,
    high: close,
    low: close,
    close,
    volume: 1_000
  }));
}

export class StaticMarketDataSource implements MarketDataSource {
  readonly name = 'static-feed';
  readonly calls = new Map<string, number>();
  private readonly bars = new Map<string, RawBar[]>();

  setCloses(symbol: string, closes: readonly number[]): void {
    this.bars.set(symbol, barsFromCloses(closes));
  }

  setEmpty(symbol: string): void {
    this.bars.set(symbol, []);
  }

  async fetchBars(symbol: string): Promise<RawBar[]> {
    this.calls.set(symbol, (this.calls.get(symbol) ?? 0) + 1);
    return [...(this.bars.get(symbol) ?? [])];
  }
}

/**
 * Strategy that returns a fixed intent per symbol
 */
export class ScriptedStrategy implements StrategySignal {
  readonly name = 'scripted';
  readonly seen: Array<{ symbol: string; bars: number }> = [];
  private readonly intents = new Map<string, SignalIntent>();

  set(symbol: string, intent: SignalIntent): void {
    this.intents.set(symbol, intent);
  }

  generateIntent(symbol: string, bars: readonly Bar[]): SignalIntent {
    this.seen.push({ symbol, bars: bars.length });
    return this.intents.get(symbol) ?? { direction: 'FLAT', conviction: 0 };
  }
}

/**
 * Configuration and portfolio builders
 */
export interface ConfigOverrides {
  trading?: Record<string, unknown>;
  risk?: Record<string, unknown>;
  execution?: Record<string, unknown>;
}

export function makeConfig(overrides: ConfigOverrides = {}): TradeBotConfig {
  return loadTradeBotConfig({
    trading: { symbols: ['AAPL', 'MSFT'], allocationPerTrade: 0.1, ...overrides.trading },
    risk: { maxPositionSize: 100, maxDailyLoss: 500, maxOpenOrders: 5, ...overrides.risk },
    execution: {
      submitBackoffMs: 0,
      dataBackoffMs: 0,
      maxBackoffMs: 0,
      requestTimeoutMs: 1_000,
      ...overrides.execution
    }
  });
}

export function makePosition(symbol: string, quantity: number, averageEntryPrice: number, lastPrice = averageEntryPrice): Position {
  const at = TEST_TIME;
  return {
    symbol,
    quantity,
    averageEntryPrice,
    lastPrice,
    marketValue: quantity * lastPrice,
    unrealizedPnl: quantity * (lastPrice - averageEntryPrice),
    watermarkPrice: lastPrice,
    openedAt: at,
    updatedAt: at
  };
}

export function makeSnapshot(overrides: Partial<PortfolioSnapshot> = {}): PortfolioSnapshot {
  return {
    cash: 10_000,
    buyingPower: 10_000,
    positionsMarketValue: 0,
    grossExposure: 0,
    equity: 10_000,
    realizedPnl: 0,
    sessionRealizedPnl: 0,
    unrealizedPnl: 0,
    sessionPnl: 0,
    sessionDate: '2024-01-02',
    circuitBreakerTripped: false,
    positions: {},
    takenAt: TEST_TIME,
    ...overrides
  };
}

export function makeOrder(overrides: Partial<Order> = {}): Order {
  return {
    id: 'order-1',
    symbol: 'AAPL',
    side: 'BUY',
    quantity: 10,
    requestedQuantity: 10,
    type: 'MARKET',
    referencePrice: 100,
    purpose: 'OPEN',
    state: 'SUBMITTED',
    brokerOrderId: 'B-1',
    filledQuantity: 0,
    averageFillPrice: 0,
    submissionAttempts: 1,
    createdAt: TEST_TIME,
    updatedAt: TEST_TIME,
    ...overrides
  };
}

export function makeFill(fillId: string, quantity: number, price: number): Fill {
  return { fillId, quantity, price, timestamp: TEST_TIME };
}

export interface EngineHarness {
  engine: ExecutionEngineService;
  broker: FakeBrokerAdapter;
  source: StaticMarketDataSource;
  strategy: ScriptedStrategy;
  repository: InMemoryLedgerRepository;
  events: TradeEventLoggerService;
  config: TradeBotConfig;
}

export function createEngineHarness(
  overrides: ConfigOverrides = {},
  cash = 100_000,
  repository: InMemoryLedgerRepository = new InMemoryLedgerRepository()
): EngineHarness {
  const config = makeConfig(overrides);
  const broker = new FakeBrokerAdapter(cash);
  const source = new StaticMarketDataSource();
  const strategy = new ScriptedStrategy();
  const events = new TradeEventLoggerService({ now: () => TEST_TIME });

  const engine = new ExecutionEngineService({
    config,
    broker,
    marketData: new MarketDataGatewayService(source, config.execution, noSleep),
    strategy,
    ledgerRepository: repository,
    eventLogger: events,
    sleep: noSleep,
    now: () => TEST_TIME
  });

  return { engine, broker, source, strategy, repository, events, config };
}
