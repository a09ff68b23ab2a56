/**
 * Execution Engine Service - Main control loop for the trade bot
 *
 * authenticate → (per cycle, per symbol) reconcile → fetch → decide →
 * risk-check → submit → confirm. Symbol cycles run concurrently and share
 * only the ledger.
 */

import type { TradeBotConfig } from '../../config/trade-bot.config';
import type { BrokerAdapter } from '../interfaces/broker-adapter.interface';
import type { LedgerRepository } from '../interfaces/ledger-repository.interface';
import type { RiskValidator } from '../interfaces/risk-validator.interface';
import type { StrategySignal } from '../interfaces/strategy-signal.interface';
import type { MarketDataGatewayService } from '../../market-data/market-data-gateway.service';
import type {
  CycleReport,
  MarketDataSeries,
  Order,
  OrderIntent,
  OrderType,
  PortfolioSnapshot,
  RiskDecision,
  SymbolCycleResult,
  TradePerformanceSummary
} from '../types/execution.types';
import { OrderLifecycleService } from './order-lifecycle.service';
import { OrderManagerService } from './order-manager.service';
import { PositionLedgerService } from './position-ledger.service';
import { PositionSizingService } from './position-sizing.service';
import { RiskValidatorService } from './risk-validator.service';
import { SLTPManagerService } from './sl-tp-manager.service';
import { TradeEventLoggerService } from './trade-event-logger.service';
import { DataUnavailableError, TradeBotError, errorMessage, isFatalError } from '../errors';
import { AsyncLock } from '../../utils/async-lock';
import { withTimeout, type Sleep } from '../../utils/retry';
import { TradingSessionFilter } from '../../utils/trading-session';
import { getLogger, logError, logShutdown, logStartup } from '../../config/logger';
const logger = getLogger();

export interface ExecutionEngineDependencies {
  config: TradeBotConfig;
  broker: BrokerAdapter;
  marketData: MarketDataGatewayService;
  strategy: StrategySignal;
  ledgerRepository: LedgerRepository;
  riskValidator?: RiskValidator;
  eventLogger?: TradeEventLoggerService;
  ledgerId?: string;
  /** Delay used between submission retries */
  sleep?: Sleep;
  now?: () => Date;
}

type Decision =
  | { kind: 'REJECTED'; order: Order; decision: Extract<RiskDecision, { kind: 'REJECT' }> }
  | { kind: 'APPROVED'; order: Order };

export function sessionDateOf(at: Date): string {
  return at.toISOString().slice(0, 10);
}

export class ExecutionEngineService {
  readonly ledger: PositionLedgerService;
  readonly orderManager: OrderManagerService;
  readonly eventLogger: TradeEventLoggerService;

  private readonly config: TradeBotConfig;
  private readonly broker: BrokerAdapter;
  private readonly marketData: MarketDataGatewayService;
  private readonly strategy: StrategySignal;
  private readonly riskValidator: RiskValidator;
  private readonly lifecycle = new OrderLifecycleService();
  private readonly sizing = new PositionSizingService();
  private readonly protectiveExits: SLTPManagerService;
  private readonly tradingHours: TradingSessionFilter | null;
  private readonly decisionLock = new AsyncLock();
  private readonly now: () => Date;

  private running = false;
  private stopRequested = false;
  private cycleCount = 0;
  private haltedBy: Error | null = null;
  private wakeTimer: ReturnType<typeof setTimeout> | null = null;
  private wake: (() => void) | null = null;

  constructor(dependencies: ExecutionEngineDependencies) {
    this.config = dependencies.config;
    this.broker = dependencies.broker;
    this.marketData = dependencies.marketData;
    this.strategy = dependencies.strategy;
    this.riskValidator = dependencies.riskValidator ?? new RiskValidatorService();
    this.now = dependencies.now ?? (() => new Date());
    this.eventLogger = dependencies.eventLogger ?? new TradeEventLoggerService({ now: this.now });
    this.protectiveExits = new SLTPManagerService(this.config.risk);
    this.tradingHours = this.config.trading.tradingHours
      ? new TradingSessionFilter(this.config.trading.tradingHours)
      : null;

    this.ledger = new PositionLedgerService(dependencies.ledgerRepository, this.eventLogger, {
      ledgerId: dependencies.ledgerId,
      marginMultiplier: this.config.trading.marginMultiplier,
      buyingPowerCap: this.config.trading.buyingPowerCap,
      requestTimeoutMs: this.config.execution.requestTimeoutMs,
      maxDailyLoss: this.config.risk.maxDailyLoss,
      closedOrderRetention: this.config.execution.historyLimit,
      recordRetention: this.config.execution.historyLimit,
      now: this.now
    });

    this.orderManager = new OrderManagerService(
      this.broker,
      this.ledger,
      this.lifecycle,
      this.eventLogger,
      this.config.execution,
      dependencies.sleep,
      this.now
    );

    logger.info(
      { symbols: this.config.trading.symbols, strategy: this.strategy.name },
      'Execution engine initialized'
    );
  }

  /**
   * Authenticate, restore the ledger and run one cycle per polling interval
   * until stop() is called. Fatal errors halt the loop and reject.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Execution engine is already running');
    }

    this.running = true;
    this.stopRequested = false;
    logStartup(this.config.trading.symbols, this.config.trading.pollingIntervalMs);

    try {
      await this.initialize();

      while (!this.stopRequested) {
        await this.runCycle();
        if (this.stopRequested) break;
        await this.waitForNextCycle(this.config.trading.pollingIntervalMs);
      }

      this.eventLogger.emit('', 'ENGINE_STOPPED', { cycles: this.cycleCount });
    } finally {
      this.running = false;
      logShutdown(this.haltedBy ? this.haltedBy.message : 'stop requested');
      await this.disconnectBroker();
    }
  }

  /**
   * Connect to the broker and restore ledger state. Called by start().
   */
  async initialize(): Promise<void> {
    const timeoutMs = this.config.execution.requestTimeoutMs;

    if (!this.broker.isAdapterConnected()) {
      await withTimeout(this.broker.connect(), timeoutMs, 'broker.connect');
    }
    const account = await withTimeout(this.broker.validateAccount(), timeoutMs, 'broker.validateAccount');
    await this.ledger.initialize(account.cash);

    this.eventLogger.emit('', 'ENGINE_STARTED', {
      accountId: account.accountId,
      cash: account.cash,
      symbols: [...this.config.trading.symbols],
      strategy: this.strategy.name
    });
  }

  /**
   * Request a cooperative stop. The current cycle completes; no new cycle starts.
   */
  stop(): void {
    this.stopRequested = true;
    if (this.wakeTimer) {
      clearTimeout(this.wakeTimer);
      this.wakeTimer = null;
    }
    this.wake?.();
    this.wake = null;
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Process every symbol once. Per-symbol failures are isolated; a fatal
   * error halts the engine and is rethrown.
   */
  async runCycle(): Promise<CycleReport> {
    if (this.haltedBy) {
      throw this.haltedBy;
    }

    const cycle = ++this.cycleCount;
    const startedAt = this.now();
    try {
      await this.ledger.startSession(sessionDateOf(startedAt));
    } catch (error) {
      if (isFatalError(error)) {
        this.halt(error);
      }
      throw error;
    }

    const symbols = this.config.trading.symbols;
    const outcomes = await Promise.allSettled(symbols.map(symbol => this.processSymbol(symbol)));

    const results: SymbolCycleResult[] = [];
    const failures: unknown[] = [];

    for (const [index, outcome] of outcomes.entries()) {
      const symbol = symbols[index] ?? '';
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
        continue;
      }

      if (isFatalError(outcome.reason)) {
        failures.push(outcome.reason);
      }
      logger.error({ symbol, cycle, error: errorMessage(outcome.reason) }, 'Symbol cycle failed');
      results.push({ symbol, outcome: 'FAILED', detail: errorMessage(outcome.reason) });
    }

    if (failures.length > 0) {
      this.halt(failures[0]);
    }

    const report: CycleReport = { cycle, startedAt, completedAt: this.now(), results };
    logger.info(
      { cycle, outcomes: results.map(result => `${result.symbol}:${result.outcome}`) },
      'Cycle complete'
    );
    return report;
  }

  /**
   * Cancel one engine order by id
   */
  async cancelOrder(orderId: string): Promise<Order> {
    return this.orderManager.cancel(orderId, 'MANUAL');
  }

  getOrders(): Order[] {
    return this.orderManager.getOrders();
  }

  async getSnapshot(): Promise<PortfolioSnapshot> {
    return this.ledger.snapshot();
  }

  /**
   * Trade count, win rate, P&L and drawdown over fills that closed exposure
   */
  async getPerformanceSummary(): Promise<TradePerformanceSummary> {
    return this.ledger.getPerformanceSummary();
  }

  private async processSymbol(symbol: string): Promise<SymbolCycleResult> {
    if (this.stopRequested) {
      return { symbol, outcome: 'STOPPED' };
    }

    await this.reconcile(symbol);

    if (this.tradingHours && !this.tradingHours.isWithinTradingHours(this.now())) {
      logger.debug({ symbol, tradingHours: this.tradingHours.describe() }, 'Outside trading hours');
      this.eventLogger.emit(symbol, 'CYCLE_SKIPPED', { reason: 'OUTSIDE_TRADING_HOURS' });
      return { symbol, outcome: 'OUTSIDE_TRADING_HOURS', detail: 'Outside trading hours' };
    }

    let series: MarketDataSeries;
    try {
      series = await this.marketData.fetch(
        symbol,
        this.config.trading.lookbackBars,
        this.config.trading.barInterval
      );
    } catch (error) {
      if (error instanceof DataUnavailableError) {
        this.eventLogger.emit(symbol, 'CYCLE_SKIPPED', { reason: error.code, detail: error.message });
        return { symbol, outcome: 'DATA_UNAVAILABLE', detail: error.message };
      }
      throw error;
    }
    const price = this.marketData.latestPrice(series);

    await this.ledger.markPrice(symbol, price);
    await this.cancelBreachedOrders(symbol, price);

    let intent: OrderIntent | null = null;
    const position = await this.ledger.getPosition(symbol);
    const exit = position ? this.protectiveExits.evaluatePosition(position, price) : null;
    const openOrders = this.orderManager.getOpenOrders(symbol);

    if (exit) {
      if (openOrders.some(order => order.purpose === 'CLOSE')) {
        return { symbol, outcome: 'NO_ACTION', detail: 'Closing order already working' };
      }
      intent = exit;
    } else {
      if (openOrders.length > 0) {
        return { symbol, outcome: 'NO_ACTION', detail: 'Order already working' };
      }

      const signal = await this.strategy.generateIntent(symbol, series.bars, this.config.indicators);
      const snapshot = await this.ledger.snapshot();
      const sized = this.sizing.sizeIntent({
        symbol,
        signal,
        price,
        positionQuantity: position?.quantity ?? 0,
        buyingPower: snapshot.buyingPower,
        trading: this.config.trading
      });
      if (!sized.intent) {
        return { symbol, outcome: 'NO_ACTION', detail: sized.reason };
      }
      intent = sized.intent;
    }

    const decision = await this.decide(intent);

    switch (decision.kind) {
      case 'REJECTED': {
        const { reason, detail } = decision.decision;
        await this.orderManager.reject(decision.order.id, reason, detail);
        return { symbol, outcome: 'REJECTED', orderId: decision.order.id, detail: reason };
      }

      case 'APPROVED': {
        const submitted = await this.orderManager.submit(decision.order.id);
        if (submitted.state === 'REJECTED') {
          return { symbol, outcome: 'FAILED', orderId: submitted.id, detail: submitted.rejectionReason };
        }

        const confirmed = await this.orderManager.poll(submitted.id);
        return { symbol, outcome: 'SUBMITTED', orderId: confirmed.id, detail: confirmed.state };
      }
    }
  }

  /**
   * Risk evaluation and order creation for one intent. Serialized across
   * symbols so concurrent cycles see each other's reserved buying power.
   */
  private async decide(intent: OrderIntent): Promise<Decision> {
    return this.decisionLock.runExclusive(async () => {
      const portfolio = await this.ledger.snapshot();
      const context = {
        portfolio,
        openOrderCount: this.orderManager.openOrderCount(),
        pendingQuantity: this.orderManager.pendingQuantity(),
        reservedBuyingPower: this.orderManager.reservedBuyingPower()
      };

      const { type, limitPrice } = this.orderTypeFor(intent);
      const order = this.orderManager.createOrder(intent, type, limitPrice);
      const decision = this.riskValidator.evaluate(intent, context, this.config);

      if (decision.kind === 'REJECT') {
        return { kind: 'REJECTED', order, decision };
      }

      return { kind: 'APPROVED', order: this.orderManager.approve(order.id, decision.quantity) };
    });
  }

  /**
   * Closing orders always go to market; opening orders use the configured type
   */
  private orderTypeFor(intent: OrderIntent): { type: OrderType; limitPrice?: number } {
    const { defaultOrderType, limitOffsetPercent } = this.config.trading;
    if (intent.purpose === 'CLOSE' || defaultOrderType === 'MARKET') {
      return { type: 'MARKET' };
    }

    const offset = intent.side === 'BUY' ? 1 + limitOffsetPercent : 1 - limitOffsetPercent;
    return { type: 'LIMIT', limitPrice: Math.round(intent.price * offset * 10_000) / 10_000 };
  }

  /**
   * Poll every working order of the symbol. Transient broker errors are
   * logged and retried next cycle.
   */
  private async reconcile(symbol: string): Promise<void> {
    for (const order of this.orderManager.getWorkingOrders(symbol)) {
      try {
        await this.orderManager.poll(order.id);
      } catch (error) {
        if (isFatalError(error) || !(error instanceof TradeBotError)) {
          throw error;
        }
        logger.warn({ symbol, orderId: order.id, error: error.message }, 'Order status poll failed');
      }
    }
  }

  private async cancelBreachedOrders(symbol: string, price: number): Promise<void> {
    for (const order of this.orderManager.getWorkingOrders(symbol)) {
      const reason = this.protectiveExits.evaluateWorkingOrder(order, price);
      if (reason) {
        logger.info({ symbol, orderId: order.id, reason, price, referencePrice: order.referencePrice }, 'Cancelling order on price move');
        await this.orderManager.cancel(order.id, reason);
      }
    }
  }

  private halt(error: unknown): never {
    const failure = error instanceof Error ? error : new Error(errorMessage(error));
    this.haltedBy = failure;
    this.stop();

    this.eventLogger.emit('', 'ENGINE_HALTED', {
      error: failure.message,
      code: failure instanceof TradeBotError ? failure.code : undefined
    });
    logError(failure, { event: 'engine_halted' });

    throw failure;
  }

  private waitForNextCycle(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = resolve;
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = null;
        this.wake = null;
        resolve();
      }, ms);
    });
  }

  private async disconnectBroker(): Promise<void> {
    try {
      await withTimeout(this.broker.disconnect(), this.config.execution.requestTimeoutMs, 'broker.disconnect');
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Broker disconnect failed');
    }
  }
}
