/**
 * Position Ledger Service - Positions, cash, P&L and session state shared by every symbol
 *
 * The single shared-mutation point of the engine. Every call runs inside one
 * async lock so readers never observe a partially applied fill. Persistence
 * writes are queued in sequence order while the lock is held and awaited
 * after it is released, so no lock is held across a repository call.
 *
 * Only open orders keep their fill ids. Closed order ids and audit records
 * are kept for a bounded window.
 */

import type { LedgerRepository } from '../interfaces/ledger-repository.interface';
import type {
  Fill,
  LedgerCheckpoint,
  LedgerRecord,
  LedgerRecordType,
  Order,
  OrderFillState,
  PortfolioSnapshot,
  Position,
  TradePerformanceSummary
} from '../types/execution.types';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import { PerformanceTrackerService } from './performance-tracker.service';
import { LedgerInconsistencyError, LedgerPersistenceError, errorMessage } from '../errors';
import { AsyncLock } from '../../utils/async-lock';
import { isZeroQuantity, roundQuantity } from '../../utils/quantity';
import { withTimeout } from '../../utils/retry';
import { getLogger } from '../../config/logger';
const logger = getLogger();

export interface PositionLedgerOptions {
  ledgerId?: string;
  marginMultiplier?: number;
  buyingPowerCap?: number;
  requestTimeoutMs?: number;
  /** Latch the circuit breaker once session P&L falls below the negative of this */
  maxDailyLoss?: number;
  /** How many closed order ids are remembered to refuse late fills */
  closedOrderRetention?: number;
  /** How many audit records `getRecords` keeps */
  recordRetention?: number;
  now?: () => Date;
}

const TERMINAL_STATES = new Set<Order['state']>(['FILLED', 'REJECTED', 'CANCELLED']);

function roundMoney(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function revalue(position: Position, price: number, at: Date): Position {
  const long = position.quantity > 0;
  return {
    ...position,
    lastPrice: price,
    marketValue: roundMoney(position.quantity * price),
    unrealizedPnl: roundMoney(position.quantity * (price - position.averageEntryPrice)),
    watermarkPrice: long ? Math.max(position.watermarkPrice, price) : Math.min(position.watermarkPrice, price),
    updatedAt: at
  };
}

export class PositionLedgerService {
  private readonly lock = new AsyncLock();
  private readonly persistQueue = new AsyncLock();
  private readonly ledgerId: string;
  private readonly marginMultiplier: number;
  private readonly buyingPowerCap: number | undefined;
  private readonly requestTimeoutMs: number;
  private readonly maxDailyLoss: number | undefined;
  private readonly closedOrderRetention: number;
  private readonly recordRetention: number;
  private readonly now: () => Date;

  private cash = 0;
  private realizedPnl = 0;
  private sessionRealizedPnl = 0;
  private sessionStartEquity = 0;
  private sessionDate: string | null = null;
  private circuitBreakerTripped = false;
  private sequence = 0;
  private performance = new PerformanceTrackerService();
  private readonly positions = new Map<string, Position>();
  private readonly openOrderFills = new Map<string, OrderFillState>();
  private readonly closedOrderIds = new Set<string>();
  private readonly records: LedgerRecord[] = [];

  constructor(
    private readonly repository: LedgerRepository,
    private readonly events: TradeEventLoggerService,
    options: PositionLedgerOptions = {}
  ) {
    this.ledgerId = options.ledgerId ?? 'default';
    this.marginMultiplier = options.marginMultiplier ?? 1;
    this.buyingPowerCap = options.buyingPowerCap;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 10_000;
    this.maxDailyLoss = options.maxDailyLoss;
    this.closedOrderRetention = options.closedOrderRetention ?? 1_000;
    this.recordRetention = options.recordRetention ?? 1_000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Restore the latest checkpoint, or seed cash on first start
   */
  async initialize(fallbackCash: number): Promise<void> {
    const checkpoint = await this.persist('loadCheckpoint', () => this.repository.loadCheckpoint(this.ledgerId));

    await this.lock.runExclusive(() => {
      this.positions.clear();
      this.openOrderFills.clear();
      this.closedOrderIds.clear();

      if (checkpoint) {
        this.cash = checkpoint.cash;
        this.realizedPnl = checkpoint.realizedPnl;
        this.sessionRealizedPnl = checkpoint.sessionRealizedPnl;
        this.sessionStartEquity = checkpoint.sessionStartEquity;
        this.sessionDate = checkpoint.sessionDate;
        this.circuitBreakerTripped = checkpoint.circuitBreakerTripped;
        this.sequence = checkpoint.sequence;
        for (const position of checkpoint.positions) {
          this.positions.set(position.symbol, { ...position });
        }
        for (const [orderId, state] of Object.entries(checkpoint.openOrderFills)) {
          this.openOrderFills.set(orderId, { filledQuantity: state.filledQuantity, fillIds: [...state.fillIds] });
        }
        checkpoint.closedOrderIds.forEach(id => this.rememberClosedOrder(id));
        this.performance = new PerformanceTrackerService(checkpoint.performance);

        logger.info(
          { ledgerId: this.ledgerId, sequence: this.sequence, cash: this.cash, positions: this.positions.size },
          'Ledger restored from checkpoint'
        );
      } else {
        this.cash = fallbackCash;
        this.realizedPnl = 0;
        this.sessionRealizedPnl = 0;
        this.sessionStartEquity = fallbackCash;
        this.sessionDate = null;
        this.circuitBreakerTripped = false;
        this.sequence = 0;
        this.performance = new PerformanceTrackerService();

        logger.info({ ledgerId: this.ledgerId, cash: fallbackCash }, 'Ledger seeded with starting cash');
      }
    });
  }

  /**
   * Apply one confirmed fill of `order`
   */
  async applyFill(order: Order, fill: Fill): Promise<LedgerRecord> {
    const { record, persisted } = await this.lock.runExclusive(() => {
      this.assertFillAllowed(order, fill);

      const at = fill.timestamp;
      const signed = order.side === 'BUY' ? fill.quantity : -fill.quantity;
      const existing = this.positions.get(order.symbol);
      const previous = existing?.quantity ?? 0;
      let realized = 0;
      let closed = 0;
      let next: Position | null;

      if (!existing || isZeroQuantity(previous) || Math.sign(previous) === Math.sign(signed)) {
        const quantity = roundQuantity(previous + signed);
        const cost = Math.abs(previous) * (existing?.averageEntryPrice ?? 0) + fill.quantity * fill.price;
        const base: Position = existing ?? {
          symbol: order.symbol,
          quantity: 0,
          averageEntryPrice: fill.price,
          lastPrice: fill.price,
          marketValue: 0,
          unrealizedPnl: 0,
          watermarkPrice: fill.price,
          openedAt: at,
          updatedAt: at
        };
        next = revalue({ ...base, quantity, averageEntryPrice: cost / Math.abs(quantity) }, fill.price, at);
      } else {
        closed = Math.min(fill.quantity, Math.abs(previous));
        realized = roundMoney(closed * (fill.price - existing.averageEntryPrice) * Math.sign(previous));
        const quantity = roundQuantity(previous + signed);

        if (isZeroQuantity(quantity)) {
          next = null;
        } else if (Math.sign(quantity) === Math.sign(previous)) {
          next = revalue({ ...existing, quantity }, fill.price, at);
        } else {
          // Crossed zero: the remainder opens at the fill price
          next = revalue(
            { ...existing, quantity, averageEntryPrice: fill.price, watermarkPrice: fill.price, openedAt: at },
            fill.price,
            at
          );
        }
      }

      if (next) {
        this.positions.set(order.symbol, next);
      } else {
        this.positions.delete(order.symbol);
      }

      this.cash = roundMoney(this.cash - signed * fill.price);
      this.realizedPnl = roundMoney(this.realizedPnl + realized);
      this.sessionRealizedPnl = roundMoney(this.sessionRealizedPnl + realized);
      const fills = this.openOrderFills.get(order.id);
      this.openOrderFills.set(order.id, {
        filledQuantity: roundQuantity((fills?.filledQuantity ?? 0) + fill.quantity),
        fillIds: [...(fills?.fillIds ?? []), fill.fillId]
      });

      const positionQuantity = next?.quantity ?? 0;
      const record = this.appendRecord('FILL_APPLIED', at, {
        symbol: order.symbol,
        orderId: order.id,
        fillId: fill.fillId,
        side: order.side,
        quantity: fill.quantity,
        price: fill.price,
        realizedPnl: realized,
        closedQuantity: roundQuantity(closed),
        positionQuantity
      });
      this.performance.recordFill(record);

      this.events.emit(order.symbol, 'LEDGER_FILL_APPLIED', {
        orderId: order.id,
        fillId: fill.fillId,
        side: order.side,
        quantity: fill.quantity,
        price: fill.price,
        realizedPnl: realized,
        positionQuantity,
        cash: this.cash
      });

      const tripped = this.latchCircuitBreaker(at);
      return { record, persisted: this.enqueuePersist(tripped ? [record, tripped] : [record]) };
    });

    await persisted;
    return record;
  }

  /**
   * Settle a terminal order. Called exactly once per order.
   */
  async closeOrder(order: Order): Promise<LedgerRecord> {
    const { record, persisted } = await this.lock.runExclusive(() => {
      if (!TERMINAL_STATES.has(order.state)) {
        throw new LedgerInconsistencyError(`Order ${order.id} closed while still ${order.state}`, order.id);
      }
      if (this.closedOrderIds.has(order.id)) {
        throw new LedgerInconsistencyError(`Order ${order.id} was already closed`, order.id);
      }

      const applied = this.openOrderFills.get(order.id)?.filledQuantity ?? 0;
      if (Math.abs(applied - order.filledQuantity) > 1e-9) {
        throw new LedgerInconsistencyError(
          `Order ${order.id} reports ${order.filledQuantity} filled but the ledger applied ${applied}`,
          order.id
        );
      }

      this.rememberClosedOrder(order.id);
      this.openOrderFills.delete(order.id);

      const record = this.appendRecord('ORDER_CLOSED', this.now(), {
        symbol: order.symbol,
        orderId: order.id,
        side: order.side,
        quantity: order.filledQuantity,
        price: order.averageFillPrice,
        detail: order.state
      });

      this.events.emit(order.symbol, 'LEDGER_ORDER_CLOSED', {
        orderId: order.id,
        state: order.state,
        filledQuantity: order.filledQuantity,
        averageFillPrice: order.averageFillPrice
      });

      return { record, persisted: this.enqueuePersist([record]) };
    });

    await persisted;
    return record;
  }

  /**
   * Update the last price of a held symbol. No-op when flat. Writes only
   * when the new price latches the circuit breaker.
   */
  async markPrice(symbol: string, price: number): Promise<void> {
    if (!Number.isFinite(price) || price <= 0) {
      return;
    }

    const persisted = await this.lock.runExclusive(() => {
      const position = this.positions.get(symbol);
      if (!position) {
        return null;
      }

      const at = this.now();
      this.positions.set(symbol, revalue(position, price, at));
      const tripped = this.latchCircuitBreaker(at);
      return tripped ? this.enqueuePersist([tripped]) : null;
    });

    if (persisted) {
      await persisted;
    }
  }

  /**
   * Begin a trading session. Rebases session P&L on current equity and
   * resets the circuit breaker when the date changes; returns false when the
   * session is already current.
   */
  async startSession(date: string): Promise<boolean> {
    const result = await this.lock.runExclusive(() => {
      if (this.sessionDate === date) {
        return null;
      }

      const previousDate = this.sessionDate;
      this.sessionDate = date;
      this.sessionRealizedPnl = 0;
      this.sessionStartEquity = this.equity();
      this.circuitBreakerTripped = false;

      const record = this.appendRecord('SESSION_STARTED', this.now(), { detail: date });
      this.events.emit('', 'LEDGER_SESSION_STARTED', {
        sessionDate: date,
        previousDate,
        sessionStartEquity: this.sessionStartEquity
      });

      return { persisted: this.enqueuePersist([record]) };
    });

    if (result === null) {
      return false;
    }
    await result.persisted;
    return true;
  }

  /**
   * Portfolio view computed from current positions and cash
   */
  async snapshot(): Promise<PortfolioSnapshot> {
    return this.lock.runExclusive(() => this.computeSnapshot());
  }

  async getPosition(symbol: string): Promise<Position | null> {
    return this.lock.runExclusive(() => {
      const position = this.positions.get(symbol);
      return position ? { ...position } : null;
    });
  }

  async getPerformanceSummary(): Promise<TradePerformanceSummary> {
    return this.lock.runExclusive(() => this.performance.summarize());
  }

  /**
   * Most recent audit records appended since this process started
   */
  getRecords(): readonly LedgerRecord[] {
    return [...this.records];
  }

  /**
   * Latch the breaker for the rest of the session once session P&L is past
   * the daily loss limit. Must be called while the state lock is held.
   */
  private latchCircuitBreaker(at: Date): LedgerRecord | null {
    if (this.circuitBreakerTripped || this.maxDailyLoss === undefined) {
      return null;
    }

    const sessionPnl = roundMoney(this.equity() - this.sessionStartEquity);
    if (sessionPnl >= -this.maxDailyLoss) {
      return null;
    }

    const reason = `Session P&L ${sessionPnl.toFixed(2)} exceeds max daily loss ${this.maxDailyLoss}`;
    this.circuitBreakerTripped = true;
    const record = this.appendRecord('CIRCUIT_BREAKER_TRIPPED', at, { detail: reason });
    this.events.emit('', 'CIRCUIT_BREAKER_TRIPPED', { reason, sessionDate: this.sessionDate, sessionPnl });
    logger.warn({ reason, sessionDate: this.sessionDate }, 'Circuit breaker tripped');

    return record;
  }

  private equity(): number {
    let positionsMarketValue = 0;
    for (const position of this.positions.values()) {
      positionsMarketValue += position.marketValue;
    }
    return roundMoney(this.cash + positionsMarketValue);
  }

  private rememberClosedOrder(orderId: string): void {
    this.closedOrderIds.add(orderId);
    for (const oldest of this.closedOrderIds) {
      if (this.closedOrderIds.size <= this.closedOrderRetention) {
        break;
      }
      this.closedOrderIds.delete(oldest);
    }
  }

  private computeSnapshot(): PortfolioSnapshot {
    let positionsMarketValue = 0;
    let grossExposure = 0;
    let unrealizedPnl = 0;
    const positions: Record<string, Position> = {};

    for (const position of this.positions.values()) {
      positionsMarketValue += position.marketValue;
      grossExposure += Math.abs(position.marketValue);
      unrealizedPnl += position.unrealizedPnl;
      positions[position.symbol] = { ...position };
    }

    const equity = roundMoney(this.cash + positionsMarketValue);
    const uncapped = Math.max(0, equity * this.marginMultiplier - grossExposure);
    const buyingPower = roundMoney(
      this.buyingPowerCap === undefined ? uncapped : Math.min(uncapped, this.buyingPowerCap)
    );

    return {
      cash: this.cash,
      buyingPower,
      positionsMarketValue: roundMoney(positionsMarketValue),
      grossExposure: roundMoney(grossExposure),
      equity,
      realizedPnl: this.realizedPnl,
      sessionRealizedPnl: this.sessionRealizedPnl,
      unrealizedPnl: roundMoney(unrealizedPnl),
      sessionPnl: roundMoney(equity - this.sessionStartEquity),
      sessionDate: this.sessionDate,
      circuitBreakerTripped: this.circuitBreakerTripped,
      positions,
      takenAt: this.now()
    };
  }

  private assertFillAllowed(order: Order, fill: Fill): void {
    if (order.brokerOrderId === undefined) {
      throw new LedgerInconsistencyError(`Fill ${fill.fillId} references order ${order.id} that was never submitted`, order.id);
    }
    if (this.closedOrderIds.has(order.id)) {
      throw new LedgerInconsistencyError(`Fill ${fill.fillId} references closed order ${order.id}`, order.id);
    }
    if (this.openOrderFills.get(order.id)?.fillIds.includes(fill.fillId)) {
      throw new LedgerInconsistencyError(`Fill ${fill.fillId} was already applied`, order.id);
    }
    if (!Number.isFinite(fill.quantity) || fill.quantity <= 0 || !Number.isFinite(fill.price) || fill.price <= 0) {
      throw new LedgerInconsistencyError(
        `Fill ${fill.fillId} has invalid quantity ${fill.quantity} or price ${fill.price}`,
        order.id
      );
    }

    const cumulative = (this.openOrderFills.get(order.id)?.filledQuantity ?? 0) + fill.quantity;
    if (cumulative > order.quantity + 1e-9) {
      throw new LedgerInconsistencyError(
        `Fills for order ${order.id} total ${roundQuantity(cumulative)}, above requested ${order.quantity}`,
        order.id
      );
    }
  }

  private appendRecord(
    type: LedgerRecordType,
    timestamp: Date,
    fields: Omit<LedgerRecord, 'sequence' | 'type' | 'cash' | 'timestamp'>
  ): LedgerRecord {
    this.sequence++;
    const record: LedgerRecord = Object.freeze({
      ...fields,
      sequence: this.sequence,
      type,
      cash: this.cash,
      timestamp
    });
    this.records.push(record);
    if (this.records.length > this.recordRetention) {
      this.records.splice(0, this.records.length - this.recordRetention);
    }
    return record;
  }

  private checkpoint(): LedgerCheckpoint {
    return {
      ledgerId: this.ledgerId,
      sequence: this.sequence,
      cash: this.cash,
      realizedPnl: this.realizedPnl,
      sessionRealizedPnl: this.sessionRealizedPnl,
      sessionStartEquity: this.sessionStartEquity,
      sessionDate: this.sessionDate,
      circuitBreakerTripped: this.circuitBreakerTripped,
      positions: [...this.positions.values()].map(position => ({ ...position })),
      openOrderFills: Object.fromEntries(
        [...this.openOrderFills].map(([orderId, state]) => [orderId, { ...state, fillIds: [...state.fillIds] }])
      ),
      closedOrderIds: [...this.closedOrderIds],
      performance: this.performance.getStats(),
      savedAt: this.now()
    };
  }

  /**
   * Queue the records and a checkpoint of the current state. Must be called
   * while the state lock is held so writes keep sequence order.
   */
  private enqueuePersist(records: LedgerRecord[]): Promise<void> {
    const checkpoint = this.checkpoint();
    return this.persistQueue.runExclusive(async () => {
      for (const record of records) {
        await this.persist('appendRecord', () => this.repository.appendRecord(this.ledgerId, record));
      }
      await this.persist('saveCheckpoint', () => this.repository.saveCheckpoint(checkpoint));
    });
  }

  private async persist<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await withTimeout(call(), this.requestTimeoutMs, `ledger.${operation}`);
    } catch (error) {
      logger.error({ ledgerId: this.ledgerId, operation, error: errorMessage(error) }, 'Ledger persistence failed');
      throw new LedgerPersistenceError(operation, error);
    }
  }
}
