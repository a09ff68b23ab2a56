/**
 * Order Manager Service - Owns engine orders and drives them through the lifecycle
 *
 * Submission, status polling and cancellation go through the broker adapter
 * with per-call timeouts. Confirmed fills are applied to the ledger before the
 * order changes state, and every terminal order is settled exactly once.
 * Settled orders move to a bounded history and drop their lock.
 */

import { randomUUID } from 'crypto';
import type { BrokerAdapter } from '../interfaces/broker-adapter.interface';
import type { ExecutionSettings } from '../../config/trade-bot.config';
import type {
  BrokerOrderStatus,
  CancelReason,
  Order,
  OrderIntent,
  OrderRejectionReason,
  OrderRequest,
  OrderState,
  OrderType
} from '../types/execution.types';
import type { OrderLifecycleService } from './order-lifecycle.service';
import type { PositionLedgerService } from './position-ledger.service';
import type { TradeEventLoggerService } from './trade-event-logger.service';
import { LedgerInconsistencyError, SubmissionFailedError, errorMessage } from '../errors';
import { AsyncLock } from '../../utils/async-lock';
import { QUANTITY_EPSILON, roundQuantity } from '../../utils/quantity';
import { RetryExhaustedError, retryWithBackoff, withTimeout, type Sleep } from '../../utils/retry';
import { getLogger } from '../../config/logger';
const logger = getLogger();

export type OrderManagerSettings = Pick<
  ExecutionSettings,
  'maxSubmitAttempts' | 'submitBackoffMs' | 'maxBackoffMs' | 'requestTimeoutMs'
> & Partial<Pick<ExecutionSettings, 'historyLimit'>>;

class SubmissionRefusedError extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'SubmissionRefusedError';
  }
}

export class OrderManagerService {
  private readonly orders = new Map<string, Order>();
  private readonly closedOrders = new Map<string, Order>();
  private readonly orderLocks = new Map<string, AsyncLock>();

  constructor(
    private readonly brokerAdapter: BrokerAdapter,
    private readonly ledger: PositionLedgerService,
    private readonly lifecycle: OrderLifecycleService,
    private readonly eventLogger: TradeEventLoggerService,
    private readonly settings: OrderManagerSettings,
    private readonly sleep?: Sleep,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Record a new PENDING order for an intent
   */
  createOrder(intent: OrderIntent, type: OrderType, limitPrice?: number): Order {
    const createdAt = this.now();
    const order: Order = {
      id: randomUUID(),
      symbol: intent.symbol,
      side: intent.side,
      quantity: intent.quantity,
      requestedQuantity: intent.quantity,
      type,
      limitPrice: type === 'LIMIT' ? limitPrice : undefined,
      referencePrice: intent.price,
      purpose: intent.purpose,
      state: this.lifecycle.getInitialState(),
      filledQuantity: 0,
      averageFillPrice: 0,
      submissionAttempts: 0,
      exitReason: intent.exitReason,
      createdAt,
      updatedAt: createdAt
    };

    this.orders.set(order.id, order);
    this.orderLocks.set(order.id, new AsyncLock());

    this.eventLogger.emit(order.symbol, this.lifecycle.getEventKindForState(order.state), {
      orderId: order.id,
      side: order.side,
      quantity: order.quantity,
      type: order.type,
      limitPrice: order.limitPrice,
      referencePrice: order.referencePrice,
      purpose: order.purpose,
      exitReason: order.exitReason
    });

    return { ...order };
  }

  /**
   * PENDING → APPROVED with the risk-approved quantity
   */
  approve(orderId: string, quantity: number): Order {
    const order = this.requireOrder(orderId);
    this.transition(order, 'APPROVED', { quantity, requestedQuantity: order.requestedQuantity });
    order.quantity = quantity;
    return { ...order };
  }

  /**
   * PENDING | APPROVED → REJECTED without contacting the broker
   */
  async reject(orderId: string, reason: OrderRejectionReason, detail: string): Promise<Order> {
    return this.withOrderLock(orderId, async order => {
      order.rejectionReason = reason;
      this.transition(order, 'REJECTED', { reason, detail });
      await this.settle(order);
      return { ...order };
    });
  }

  /**
   * APPROVED → SUBMITTED. Failures keep the order APPROVED and are retried
   * with backoff; an exhausted budget rejects it with SUBMISSION_FAILED.
   */
  async submit(orderId: string): Promise<Order> {
    return this.withOrderLock(orderId, async order => {
      if (order.state !== 'APPROVED') {
        throw new Error(`Order ${order.id} cannot be submitted from ${order.state}`);
      }

      const request: OrderRequest = {
        clientOrderId: order.id,
        symbol: order.symbol,
        side: order.side,
        quantity: order.quantity,
        type: order.type,
        limitPrice: order.limitPrice
      };

      try {
        const brokerOrderId = await retryWithBackoff(
          async attempt => {
            order.submissionAttempts = attempt;
            const result = await withTimeout(
              this.brokerAdapter.submitOrder(request),
              this.settings.requestTimeoutMs,
              'broker.submitOrder'
            );
            if (!result.ok) {
              throw new SubmissionRefusedError(result.reason);
            }
            return result.brokerOrderId;
          },
          {
            maxAttempts: this.settings.maxSubmitAttempts,
            baseDelayMs: this.settings.submitBackoffMs,
            maxDelayMs: this.settings.maxBackoffMs,
            sleep: this.sleep,
            onRetry: (error, attempt, delayMs) => {
              this.eventLogger.emit(order.symbol, 'ORDER_SUBMISSION_RETRY', {
                orderId: order.id,
                attempt,
                delayMs,
                reason: errorMessage(error)
              });
            }
          }
        );

        order.brokerOrderId = brokerOrderId;
        this.transition(order, 'SUBMITTED', { brokerOrderId, attempts: order.submissionAttempts });
      } catch (error) {
        if (!(error instanceof RetryExhaustedError)) {
          throw error;
        }

        const failure = new SubmissionFailedError(order.id, error.attempts, errorMessage(error.lastError));
        logger.error({ orderId: order.id, symbol: order.symbol, attempts: error.attempts }, failure.message);

        order.rejectionReason = 'SUBMISSION_FAILED';
        this.transition(order, 'REJECTED', {
          reason: 'SUBMISSION_FAILED',
          attempts: error.attempts,
          detail: failure.reason
        });
        await this.settle(order);
      }

      return { ...order };
    });
  }

  /**
   * Poll the broker once and apply any new fills or terminal status
   */
  async poll(orderId: string): Promise<Order> {
    return this.withOrderLock(orderId, async order => {
      if (!this.lifecycle.isWorkingState(order.state)) {
        return { ...order };
      }

      const status = await this.fetchStatus(order);
      await this.applyStatus(order, status);
      return { ...order };
    });
  }

  /**
   * Cancel an order. Working orders are cancelled at the broker and polled
   * one last time so fills reported before the cancel are applied first.
   */
  async cancel(orderId: string, reason: CancelReason = 'MANUAL'): Promise<Order> {
    return this.withOrderLock(orderId, async order => {
      if (this.lifecycle.isTerminalState(order.state)) {
        logger.info({ orderId, state: order.state }, 'Cancel ignored for terminal order');
        return { ...order };
      }

      if (!this.lifecycle.isWorkingState(order.state)) {
        order.cancelReason = reason;
        this.transition(order, 'CANCELLED', { reason });
        await this.settle(order);
        return { ...order };
      }

      const brokerOrderId = this.requireBrokerOrderId(order);
      const ack = await withTimeout(
        this.brokerAdapter.cancelOrder(brokerOrderId),
        this.settings.requestTimeoutMs,
        'broker.cancelOrder'
      );
      if (ack === 'NOT_FOUND') {
        logger.warn({ orderId, brokerOrderId }, 'Broker did not find order to cancel');
      }

      const status = await this.fetchStatus(order);
      await this.applyStatus(order, status, reason);

      if (!this.lifecycle.isTerminalState(order.state)) {
        order.cancelReason = reason;
        this.transition(order, 'CANCELLED', { reason, brokerAck: ack, filledQuantity: order.filledQuantity });
        await this.settle(order);
      }

      return { ...order };
    });
  }

  getOrder(orderId: string): Order | null {
    const order = this.orders.get(orderId) ?? this.closedOrders.get(orderId);
    return order ? { ...order } : null;
  }

  /**
   * Recently settled orders, oldest first, then open orders
   */
  getOrders(): Order[] {
    return [...this.closedOrders.values(), ...this.orders.values()].map(order => ({ ...order }));
  }

  /**
   * Orders not yet in a terminal state
   */
  getOpenOrders(symbol?: string): Order[] {
    return [...this.orders.values()]
      .filter(order => symbol === undefined || order.symbol === symbol)
      .map(order => ({ ...order }));
  }

  getWorkingOrders(symbol?: string): Order[] {
    return this.getOpenOrders(symbol).filter(order => this.lifecycle.isWorkingState(order.state));
  }

  openOrderCount(): number {
    return this.getOpenOrders().length;
  }

  /**
   * Signed unfilled quantity per symbol (BUY positive)
   */
  pendingQuantity(): Record<string, number> {
    const pending: Record<string, number> = {};
    for (const order of this.getOpenOrders()) {
      const remaining = order.quantity - order.filledQuantity;
      const signed = order.side === 'BUY' ? remaining : -remaining;
      pending[order.symbol] = roundQuantity((pending[order.symbol] ?? 0) + signed);
    }
    return pending;
  }

  /**
   * Notional still committed by open opening orders
   */
  reservedBuyingPower(): number {
    return this.getOpenOrders()
      .filter(order => order.purpose === 'OPEN')
      .reduce((total, order) => {
        const price = order.limitPrice ?? order.referencePrice;
        return total + (order.quantity - order.filledQuantity) * price;
      }, 0);
  }

  private async applyStatus(
    order: Order,
    status: BrokerOrderStatus,
    cancelReason: CancelReason = 'BROKER_CANCELLED'
  ): Promise<void> {
    if (status.filledQuantity < order.filledQuantity - QUANTITY_EPSILON) {
      throw new LedgerInconsistencyError(
        `Broker reports ${status.filledQuantity} filled for order ${order.id}, below the ${order.filledQuantity} already applied`,
        order.id
      );
    }
    if (status.filledQuantity > order.quantity + QUANTITY_EPSILON) {
      throw new LedgerInconsistencyError(
        `Broker reports ${status.filledQuantity} filled for order ${order.id}, above requested ${order.quantity}`,
        order.id
      );
    }

    const delta = roundQuantity(status.filledQuantity - order.filledQuantity);
    if (delta > QUANTITY_EPSILON) {
      const notional = status.averageFillPrice * status.filledQuantity - order.averageFillPrice * order.filledQuantity;
      const derived = notional / delta;
      const price = Number.isFinite(derived) && derived > 0 ? derived : status.averageFillPrice;

      await this.ledger.applyFill({ ...order }, {
        fillId: `${order.id}:${roundQuantity(status.filledQuantity)}`,
        quantity: delta,
        price,
        timestamp: this.now()
      });

      order.filledQuantity = roundQuantity(status.filledQuantity);
      order.averageFillPrice = status.averageFillPrice;

      const complete = Math.abs(order.quantity - order.filledQuantity) <= QUANTITY_EPSILON;
      if (complete) {
        order.filledQuantity = order.quantity;
      }
      this.transition(order, complete ? 'FILLED' : 'PARTIALLY_FILLED', {
        fillQuantity: delta,
        fillPrice: price,
        filledQuantity: order.filledQuantity,
        averageFillPrice: order.averageFillPrice
      });

      if (complete) {
        await this.settle(order);
        return;
      }
    }

    switch (status.state) {
      case 'FILLED':
        if (order.state !== 'FILLED') {
          throw new LedgerInconsistencyError(
            `Broker reports order ${order.id} filled at ${status.filledQuantity} of ${order.quantity}`,
            order.id
          );
        }
        return;

      case 'CANCELLED':
        order.cancelReason = cancelReason;
        this.transition(order, 'CANCELLED', { reason: cancelReason, filledQuantity: order.filledQuantity });
        await this.settle(order);
        return;

      case 'REJECTED':
        if (order.state === 'SUBMITTED') {
          order.rejectionReason = 'BROKER_REJECTED';
          this.transition(order, 'REJECTED', { reason: 'BROKER_REJECTED' });
        } else {
          // Partially filled orders cannot be rejected; the remainder is cancelled
          order.cancelReason = 'BROKER_CANCELLED';
          this.transition(order, 'CANCELLED', { reason: 'BROKER_REJECTED', filledQuantity: order.filledQuantity });
        }
        await this.settle(order);
        return;

      case 'OPEN':
      case 'PARTIALLY_FILLED':
        return;
    }
  }

  private async fetchStatus(order: Order): Promise<BrokerOrderStatus> {
    return withTimeout(
      this.brokerAdapter.getOrderStatus(this.requireBrokerOrderId(order)),
      this.settings.requestTimeoutMs,
      'broker.getOrderStatus'
    );
  }

  private transition(order: Order, newState: OrderState, payload: Record<string, unknown> = {}): void {
    const previousState = order.state;
    const result = this.lifecycle.transitionTo(order.id, previousState, newState);
    if (!result.success || !result.eventKind) {
      throw new Error(result.error ?? `Order ${order.id} cannot move to ${newState}`);
    }

    order.state = newState;
    order.updatedAt = this.now();

    this.eventLogger.emit(order.symbol, result.eventKind, {
      orderId: order.id,
      fromState: previousState,
      toState: newState,
      ...payload
    });
  }

  /**
   * Close a terminal order in the ledger and move it to history. The state
   * machine allows one terminal transition, so this runs once per order.
   */
  private async settle(order: Order): Promise<void> {
    this.orders.delete(order.id);
    this.orderLocks.delete(order.id);
    this.closedOrders.set(order.id, order);

    const limit = this.settings.historyLimit ?? 1_000;
    for (const oldest of this.closedOrders.keys()) {
      if (this.closedOrders.size <= limit) {
        break;
      }
      this.closedOrders.delete(oldest);
    }

    await this.ledger.closeOrder({ ...order });
  }

  private requireOrder(orderId: string): Order {
    const order = this.orders.get(orderId) ?? this.closedOrders.get(orderId);
    if (!order) {
      throw new Error(`Order ${orderId} not found`);
    }
    return order;
  }

  private requireBrokerOrderId(order: Order): string {
    if (order.brokerOrderId === undefined) {
      throw new Error(`Order ${order.id} has no broker order id`);
    }
    return order.brokerOrderId;
  }

  /**
   * Serialize broker operations on one order. Settled orders no longer hold
   * a lock; calls on them see a terminal state and do nothing.
   */
  private async withOrderLock<T>(orderId: string, operation: (order: Order) => Promise<T>): Promise<T> {
    const order = this.requireOrder(orderId);
    const lock = this.orderLocks.get(orderId) ?? new AsyncLock();
    return lock.runExclusive(() => operation(order));
  }
}
