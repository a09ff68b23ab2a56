/**
 * Order Manager Tests
 */

import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { OrderManagerService } from '../services/order-manager.service';
import { OrderLifecycleService } from '../services/order-lifecycle.service';
import { PositionLedgerService } from '../services/position-ledger.service';
import { TradeEventLoggerService } from '../services/trade-event-logger.service';
import { InMemoryLedgerRepository } from '../../repositories/ledger.repository';
import { LedgerInconsistencyError } from '../errors';
import type { Order, OrderIntent } from '../types/execution.types';
import { FakeBrokerAdapter, TEST_TIME } from './setup';

function openIntent(quantity = 10, price = 100): OrderIntent {
  return { symbol: 'AAPL', side: 'BUY', quantity, price, purpose: 'OPEN' };
}

describe('OrderManagerService', () => {
  let broker: FakeBrokerAdapter;
  let events: TradeEventLoggerService;
  let ledger: PositionLedgerService;
  let manager: OrderManagerService;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(async () => {
    broker = new FakeBrokerAdapter();
    await broker.connect();
    events = new TradeEventLoggerService({ now: () => TEST_TIME });
    ledger = new PositionLedgerService(new InMemoryLedgerRepository(), events, { now: () => TEST_TIME });
    await ledger.initialize(100_000);
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => undefined);

    manager = new OrderManagerService(
      broker,
      ledger,
      new OrderLifecycleService(),
      events,
      { maxSubmitAttempts: 3, submitBackoffMs: 100, maxBackoffMs: 1_000, requestTimeoutMs: 1_000 },
      sleep,
      () => TEST_TIME
    );
  });

  function approvedOrder(quantity = 10): Order {
    const order = manager.createOrder(openIntent(quantity), 'MARKET');
    return manager.approve(order.id, quantity);
  }

  describe('📝 Creation and approval', () => {
    it('should create a PENDING order and emit ORDER_CREATED', () => {
      const order = manager.createOrder(openIntent(), 'MARKET');

      expect(order).toMatchObject({ state: 'PENDING', quantity: 10, requestedQuantity: 10, referencePrice: 100 });
      expect(events.hasEvent('ORDER_CREATED', order.id)).toBe(true);
    });

    it('should only keep a limit price on LIMIT orders', () => {
      expect(manager.createOrder(openIntent(), 'MARKET', 101).limitPrice).toBeUndefined();
      expect(manager.createOrder(openIntent(), 'LIMIT', 101).limitPrice).toBe(101);
    });

    it('should approve with the risk-adjusted quantity', () => {
      const order = manager.createOrder(openIntent(10), 'MARKET');
      expect(manager.approve(order.id, 6)).toMatchObject({ state: 'APPROVED', quantity: 6, requestedQuantity: 10 });
    });

    it('should refuse approving twice without changing the quantity', () => {
      const order = approvedOrder(10);
      expect(() => manager.approve(order.id, 3)).toThrow('Invalid state transition from APPROVED to APPROVED');
      expect(manager.getOrder(order.id)?.quantity).toBe(10);
    });
  });

  describe('📤 Submission', () => {
    beforeEach(() => {
      broker.fillPolicy = 'NONE';
    });

    it('should submit and record the broker order id', async () => {
      const submitted = await manager.submit(approvedOrder().id);

      expect(submitted).toMatchObject({ state: 'SUBMITTED', brokerOrderId: 'B-1', submissionAttempts: 1 });
      expect(broker.submitted).toHaveLength(1);
    });

    it('should retry transport failures with exponential backoff', async () => {
      broker.failNextSubmissions = 2;
      const submitted = await manager.submit(approvedOrder().id);

      expect(submitted).toMatchObject({ state: 'SUBMITTED', submissionAttempts: 3 });
      expect(sleep.mock.calls).toEqual([[100], [200]]);

      const retries = events.getEvents({ kind: 'ORDER_SUBMISSION_RETRY', orderId: submitted.id });
      expect(retries.map(event => event.payload['attempt'])).toEqual([1, 2]);
      expect(retries[0]?.payload['reason']).toBe('connection reset');
    });

    it('should reject with SUBMISSION_FAILED once attempts are exhausted', async () => {
      broker.failNextSubmissions = 5;
      const submitted = await manager.submit(approvedOrder().id);

      expect(submitted).toMatchObject({ state: 'REJECTED', rejectionReason: 'SUBMISSION_FAILED', submissionAttempts: 3 });
      expect(broker.submitted).toHaveLength(0);
      expect(events.getEvents({ kind: 'ORDER_SUBMISSION_RETRY', orderId: submitted.id })).toHaveLength(2);

      const closed = events.getEvents({ kind: 'LEDGER_ORDER_CLOSED', orderId: submitted.id });
      expect(closed).toHaveLength(1);
      expect(closed[0]?.payload['state']).toBe('REJECTED');
    });

    it('should treat broker refusals as failed attempts', async () => {
      broker.refuseReason = 'account restricted';
      const submitted = await manager.submit(approvedOrder().id);

      expect(submitted.state).toBe('REJECTED');
      const rejected = events.getEvents({ kind: 'ORDER_REJECTED', orderId: submitted.id });
      expect(rejected[0]?.payload).toMatchObject({ reason: 'SUBMISSION_FAILED', attempts: 3, detail: 'account restricted' });
    });

    it('should refuse to submit an order that is not approved', async () => {
      const order = manager.createOrder(openIntent(), 'MARKET');
      await expect(manager.submit(order.id)).rejects.toThrow(`Order ${order.id} cannot be submitted from PENDING`);
    });
  });

  describe('📥 Fills', () => {
    it('should apply a full fill and settle the order once', async () => {
      const submitted = await manager.submit(approvedOrder().id);
      const filled = await manager.poll(submitted.id);

      expect(filled).toMatchObject({ state: 'FILLED', filledQuantity: 10, averageFillPrice: 100 });
      expect((await ledger.getPosition('AAPL'))?.quantity).toBe(10);

      await manager.poll(submitted.id);
      expect(events.getEvents({ kind: 'LEDGER_ORDER_CLOSED', orderId: submitted.id })).toHaveLength(1);
    });

    it('should apply partial fills as deltas at their own price', async () => {
      broker.fillPolicy = 'NONE';
      const submitted = await manager.submit(approvedOrder().id);

      broker.setStatus('B-1', 'PARTIALLY_FILLED', 4, 100);
      expect(await manager.poll(submitted.id)).toMatchObject({ state: 'PARTIALLY_FILLED', filledQuantity: 4 });

      // Same status again applies nothing new
      await manager.poll(submitted.id);

      broker.setStatus('B-1', 'FILLED', 10, 103);
      expect(await manager.poll(submitted.id)).toMatchObject({ state: 'FILLED', filledQuantity: 10, averageFillPrice: 103 });

      const fills = ledger.getRecords().filter(record => record.type === 'FILL_APPLIED');
      expect(fills.map(record => [record.fillId, record.quantity, record.price])).toEqual([
        [`${submitted.id}:4`, 4, 100],
        [`${submitted.id}:10`, 6, 105]
      ]);
      expect(await ledger.getPosition('AAPL')).toMatchObject({ quantity: 10, averageEntryPrice: 103 });
    });

    it('should fail loudly when the broker reports more than was ordered', async () => {
      broker.fillPolicy = 'NONE';
      const submitted = await manager.submit(approvedOrder().id);
      broker.setStatus('B-1', 'FILLED', 12, 100);

      await expect(manager.poll(submitted.id)).rejects.toThrow(
        `Broker reports 12 filled for order ${submitted.id}, above requested 10`
      );
    });

    it('should fail loudly when the reported fill goes backwards', async () => {
      broker.fillPolicy = 'NONE';
      const submitted = await manager.submit(approvedOrder().id);
      broker.setStatus('B-1', 'PARTIALLY_FILLED', 4, 100);
      await manager.poll(submitted.id);

      broker.setStatus('B-1', 'PARTIALLY_FILLED', 2, 100);
      await expect(manager.poll(submitted.id)).rejects.toBeInstanceOf(LedgerInconsistencyError);
    });

    it('should mark a broker rejection of a submitted order', async () => {
      broker.fillPolicy = 'NONE';
      const submitted = await manager.submit(approvedOrder().id);
      broker.setStatus('B-1', 'REJECTED', 0, 0);

      expect(await manager.poll(submitted.id)).toMatchObject({ state: 'REJECTED', rejectionReason: 'BROKER_REJECTED' });
    });
  });

  describe('🚫 Cancellation', () => {
    it('should cancel a pending order without contacting the broker', async () => {
      const order = manager.createOrder(openIntent(), 'MARKET');
      expect(await manager.cancel(order.id)).toMatchObject({ state: 'CANCELLED', cancelReason: 'MANUAL' });
      expect(broker.cancelled).toEqual([]);
    });

    it('should apply fills reported before the cancel took effect', async () => {
      broker.fillPolicy = 'NONE';
      const submitted = await manager.submit(approvedOrder().id);
      broker.setStatus('B-1', 'PARTIALLY_FILLED', 4, 100);

      const cancelled = await manager.cancel(submitted.id, 'STOP_LOSS');

      expect(cancelled).toMatchObject({ state: 'CANCELLED', cancelReason: 'STOP_LOSS', filledQuantity: 4 });
      expect(broker.cancelled).toEqual(['B-1']);
      expect((await ledger.getPosition('AAPL'))?.quantity).toBe(4);
    });

    it('should ignore cancelling a terminal order', async () => {
      const submitted = await manager.submit(approvedOrder().id);
      await manager.poll(submitted.id);

      expect(await manager.cancel(submitted.id)).toMatchObject({ state: 'FILLED' });
      expect(broker.cancelled).toEqual([]);
    });

    it('should serialize a poll and a cancel on the same order', async () => {
      const submitted = await manager.submit(approvedOrder().id);
      const [polled, cancelled] = await Promise.all([manager.poll(submitted.id), manager.cancel(submitted.id)]);

      expect(polled.state).toBe('FILLED');
      expect(cancelled.state).toBe('FILLED');
      expect(broker.cancelled).toEqual([]);
      expect(events.getEvents({ kind: 'LEDGER_ORDER_CLOSED', orderId: submitted.id })).toHaveLength(1);
    });
  });

  describe('📊 Exposure queries', () => {
    it('should report pending quantity and reserved buying power of open orders', () => {
      const buy = manager.createOrder(openIntent(10, 100), 'LIMIT', 101);
      manager.approve(buy.id, 10);
      manager.createOrder({ symbol: 'AAPL', side: 'SELL', quantity: 5, price: 100, purpose: 'CLOSE' }, 'MARKET');

      expect(manager.openOrderCount()).toBe(2);
      expect(manager.pendingQuantity()).toEqual({ AAPL: 5 });
      expect(manager.reservedBuyingPower()).toBe(1_010);
    });
  });

  describe('🗂️ History', () => {
    it('should keep only the most recent settled orders', async () => {
      const bounded = new OrderManagerService(
        broker,
        ledger,
        new OrderLifecycleService(),
        events,
        { maxSubmitAttempts: 1, submitBackoffMs: 0, maxBackoffMs: 0, requestTimeoutMs: 1_000, historyLimit: 2 },
        sleep,
        () => TEST_TIME
      );

      const ids: string[] = [];
      for (let index = 0; index < 4; index++) {
        const order = bounded.createOrder(openIntent(), 'MARKET');
        await bounded.cancel(order.id);
        ids.push(order.id);
      }
      const working = bounded.createOrder(openIntent(), 'MARKET');

      expect(bounded.getOrders().map(order => order.id)).toEqual([ids[2], ids[3], working.id]);
      expect(bounded.getOrder(ids[0] ?? '')).toBeNull();
      expect(bounded.getOrder(ids[3] ?? '')?.state).toBe('CANCELLED');
      expect(bounded.getOpenOrders().map(order => order.id)).toEqual([working.id]);
    });
  });
});
