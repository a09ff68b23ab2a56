/**
 * Order Lifecycle Tests
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { ORDER_STATES, OrderLifecycleService } from '../services/order-lifecycle.service';
import type { OrderState } from '../types/execution.types';

describe('OrderLifecycleService', () => {
  const lifecycle = new OrderLifecycleService();

  describe('🔄 Transitions', () => {
    it('should follow the happy path to FILLED', () => {
      expect(
        lifecycle.validateTransitionSequence(['PENDING', 'APPROVED', 'SUBMITTED', 'PARTIALLY_FILLED', 'PARTIALLY_FILLED', 'FILLED'])
      ).toBe(true);
    });

    it('should resolve the event kind for a valid transition', () => {
      expect(lifecycle.transitionTo('order-1', 'APPROVED', 'SUBMITTED')).toEqual({
        success: true,
        newState: 'SUBMITTED',
        eventKind: 'ORDER_SUBMITTED'
      });
    });

    it('should refuse skipping approval', () => {
      expect(lifecycle.transitionTo('order-1', 'PENDING', 'SUBMITTED')).toEqual({
        success: false,
        error: 'Invalid state transition from PENDING to SUBMITTED'
      });
    });

    it('should not reject a partially filled order', () => {
      expect(lifecycle.isValidTransition('PARTIALLY_FILLED', 'REJECTED')).toBe(false);
      expect(lifecycle.isValidTransition('PARTIALLY_FILLED', 'CANCELLED')).toBe(true);
    });

    it('should reject a sequence that leaves a terminal state', () => {
      expect(lifecycle.validateTransitionSequence(['PENDING', 'REJECTED', 'APPROVED'])).toBe(false);
    });
  });

  describe('📋 State queries', () => {
    it('should classify terminal and working states', () => {
      expect(ORDER_STATES.filter(state => lifecycle.isTerminalState(state))).toEqual(['FILLED', 'REJECTED', 'CANCELLED']);
      expect(ORDER_STATES.filter(state => lifecycle.isWorkingState(state))).toEqual(['SUBMITTED', 'PARTIALLY_FILLED']);
    });

    it('should start orders as PENDING', () => {
      expect(lifecycle.getInitialState()).toBe('PENDING');
      expect(lifecycle.getEventKindForState('PENDING')).toBe('ORDER_CREATED');
    });

    it('should recognise known state names only', () => {
      expect(lifecycle.isValidState('SUBMITTED')).toBe(true);
      expect(lifecycle.isValidState('EXPIRED')).toBe(false);
    });

    it('should allow cancelling every open state', () => {
      const cancellable = ORDER_STATES.filter(state => lifecycle.canBeCancelled(state));
      expect(cancellable).toEqual(['PENDING', 'APPROVED', 'SUBMITTED', 'PARTIALLY_FILLED']);
    });
  });

  describe('🎲 Property: terminal states are absorbing', () => {
    it('should never leave FILLED, REJECTED or CANCELLED', () => {
      const terminal = fc.constantFrom<OrderState>('FILLED', 'REJECTED', 'CANCELLED');
      const any = fc.constantFrom<OrderState>(...ORDER_STATES);

      fc.assert(
        fc.property(terminal, any, (from, to) => !lifecycle.transitionTo('order-1', from, to).success),
        { numRuns: 100 }
      );
    });
  });
});
