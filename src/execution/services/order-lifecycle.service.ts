/**
 * Order Lifecycle Service - Order state machine and transition-to-event mapping
 */

import type { EngineEventKind, OrderState } from '../types/execution.types';
import { getLogger } from '../../config/logger';
const logger = getLogger();

export interface StateTransitionResult {
  success: boolean;
  newState?: OrderState;
  error?: string;
  eventKind?: EngineEventKind;
}

export const ORDER_STATES: readonly OrderState[] = [
  'PENDING',
  'APPROVED',
  'SUBMITTED',
  'PARTIALLY_FILLED',
  'FILLED',
  'REJECTED',
  'CANCELLED'
];

export class OrderLifecycleService {
  private readonly VALID_TRANSITIONS: Record<OrderState, readonly OrderState[]> = {
    'PENDING': ['APPROVED', 'REJECTED', 'CANCELLED'],
    'APPROVED': ['SUBMITTED', 'REJECTED', 'CANCELLED'],
    'SUBMITTED': ['PARTIALLY_FILLED', 'FILLED', 'REJECTED', 'CANCELLED'],
    // Repeated partial fills stay in PARTIALLY_FILLED
    'PARTIALLY_FILLED': ['PARTIALLY_FILLED', 'FILLED', 'CANCELLED'],
    'FILLED': [],
    'REJECTED': [],
    'CANCELLED': []
  };

  private readonly STATE_TO_EVENT: Record<OrderState, EngineEventKind> = {
    'PENDING': 'ORDER_CREATED',
    'APPROVED': 'ORDER_APPROVED',
    'SUBMITTED': 'ORDER_SUBMITTED',
    'PARTIALLY_FILLED': 'ORDER_PARTIALLY_FILLED',
    'FILLED': 'ORDER_FILLED',
    'REJECTED': 'ORDER_REJECTED',
    'CANCELLED': 'ORDER_CANCELLED'
  };

  isValidTransition(fromState: OrderState, toState: OrderState): boolean {
    return this.VALID_TRANSITIONS[fromState].includes(toState);
  }

  /**
   * Check a transition and resolve the event it emits
   */
  transitionTo(orderId: string, currentState: OrderState, newState: OrderState): StateTransitionResult {
    if (!this.isValidTransition(currentState, newState)) {
      const error = `Invalid state transition from ${currentState} to ${newState}`;
      logger.error({ orderId, fromState: currentState, toState: newState }, 'Invalid order state transition attempted');
      return { success: false, error };
    }

    const eventKind = this.STATE_TO_EVENT[newState];
    logger.debug({ orderId, fromState: currentState, toState: newState, eventKind }, 'Order state transition');

    return { success: true, newState, eventKind };
  }

  getValidNextStates(currentState: OrderState): readonly OrderState[] {
    return this.VALID_TRANSITIONS[currentState];
  }

  /**
   * No further transitions possible
   */
  isTerminalState(state: OrderState): boolean {
    return this.getValidNextStates(state).length === 0;
  }

  /**
   * Submitted to the broker and not yet terminal
   */
  isWorkingState(state: OrderState): boolean {
    return state === 'SUBMITTED' || state === 'PARTIALLY_FILLED';
  }

  canBeCancelled(state: OrderState): boolean {
    return this.isValidTransition(state, 'CANCELLED');
  }

  getInitialState(): OrderState {
    return 'PENDING';
  }

  getEventKindForState(state: OrderState): EngineEventKind {
    return this.STATE_TO_EVENT[state];
  }

  validateTransitionSequence(states: readonly OrderState[]): boolean {
    for (let i = 0; i < states.length - 1; i++) {
      const current = states[i];
      const next = states[i + 1];
      if (current === undefined || next === undefined || !this.isValidTransition(current, next)) {
        logger.warn({ sequence: states, position: i }, 'Invalid transition in sequence');
        return false;
      }
    }
    return true;
  }

  isValidState(state: string): state is OrderState {
    return ORDER_STATES.some(known => known === state);
  }
}
