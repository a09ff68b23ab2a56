/**
 * Trade Event Logger Service - Creates immutable engine events and fans them out to subscribers
 */

import { randomUUID } from 'crypto';
import type { EngineEvent, EngineEventKind } from '../types/execution.types';
import { getLogger } from '../../config/logger';
const logger = getLogger();

export type EngineEventListener = (event: EngineEvent) => void;

export interface EngineEventFilter {
  symbol?: string;
  kind?: EngineEventKind;
  orderId?: string;
}

export interface TradeEventLoggerOptions {
  maxHistory?: number;
  /** Clock for event timestamps; share the engine's so events line up with ledger records */
  now?: () => Date;
}

export class TradeEventLoggerService {
  private readonly history: EngineEvent[] = [];
  private readonly listeners = new Set<EngineEventListener>();
  private readonly maxHistory: number;
  private readonly now: () => Date;

  constructor(options: TradeEventLoggerOptions = {}) {
    this.maxHistory = options.maxHistory ?? 10_000;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create, record and publish one event. `symbol` is empty for engine-wide events.
   */
  emit(symbol: string, kind: EngineEventKind, payload: Record<string, unknown> = {}): EngineEvent {
    const event: EngineEvent = Object.freeze({
      id: randomUUID(),
      timestamp: this.now(),
      symbol,
      kind,
      payload: Object.freeze({ ...payload })
    });

    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }

    logger.info({ eventId: event.id, symbol, kind, ...payload }, 'Engine event');

    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error(
          { eventId: event.id, kind, error: error instanceof Error ? error.message : 'Unknown error' },
          'Error in engine event listener'
        );
      }
    }

    return event;
  }

  /**
   * Attach a listener. Returns a function that detaches it.
   */
  subscribe(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => this.unsubscribe(listener);
  }

  unsubscribe(listener: EngineEventListener): void {
    this.listeners.delete(listener);
  }

  getEvents(filter: EngineEventFilter = {}): EngineEvent[] {
    return this.history.filter(event =>
      (filter.symbol === undefined || event.symbol === filter.symbol) &&
      (filter.kind === undefined || event.kind === filter.kind) &&
      (filter.orderId === undefined || event.payload['orderId'] === filter.orderId)
    );
  }

  hasEvent(kind: EngineEventKind, orderId?: string): boolean {
    return this.getEvents({ kind, orderId }).length > 0;
  }

  clear(): void {
    this.history.length = 0;
  }
}
