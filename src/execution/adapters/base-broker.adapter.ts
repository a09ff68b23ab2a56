/**
 * Base Broker Adapter - Abstract base class for brokerage implementations
 */

import type { BrokerAdapter } from '../interfaces/broker-adapter.interface';
import type {
  AccountInfo,
  BrokerOrderStatus,
  CancelOrderResult,
  OrderRequest,
  SubmitOrderResult
} from '../types/execution.types';
import { getLogger } from '../../config/logger';
const logger = getLogger();

export abstract class BaseBrokerAdapter implements BrokerAdapter {
  protected isConnected: boolean = false;

  /**
   * Authenticate with the brokerage - must be implemented by subclasses
   */
  abstract connect(): Promise<void>;

  abstract disconnect(): Promise<void>;

  /**
   * Validate account and get account information - must be implemented by subclasses
   */
  abstract validateAccount(): Promise<AccountInfo>;

  /**
   * Transmit a validated order - must be implemented by subclasses
   */
  protected abstract placeOrder(order: OrderRequest): Promise<SubmitOrderResult>;

  abstract getOrderStatus(brokerOrderId: string): Promise<BrokerOrderStatus>;

  abstract cancelOrder(brokerOrderId: string): Promise<CancelOrderResult>;

  /**
   * Validate locally, then hand the order to the subclass. Invalid orders
   * resolve as refused rather than reaching the brokerage.
   */
  async submitOrder(order: OrderRequest): Promise<SubmitOrderResult> {
    this.ensureConnected();

    const issue = this.validateOrderRequest(order);
    if (issue) {
      this.logError('submitOrder', order, issue);
      return { ok: false, reason: issue };
    }

    const result = await this.placeOrder(order);
    this.logOperation('submitOrder', order, result);
    return result;
  }

  isAdapterConnected(): boolean {
    return this.isConnected;
  }

  /**
   * First problem with an order request, or null when it is well formed
   */
  protected validateOrderRequest(order: OrderRequest): string | null {
    if (!order.symbol || order.symbol.trim().length === 0) {
      return 'Order symbol is required';
    }

    if (order.side !== 'BUY' && order.side !== 'SELL') {
      return 'Order side must be BUY or SELL';
    }

    if (!Number.isFinite(order.quantity) || order.quantity <= 0) {
      return 'Order quantity must be positive';
    }

    if (order.type !== 'MARKET' && order.type !== 'LIMIT') {
      return 'Order type must be MARKET or LIMIT';
    }

    if (order.type === 'LIMIT' && (order.limitPrice === undefined || order.limitPrice <= 0)) {
      return 'A positive limit price is required for LIMIT orders';
    }

    return null;
  }

  protected ensureConnected(): void {
    if (!this.isConnected) {
      throw new Error('Broker adapter is not connected');
    }
  }

  protected logOperation(operation: string, params: unknown, result?: unknown): void {
    logger.info(
      { operation, params, result, adapterType: this.getAdapterType() },
      `Broker operation: ${operation}`
    );
  }

  protected logError(operation: string, params: unknown, error: unknown): void {
    logger.error(
      {
        operation,
        params,
        error: error instanceof Error ? error.message : error,
        adapterType: this.getAdapterType()
      },
      `Broker operation failed: ${operation}`
    );
  }

  getAdapterType(): string {
    return this.constructor.name;
  }
}
