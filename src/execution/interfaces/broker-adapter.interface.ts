/**
 * Broker Adapter Interface - All brokerage implementations must conform to this interface
 */

import type {
  AccountInfo,
  BrokerOrderStatus,
  CancelOrderResult,
  OrderRequest,
  SubmitOrderResult
} from '../types/execution.types';

export interface BrokerAdapter {
  /**
   * Authenticate and open a session with the brokerage
   */
  connect(): Promise<void>;

  /**
   * Close the brokerage session
   */
  disconnect(): Promise<void>;

  isAdapterConnected(): boolean;

  /**
   * Validate the account and return cash and buying power
   */
  validateAccount(): Promise<AccountInfo>;

  /**
   * Submit an order. A refused submission resolves with `ok: false`;
   * transport failures reject.
   */
  submitOrder(order: OrderRequest): Promise<SubmitOrderResult>;

  /**
   * Current fill status of a submitted order
   */
  getOrderStatus(brokerOrderId: string): Promise<BrokerOrderStatus>;

  /**
   * Request cancellation of a working order
   */
  cancelOrder(brokerOrderId: string): Promise<CancelOrderResult>;
}
