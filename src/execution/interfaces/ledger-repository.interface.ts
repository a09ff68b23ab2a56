/**
 * Ledger Repository Interface - Persistence collaborator for the position ledger
 */

import type { LedgerCheckpoint, LedgerRecord } from '../types/execution.types';

export interface LedgerRepository {
  /**
   * Latest checkpoint for the ledger, or null on first start
   */
  loadCheckpoint(ledgerId: string): Promise<LedgerCheckpoint | null>;

  /**
   * Replace the stored checkpoint
   */
  saveCheckpoint(checkpoint: LedgerCheckpoint): Promise<void>;

  /**
   * Append one immutable audit record
   */
  appendRecord(ledgerId: string, record: LedgerRecord): Promise<void>;
}
