import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { LedgerRepository } from '../execution/interfaces/ledger-repository.interface';
import type { LedgerCheckpoint, LedgerRecord } from '../execution/types/execution.types';
import { getSupabaseClient } from '../config/supabase';
import { getLogger } from '../config/logger';

const positionSchema = z.object({
  symbol: z.string(),
  quantity: z.number(),
  averageEntryPrice: z.number(),
  lastPrice: z.number(),
  marketValue: z.number(),
  unrealizedPnl: z.number(),
  watermarkPrice: z.number(),
  openedAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

const orderFillSchema = z.object({
  filledQuantity: z.number().nonnegative(),
  fillIds: z.array(z.string()),
});

const performanceSchema = z.object({
  trades: z.number().int().nonnegative(),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  totalPnl: z.number(),
  grossProfit: z.number(),
  grossLoss: z.number(),
  peakPnl: z.number(),
  maxDrawdown: z.number(),
  maxDrawdownPercent: z.number(),
});

const checkpointSchema = z.object({
  ledgerId: z.string(),
  sequence: z.number().int().nonnegative(),
  cash: z.number(),
  realizedPnl: z.number(),
  sessionRealizedPnl: z.number(),
  sessionStartEquity: z.number(),
  sessionDate: z.string().nullable(),
  circuitBreakerTripped: z.boolean(),
  positions: z.array(positionSchema),
  openOrderFills: z.record(z.string(), orderFillSchema),
  closedOrderIds: z.array(z.string()),
  performance: performanceSchema,
  savedAt: z.coerce.date(),
});

// Dates arrive as ISO strings from JSON storage
const checkpointRowsSchema = z.array(z.object({ state: checkpointSchema }));

/**
 * Process-local ledger storage for tests and dry runs
 */
export class InMemoryLedgerRepository implements LedgerRepository {
  private readonly checkpoints = new Map<string, LedgerCheckpoint>();
  private readonly records = new Map<string, LedgerRecord[]>();

  async loadCheckpoint(ledgerId: string): Promise<LedgerCheckpoint | null> {
    const checkpoint = this.checkpoints.get(ledgerId);
    return checkpoint ? structuredClone(checkpoint) : null;
  }

  async saveCheckpoint(checkpoint: LedgerCheckpoint): Promise<void> {
    this.checkpoints.set(checkpoint.ledgerId, structuredClone(checkpoint));
  }

  async appendRecord(ledgerId: string, record: LedgerRecord): Promise<void> {
    const records = this.records.get(ledgerId) ?? [];
    records.push({ ...record });
    this.records.set(ledgerId, records);
  }

  getRecords(ledgerId: string): LedgerRecord[] {
    return [...(this.records.get(ledgerId) ?? [])];
  }
}

/**
 * Ledger storage in Supabase: an append-only `ledger_events` table and one
 * `ledger_checkpoints` row per ledger
 */
export class SupabaseLedgerRepository implements LedgerRepository {
  private readonly logger = getLogger();

  constructor(private readonly client: SupabaseClient = getSupabaseClient()) {}

  async loadCheckpoint(ledgerId: string): Promise<LedgerCheckpoint | null> {
    const { data, error } = await this.client
      .from('ledger_checkpoints')
      .select('state')
      .eq('ledger_id', ledgerId)
      .limit(1);

    if (error) {
      this.logger.error({ ledgerId, error: error.message, code: error.code }, 'Failed to load ledger checkpoint');
      throw new Error(`Failed to load ledger checkpoint: ${error.message}`);
    }

    const rows = checkpointRowsSchema.parse(data ?? []);
    const row = rows[0];
    return row ? row.state : null;
  }

  async saveCheckpoint(checkpoint: LedgerCheckpoint): Promise<void> {
    const { error } = await this.client
      .from('ledger_checkpoints')
      .upsert(
        {
          ledger_id: checkpoint.ledgerId,
          sequence: checkpoint.sequence,
          state: checkpoint,
          saved_at: checkpoint.savedAt.toISOString(),
        },
        { onConflict: 'ledger_id' }
      );

    if (error) {
      this.logger.error(
        { ledgerId: checkpoint.ledgerId, sequence: checkpoint.sequence, error: error.message },
        'Failed to save ledger checkpoint'
      );
      throw new Error(`Failed to save ledger checkpoint: ${error.message}`);
    }
  }

  async appendRecord(ledgerId: string, record: LedgerRecord): Promise<void> {
    const { error } = await this.client
      .from('ledger_events')
      .insert([{
        ledger_id: ledgerId,
        sequence: record.sequence,
        type: record.type,
        symbol: record.symbol ?? null,
        order_id: record.orderId ?? null,
        fill_id: record.fillId ?? null,
        side: record.side ?? null,
        quantity: record.quantity ?? null,
        price: record.price ?? null,
        realized_pnl: record.realizedPnl ?? null,
        closed_quantity: record.closedQuantity ?? null,
        position_quantity: record.positionQuantity ?? null,
        cash: record.cash,
        detail: record.detail ?? null,
        recorded_at: record.timestamp.toISOString(),
      }]);

    if (error) {
      this.logger.error(
        { ledgerId, sequence: record.sequence, type: record.type, error: error.message },
        'Failed to append ledger record'
      );
      throw new Error(`Failed to append ledger record: ${error.message}`);
    }
  }
}
