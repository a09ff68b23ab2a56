/**
 * Error taxonomy for the trade bot.
 *
 * `fatal` errors stop the control loop and must reach the operator.
 * Everything else is scoped to a single symbol cycle or a single order.
 */

export type TradeBotErrorCode =
  | 'CONFIG_ERROR'
  | 'DATA_UNAVAILABLE'
  | 'SUBMISSION_FAILED'
  | 'LEDGER_INCONSISTENCY'
  | 'LEDGER_PERSISTENCE'
  | 'NETWORK_TIMEOUT';

export abstract class TradeBotError extends Error {
  abstract readonly code: TradeBotErrorCode;
  abstract readonly fatal: boolean;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

export class ConfigError extends TradeBotError {
  readonly code = 'CONFIG_ERROR';
  readonly fatal = true;

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid trade bot configuration: ${issues.join('; ')}`);
  }
}

export class DataUnavailableError extends TradeBotError {
  readonly code = 'DATA_UNAVAILABLE';
  readonly fatal = false;

  constructor(
    public readonly symbol: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(
      `Market data unavailable for ${symbol} after ${attempts} attempt${attempts === 1 ? '' : 's'}`,
      cause
    );
  }
}

export class SubmissionFailedError extends TradeBotError {
  readonly code = 'SUBMISSION_FAILED';
  readonly fatal = false;

  constructor(
    public readonly orderId: string,
    public readonly attempts: number,
    public readonly reason: string
  ) {
    super(`Order ${orderId} submission failed after ${attempts} attempt(s): ${reason}`);
  }
}

export class LedgerInconsistencyError extends TradeBotError {
  readonly code = 'LEDGER_INCONSISTENCY';
  readonly fatal = true;

  constructor(
    message: string,
    public readonly orderId?: string
  ) {
    super(message);
  }
}

export class LedgerPersistenceError extends TradeBotError {
  readonly code = 'LEDGER_PERSISTENCE';
  readonly fatal = true;

  constructor(
    public readonly operation: string,
    cause: unknown
  ) {
    super(`Ledger ${operation} failed: ${errorMessage(cause)}`, cause);
  }
}

export class NetworkTimeoutError extends TradeBotError {
  readonly code = 'NETWORK_TIMEOUT';
  readonly fatal = false;

  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

export function isFatalError(error: unknown): boolean {
  return error instanceof TradeBotError && error.fatal;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
