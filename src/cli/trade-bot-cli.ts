#!/usr/bin/env node

import { Command } from 'commander';
import { fileURLToPath } from 'url';
import {
  loadConfigOverridesFromEnv,
  loadTradeBotConfigFile,
} from '../config/trade-bot.config';
import { getEnvironmentConfig } from '../config/env';
import { ConfigError, errorMessage } from '../execution/errors';
import type { LedgerRepository } from '../execution/interfaces/ledger-repository.interface';
import { SupabaseLedgerRepository } from '../repositories/ledger.repository';
import { PerformanceTrackerService } from '../execution/services/performance-tracker.service';

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  ledgerRepository: () => LedgerRepository;
}

const defaultIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  ledgerRepository: () => new SupabaseLedgerRepository(),
};

/**
 * Operator tools: configuration validation and ledger inspection
 */
export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name('trade-bot-cli')
    .description('Trade bot operator tools')
    .version('1.0.0');

  program
    .command('validate-config')
    .description('Validate a trade bot configuration file')
    .argument('[file]', 'Path to the JSON configuration (defaults to TRADE_BOT_CONFIG_PATH)')
    .option('--no-env', 'Ignore TRADE_BOT_* environment overrides')
    .action(async (file: string | undefined, options: { env: boolean }) => {
      const path = file ?? getEnvironmentConfig().TRADE_BOT_CONFIG_PATH;
      if (!path) {
        io.err('❌ No configuration file given and TRADE_BOT_CONFIG_PATH is not set');
        process.exitCode = 1;
        return;
      }

      try {
        const overrides = options.env ? loadConfigOverridesFromEnv() : {};
        const config = await loadTradeBotConfigFile(path, overrides);

        io.out(`✅ ${path} is valid`);
        io.out(`Symbols: ${config.trading.symbols.join(', ')}`);
        io.out(`Polling interval: ${config.trading.pollingIntervalMs}ms (${config.trading.barInterval} bars, lookback ${config.trading.lookbackBars})`);
        io.out(`Max position size: ${config.risk.maxPositionSize}`);
        io.out(`Max daily loss: ${config.risk.maxDailyLoss}`);
        io.out(`Max open orders: ${config.risk.maxOpenOrders}`);
        const hours = config.trading.tradingHours;
        io.out(
          hours
            ? `Trading hours: ${hours.start}-${hours.end} ${hours.timezone} (days ${hours.daysOfWeek.join(',')})`
            : 'Trading hours: always open'
        );
        io.out(`Indicators: ${Object.keys(config.indicators).join(', ') || 'none'}`);
      } catch (error) {
        if (error instanceof ConfigError) {
          io.err(`❌ ${path} is invalid:`);
          error.issues.forEach(issue => io.err(`  - ${issue}`));
        } else {
          io.err(`❌ Validation failed: ${errorMessage(error)}`);
        }
        process.exitCode = 1;
      }
    });

  program
    .command('show-ledger')
    .description('Print the latest persisted ledger checkpoint')
    .option('-l, --ledger-id <id>', 'Ledger identifier', 'default')
    .action(async (options: { ledgerId: string }) => {
      try {
        const checkpoint = await io.ledgerRepository().loadCheckpoint(options.ledgerId);
        if (!checkpoint) {
          io.out(`No checkpoint stored for ledger ${options.ledgerId}`);
          return;
        }

        io.out(`Ledger ${checkpoint.ledgerId} at sequence ${checkpoint.sequence} (saved ${checkpoint.savedAt.toISOString()})`);
        io.out(`Cash: ${checkpoint.cash.toFixed(2)}`);
        io.out(`Realized P&L: ${checkpoint.realizedPnl.toFixed(2)} (session ${checkpoint.sessionRealizedPnl.toFixed(2)})`);
        io.out(`Session: ${checkpoint.sessionDate ?? 'not started'}${checkpoint.circuitBreakerTripped ? ' [circuit breaker tripped]' : ''}`);

        const performance = new PerformanceTrackerService(checkpoint.performance).summarize();
        io.out(
          `Trades: ${performance.totalTrades} (win rate ${performance.winRate.toFixed(2)}%), ` +
          `total P&L ${performance.totalPnl.toFixed(2)}, ` +
          `max drawdown ${performance.maxDrawdown.toFixed(2)} (${performance.maxDrawdownPercent.toFixed(2)}%)`
        );

        if (checkpoint.positions.length === 0) {
          io.out('Positions: none');
        }
        for (const position of checkpoint.positions) {
          io.out(`  ${position.symbol}: ${position.quantity} @ ${position.averageEntryPrice.toFixed(4)} (last ${position.lastPrice.toFixed(4)})`);
        }
      } catch (error) {
        io.err(`❌ Failed to load ledger: ${errorMessage(error)}`);
        process.exitCode = 1;
      }
    });

  return program;
}

// Parse command line arguments
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  createProgram().parseAsync().catch(error => {
    console.error('❌', errorMessage(error));
    process.exitCode = 1;
  });
}
