/**
 * Strategy Signal Interface - Contract every alpha strategy plugs into the engine with
 */

import type { Bar, SignalIntent } from '../types/execution.types';
import type { TechnicalIndicatorsConfig } from '../../config/trade-bot.config';

export interface StrategySignal {
  readonly name: string;

  /**
   * Turn the latest bars into a directional intent. The engine treats
   * `conviction` as advisory sizing input only.
   */
  generateIntent(
    symbol: string,
    bars: readonly Bar[],
    indicators: TechnicalIndicatorsConfig
  ): SignalIntent | Promise<SignalIntent>;
}
