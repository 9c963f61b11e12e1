import { StrategyRegistry } from '../services/StrategyRegistry';
import { RSI_STRATEGY_TYPE, RsiStrategy } from './RsiStrategy';

export { RsiStrategy, RSI_STRATEGY_TYPE } from './RsiStrategy';
export type { RsiParams } from './RsiStrategy';

/**
 * Registry with every strategy this package ships
 */
export function createDefaultRegistry(): StrategyRegistry {
  return new StrategyRegistry().register(RSI_STRATEGY_TYPE, (executor, params, dataPipeline) => new RsiStrategy(executor, params, dataPipeline));
}
