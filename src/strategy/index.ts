import { StrategyRegistry } from './registry.js';
import { donchianBreakout } from './donchian-breakout.js';
import { maCross } from './ma-cross.js';
import { volumeSurge } from './volume-surge.js';

export const BUILTIN_STRATEGIES = [donchianBreakout, maCross, volumeSurge] as const;

export function createDefaultRegistry(): StrategyRegistry {
  const registry = new StrategyRegistry();
  for (const definition of BUILTIN_STRATEGIES) registry.register(definition);
  return registry;
}
