import type { RunResult } from '../types/index.js';
import type {
  RunMode,
  StrategyContext,
  StrategyDefinition,
  StrategyRunner,
} from './strategy.js';
import { StrategyExecutionError, ValidationError } from '../errors.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('strategy-registry');

/**
 * 전략 레지스트리: key로 핸들러를 찾아 실행
 * 핸들러 예외는 StrategyExecutionError로 감싼다
 */
export class StrategyRegistry implements StrategyRunner {
  private readonly strategies = new Map<string, StrategyDefinition>();

  register(definition: StrategyDefinition): void {
    if (this.strategies.has(definition.key)) {
      throw new ValidationError(`Duplicate strategy key: ${definition.key}`);
    }
    this.strategies.set(definition.key, definition);
  }

  unregister(key: string): void {
    this.strategies.delete(key);
  }

  get(key: string): StrategyDefinition | undefined {
    return this.strategies.get(key);
  }

  all(): StrategyDefinition[] {
    return Array.from(this.strategies.values());
  }

  byCategory(category: string): StrategyDefinition[] {
    return this.all().filter((s) => (s.category ?? 'general') === category);
  }

  ensure(key: string): StrategyDefinition {
    const definition = this.strategies.get(key);
    if (!definition) {
      throw new ValidationError(`Strategy "${key}" is not registered`);
    }
    return definition;
  }

  supports(key: string, mode: RunMode): boolean {
    const definition = this.strategies.get(key);
    if (!definition) return false;
    return definition.modes?.[mode] ?? true;
  }

  async run(context: StrategyContext): Promise<RunResult> {
    const definition = this.ensure(context.strategyKey);
    try {
      return await definition.handler(context);
    } catch (err) {
      log.warn({ strategy: context.strategyKey, symbols: context.symbols, err }, 'Strategy handler failed');
      throw new StrategyExecutionError(context.strategyKey, err);
    }
  }
}
