import type { DateRange, PriceBar, RunResult } from '../types/index.js';

export type RunMode = 'preview' | 'scan' | 'backtest';

export type StrategyParams = Readonly<Record<string, unknown>>;

/** 전략 1회 실행 입력. series는 엔진이 이미 로드한 봉 (심볼 → 봉) */
export interface StrategyContext {
  readonly strategyKey: string;
  readonly symbols: readonly string[];
  readonly dateRange: DateRange;
  readonly mode: RunMode;
  readonly params: StrategyParams;
  readonly series: ReadonlyMap<string, readonly PriceBar[]>;
}

/** 엔진 입장에서 불투명한 전략 실행기 */
export interface StrategyRunner {
  run(context: StrategyContext): Promise<RunResult>;
  /** 있으면 요청 검증 단계에서 키/모드 지원 여부 확인 */
  supports?(strategyKey: string, mode: RunMode): boolean;
}

export type StrategyHandler = (context: StrategyContext) => RunResult | Promise<RunResult>;

export interface StrategyParameter {
  readonly key: string;
  readonly label: string;
  readonly type: 'number' | 'text' | 'select' | 'date';
  readonly default?: string | number;
  readonly description?: string;
  readonly options?: readonly (string | number)[];
}

export interface StrategyDefinition {
  readonly key: string;
  readonly title: string;
  readonly description: string;
  readonly handler: StrategyHandler;
  readonly category?: string;
  readonly parameters?: readonly StrategyParameter[];
  readonly tags?: readonly string[];
  readonly modes?: Partial<Record<RunMode, boolean>>;
}

/** 컨텍스트의 첫 심볼과 그 봉 */
export function primarySeries(context: StrategyContext): { symbol: string; bars: readonly PriceBar[] } {
  const symbol = context.symbols[0] ?? '';
  return { symbol, bars: context.series.get(symbol) ?? [] };
}

/** params에서 숫자 파라미터 읽기 (숫자 문자열 허용) */
export function numParam(params: StrategyParams, key: string, fallback: number): number {
  const v = params[key];
  if (typeof v === 'number' && Number.isFinite(v)) return v;
  if (typeof v === 'string' && v.trim() !== '' && Number.isFinite(Number(v))) return Number(v);
  return fallback;
}

export function emptyResult(statusMessage?: string): RunResult {
  return { markers: [], overlays: [], extraData: {}, statusMessage };
}
