import type { BacktestReport, KpiRecord, UniverseSummary } from './report.js';

/** ISO 날짜 (YYYY-MM-DD), 양끝 포함 */
export interface DateRange {
  readonly start: string;
  readonly end: string;
}

export type PositionSize =
  | { readonly kind: 'percent'; readonly pct: number }
  | { readonly kind: 'units'; readonly units: number };

export interface EvaluationRequest {
  readonly universe: readonly string[];
  readonly dateRange: DateRange;
  readonly strategyKey: string;
  readonly strategyParams: Readonly<Record<string, unknown>>;
  readonly commissionRate: number;
  readonly slippage: number;
  readonly maxPositions: number;
  readonly positionSize: PositionSize;
  readonly initialCash: number;
  readonly concurrency: number;
}

export type ScanRequest = EvaluationRequest;
export type BacktestRequest = EvaluationRequest;

export type SymbolStatus = 'ok' | 'failed';

export interface ScanResult {
  readonly rank: number;
  readonly symbol: string;
  readonly status: SymbolStatus;
  readonly entryDate: string | null;
  readonly entryPrice: number | null;
  readonly score: number;
  readonly note: string;
  readonly kpis?: KpiRecord;
}

export type FailureKind = 'data-unavailable' | 'validation' | 'strategy' | 'internal';

export interface SymbolFailure {
  readonly symbol: string;
  readonly kind: FailureKind;
  readonly reason: string;
}

export interface ScanProgress {
  readonly completed: number;
  readonly total: number;
  readonly symbol: string;
  readonly status: SymbolStatus;
}

export type ProgressCallback = (progress: ScanProgress) => void;

export interface ScanOutcome {
  readonly results: readonly ScanResult[];
  readonly failures: readonly SymbolFailure[];
  readonly cancelled: boolean;
  readonly summary: UniverseSummary;
}

export interface BacktestOutcome {
  readonly reports: readonly BacktestReport[];
  readonly failures: readonly SymbolFailure[];
  readonly cancelled: boolean;
  readonly summary: UniverseSummary;
}
