export type { PriceBar } from './bar.js';
export type {
  SignalSide,
  SignalProposal,
  ChartMarker,
  RunResult,
} from './signal.js';
export type {
  RealizedTrade,
  SkippedProposal,
  EquityPoint,
} from './trade.js';
export type {
  KpiRecord,
  KpiKey,
  MonthlyPnl,
  BacktestReport,
  UniverseEntry,
  UniverseSummary,
} from './report.js';
export type {
  DateRange,
  PositionSize,
  EvaluationRequest,
  ScanRequest,
  BacktestRequest,
  SymbolStatus,
  ScanResult,
  FailureKind,
  SymbolFailure,
  ScanProgress,
  ProgressCallback,
  ScanOutcome,
  BacktestOutcome,
} from './scan.js';
