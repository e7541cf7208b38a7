import type { EquityPoint, RealizedTrade, SkippedProposal } from './trade.js';

export interface KpiRecord {
  readonly netProfit: number;
  readonly returnPct: number;         // netProfit / initialCash (비율)
  readonly maxDrawdown: number;       // 최대 낙폭 비율 0~1
  readonly maxDrawdownValue: number;  // 최대 낙폭 금액
  readonly winRate: number;           // 0~1
  readonly winCount: number;
  readonly lossCount: number;
  readonly avgWin: number;
  readonly avgLoss: number;           // 양수
  readonly profitFactor: number;
  readonly expectancy: number;
  readonly maxConsecutiveLosses: number;
  readonly sharpeRatio: number;
  readonly tradeCount: number;
  readonly avgHoldingDays: number;
  readonly finalEquity: number;
}

export interface MonthlyPnl {
  readonly year: number;
  readonly month: number;
  readonly pnl: number;
  readonly tradeCount: number;
}

export interface BacktestReport {
  readonly symbol: string;
  readonly initialCash: number;
  readonly trades: readonly RealizedTrade[];
  readonly skipped: readonly SkippedProposal[];
  readonly equityCurve: readonly EquityPoint[];
  readonly kpis: KpiRecord;
  readonly monthlyPnl: readonly MonthlyPnl[];
  readonly notes: string;
}

export type KpiKey = {
  [K in keyof KpiRecord]: KpiRecord[K] extends number ? K : never;
}[keyof KpiRecord];

export interface UniverseEntry {
  readonly symbol: string;
  readonly kpis: KpiRecord;
}

export interface UniverseSummary {
  readonly rankBy: KpiKey;
  readonly instrumentCount: number;
  readonly ranked: readonly UniverseEntry[];
  readonly top: readonly UniverseEntry[];
  readonly bottom: readonly UniverseEntry[];
  readonly totalTrades: number;
  readonly totalWins: number;
  readonly winRate: number;           // 트레이드 가중
  readonly totalNetProfit: number;
}
