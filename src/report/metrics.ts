import type {
  RealizedTrade,
  EquityPoint,
  KpiRecord,
  KpiKey,
  MonthlyPnl,
  BacktestReport,
  UniverseEntry,
  UniverseSummary,
} from '../types/index.js';
import type { SimulationResult } from '../engine/position-simulator.js';

export interface KpiOptions {
  /** 샤프 연환산 기준 일수 (달력일) */
  readonly annualizationDays: number;
}

const DEFAULT_KPI_OPTIONS: KpiOptions = {
  annualizationDays: 365,
};

export function computeKpis(
  trades: readonly RealizedTrade[],
  equityCurve: readonly EquityPoint[],
  initialCash: number,
  options?: Partial<KpiOptions>,
): KpiRecord {
  const opts = { ...DEFAULT_KPI_OPTIONS, ...options };
  const wins = trades.filter((t) => t.netPnl > 0);
  const losses = trades.filter((t) => t.netPnl <= 0);

  const netProfit = trades.reduce((s, t) => s + t.netPnl, 0);
  const grossProfit = wins.reduce((s, t) => s + t.netPnl, 0);
  const grossLoss = Math.abs(losses.reduce((s, t) => s + t.netPnl, 0));
  const drawdown = calcMaxDrawdown(equityCurve);

  return {
    netProfit,
    returnPct: initialCash > 0 ? netProfit / initialCash : 0,
    maxDrawdown: drawdown.pct,
    maxDrawdownValue: drawdown.value,
    winRate: trades.length > 0 ? wins.length / trades.length : 0,
    winCount: wins.length,
    lossCount: losses.length,
    avgWin: wins.length > 0 ? grossProfit / wins.length : 0,
    avgLoss: losses.length > 0 ? grossLoss / losses.length : 0,
    profitFactor: grossLoss > 0 ? grossProfit / grossLoss : grossProfit > 0 ? Infinity : 0,
    expectancy: trades.length > 0 ? netProfit / trades.length : 0,
    maxConsecutiveLosses: calcMaxConsecutiveLosses(trades),
    sharpeRatio: calcSharpe(trades, opts.annualizationDays),
    tradeCount: trades.length,
    avgHoldingDays: trades.length > 0
      ? trades.reduce((s, t) => s + t.holdingDays, 0) / trades.length
      : 0,
    finalEquity: initialCash + netProfit,
  };
}

export function buildReport(
  simulation: SimulationResult,
  options?: Partial<KpiOptions>,
): BacktestReport {
  const kpis = computeKpis(
    simulation.trades,
    simulation.equityCurve,
    simulation.initialCash,
    options,
  );

  return {
    symbol: simulation.symbol,
    initialCash: simulation.initialCash,
    trades: simulation.trades,
    skipped: simulation.skipped,
    equityCurve: simulation.equityCurve,
    kpis,
    monthlyPnl: calcMonthlyPnl(simulation.trades),
    notes: `${kpis.tradeCount} trades, ${simulation.skipped.length} skipped, max ${simulation.maxOpenPositions} open`,
  };
}

/**
 * 러닝 최대값 대비 낙폭, 전진 1회 순회
 * 비율은 에쿼티 전체를 양의 상수배 해도 변하지 않는다
 */
export function calcMaxDrawdown(curve: readonly EquityPoint[]): { pct: number; value: number } {
  const first = curve[0];
  if (!first) return { pct: 0, value: 0 };
  let peak = first.equity;
  let maxPct = 0;
  let maxValue = 0;

  for (const point of curve) {
    if (point.equity > peak) peak = point.equity;
    const value = peak - point.equity;
    const pct = peak > 0 ? value / peak : 0;
    if (value > maxValue) maxValue = value;
    if (pct > maxPct) maxPct = pct;
  }

  return { pct: maxPct, value: maxValue };
}

function calcMaxConsecutiveLosses(trades: readonly RealizedTrade[]): number {
  let max = 0;
  let current = 0;
  for (const t of trades) {
    if (t.netPnl <= 0) {
      current++;
      if (current > max) max = current;
    } else {
      current = 0;
    }
  }
  return max;
}

function calcSharpe(trades: readonly RealizedTrade[], annualizationDays: number): number {
  if (trades.length < 2) return 0;
  const returns = trades.map((t) => t.returnPct);
  const mean = returns.reduce((s, r) => s + r, 0) / returns.length;
  const variance = returns.reduce((s, r) => s + (r - mean) ** 2, 0) / (returns.length - 1);
  const std = Math.sqrt(variance);
  if (std === 0 || !Number.isFinite(std)) return 0;
  // 트레이드당 평균 보유일로 연간 트레이드 횟수 추정
  const avgHoldingDays = trades.reduce((s, t) => s + t.holdingDays, 0) / trades.length;
  const tradesPerYear = avgHoldingDays > 0 ? annualizationDays / avgHoldingDays : 1;
  return (mean / std) * Math.sqrt(tradesPerYear);
}

function calcMonthlyPnl(trades: readonly RealizedTrade[]): MonthlyPnl[] {
  const map = new Map<string, MonthlyPnl>();

  for (const t of trades) {
    const d = new Date(t.exitTime);
    const year = d.getUTCFullYear();
    const month = d.getUTCMonth() + 1;
    const key = `${year}-${month}`;

    const existing = map.get(key);
    map.set(key, {
      year,
      month,
      pnl: (existing?.pnl ?? 0) + t.netPnl,
      tradeCount: (existing?.tradeCount ?? 0) + 1,
    });
  }

  return Array.from(map.values()).sort(
    (a, b) => a.year - b.year || a.month - b.month,
  );
}

export interface UniverseOptions {
  readonly rankBy: KpiKey;
  readonly topN: number;
}

const DEFAULT_UNIVERSE_OPTIONS: UniverseOptions = {
  rankBy: 'returnPct',
  topN: 5,
};

/**
 * 심볼별 KPI → 유니버스 요약
 * 랭킹: rankBy 내림차순, 동률은 심볼 오름차순
 * 승률은 심볼 평균이 아니라 전체 트레이드 가중
 */
export function summarizeUniverse(
  entries: readonly UniverseEntry[],
  options?: Partial<UniverseOptions>,
): UniverseSummary {
  const opts = { ...DEFAULT_UNIVERSE_OPTIONS, ...options };
  const key = opts.rankBy;

  const ranked = [...entries].sort((a, b) => {
    const diff = compareDesc(a.kpis[key], b.kpis[key]);
    return diff !== 0 ? diff : compareSymbols(a.symbol, b.symbol);
  });

  const totalTrades = entries.reduce((s, e) => s + e.kpis.tradeCount, 0);
  const totalWins = entries.reduce((s, e) => s + e.kpis.winCount, 0);
  const n = Math.max(0, opts.topN);

  return {
    rankBy: key,
    instrumentCount: entries.length,
    ranked,
    top: ranked.slice(0, n),
    bottom: ranked.slice(Math.max(0, ranked.length - n)).reverse(),
    totalTrades,
    totalWins,
    winRate: totalTrades > 0 ? totalWins / totalTrades : 0,
    totalNetProfit: entries.reduce((s, e) => s + e.kpis.netProfit, 0),
  };
}

/** 로케일 무관 코드 유닛 순서 */
export function compareSymbols(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/** Infinity/NaN 포함 내림차순 비교 (NaN은 맨 뒤) */
export function compareDesc(a: number, b: number): number {
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
  if (Number.isNaN(b)) return -1;
  if (a === b) return 0;
  return a > b ? -1 : 1;
}
