import type {
  BacktestReport,
  MonthlyPnl,
  ScanOutcome,
  SymbolFailure,
  UniverseSummary,
} from '../types/index.js';
import { toDayKey } from '../utils/time.js';

/**
 * 콘솔 테이블 출력 (외부 의존성 없음)
 * 수익률/낙폭/승률은 내부적으로 비율이라 여기서 ×100
 */
export function formatReport(report: BacktestReport): string {
  const { kpis } = report;
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push(`          BACKTEST REPORT  ${report.symbol}`);
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  lines.push(formatSection('Performance', [
    ['Total Return', formatPct(kpis.returnPct)],
    ['Max Drawdown', formatPct(kpis.maxDrawdown)],
    ['Sharpe Ratio', kpis.sharpeRatio.toFixed(2)],
    ['Profit Factor', formatRatio(kpis.profitFactor)],
  ]));

  lines.push(formatSection('Trades', [
    ['Total Trades', String(kpis.tradeCount)],
    ['Win Rate', formatPct(kpis.winRate, 1)],
    ['Wins / Losses', `${kpis.winCount} / ${kpis.lossCount}`],
    ['Avg Win', formatAmount(kpis.avgWin)],
    ['Avg Loss', formatAmount(kpis.avgLoss)],
    ['Expectancy', formatAmount(kpis.expectancy)],
    ['Max Consec. Losses', String(kpis.maxConsecutiveLosses)],
    ['Avg Holding Days', kpis.avgHoldingDays.toFixed(1)],
    ['Skipped', String(report.skipped.length)],
  ]));

  lines.push(formatSection('Capital', [
    ['Start Equity', formatAmount(report.initialCash)],
    ['End Equity', formatAmount(kpis.finalEquity)],
    ['Net Profit', formatAmount(kpis.netProfit)],
  ]));

  if (report.monthlyPnl.length > 0) {
    lines.push('');
    lines.push('── Monthly PnL ──────────────────────────');
    lines.push(formatMonthlyTable(report.monthlyPnl));
  }

  lines.push('');
  return lines.join('\n');
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(Math.max(0, 38 - title.length))}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function formatPct(fraction: number, digits: number = 2): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}

/**
 * --json 출력용. 손실 없는 profitFactor(Infinity)가 null로 바뀌지 않게 문자열로 남긴다
 */
export function formatJson(value: unknown): string {
  return JSON.stringify(value, (_key, v: unknown) => {
    if (v === Infinity) return 'Infinity';
    if (v === -Infinity) return '-Infinity';
    return v;
  }, 2);
}

function formatRatio(value: number): string {
  return value === Infinity ? 'INF' : value.toFixed(2);
}

export function formatAmount(value: number): string {
  const sign = value >= 0 ? '' : '-';
  const abs = Math.abs(value);
  if (abs >= 1_000_000) {
    return `${sign}${(abs / 1_000_000).toFixed(2)}M`;
  }
  if (abs >= 1_000) {
    return `${sign}${(abs / 1_000).toFixed(1)}K`;
  }
  return `${sign}${abs.toFixed(0)}`;
}

function formatMonthlyTable(monthly: readonly MonthlyPnl[]): string {
  const lines: string[] = [];
  lines.push('  Year-Mo    PnL          Trades');
  lines.push('  ────────── ──────────── ──────');

  for (const m of monthly) {
    const ym = `${m.year}-${String(m.month).padStart(2, '0')}`;
    const pnl = formatAmount(m.pnl).padStart(12);
    lines.push(`  ${ym}   ${pnl}   ${String(m.tradeCount).padStart(4)}`);
  }

  return lines.join('\n');
}

/**
 * 트레이드 목록 출력
 */
export function formatTrades(report: BacktestReport): string {
  if (report.trades.length === 0) return 'No trades.';

  const lines: string[] = [];
  lines.push('  #   Entry Date  Exit Date   Entry Fill   Exit Fill    Net PnL      Ret%     Days  Reason');
  lines.push('  ─── ────────── ────────── ──────────── ──────────── ──────────── ──────── ────  ──────');

  report.trades.forEach((t, i) => {
    const num = String(i + 1).padStart(3);
    const ep = t.entryFillPrice.toFixed(2).padStart(12);
    const xp = t.exitFillPrice.toFixed(2).padStart(12);
    const pnl = formatAmount(t.netPnl).padStart(12);
    const ret = `${t.returnPct >= 0 ? '+' : ''}${(t.returnPct * 100).toFixed(2)}%`.padStart(8);
    const days = String(t.holdingDays).padStart(4);
    lines.push(`  ${num} ${toDayKey(t.entryTime)} ${toDayKey(t.exitTime)} ${ep} ${xp} ${pnl} ${ret} ${days}  ${t.reason}`);
  });

  return lines.join('\n');
}

/**
 * 스캔 결과 랭킹 출력
 */
export function formatScanResults(outcome: ScanOutcome, top: number = outcome.results.length): string {
  const lines: string[] = [];
  lines.push('');
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('          SCAN RESULTS');
  lines.push(`          Ranked: ${outcome.results.length}  |  Failed: ${outcome.failures.length}${outcome.cancelled ? '  |  CANCELLED' : ''}`);
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('');
  lines.push('  Rank  Symbol       Entry Date  Entry Price   Score      Return   Note');
  lines.push('  ───── ──────────── ────────── ──────────── ────────── ──────── ──────');

  for (const r of outcome.results.slice(0, top)) {
    const rank = String(r.rank).padStart(5);
    const symbol = r.symbol.padEnd(12);
    const date = (r.entryDate ?? '-').padEnd(10);
    const price = (r.entryPrice === null ? '-' : r.entryPrice.toFixed(2)).padStart(12);
    const score = r.score.toFixed(4).padStart(10);
    const ret = (r.kpis ? formatPct(r.kpis.returnPct) : '-').padStart(8);
    const note = r.status === 'failed' ? `FAILED: ${r.note}` : r.note;
    lines.push(`  ${rank} ${symbol} ${date} ${price} ${score} ${ret}   ${note}`);
  }

  if (outcome.failures.length > 0) {
    lines.push('');
    lines.push(formatFailures(outcome.failures));
  }

  lines.push('');
  return lines.join('\n');
}

export function formatFailures(failures: readonly SymbolFailure[]): string {
  const lines: string[] = [`── Failures (${failures.length}) ${'─'.repeat(24)}`];
  for (const f of failures) {
    lines.push(`  ${f.symbol.padEnd(12)} ${f.kind.padEnd(16)} ${f.reason}`);
  }
  return lines.join('\n');
}

/**
 * 유니버스 요약 (상위/하위)
 */
export function formatUniverseSummary(summary: UniverseSummary): string {
  const lines: string[] = [];
  lines.push('');
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('          UNIVERSE SUMMARY');
  lines.push(`          Instruments: ${summary.instrumentCount}  |  Ranked by: ${summary.rankBy}`);
  lines.push('═══════════════════════════════════════════════════════');
  lines.push('');

  lines.push(formatSection('Totals', [
    ['Total Trades', String(summary.totalTrades)],
    ['Win Rate', formatPct(summary.winRate, 1)],
    ['Total Net Profit', formatAmount(summary.totalNetProfit)],
  ]));

  const rows = (title: string, entries: UniverseSummary['top']): void => {
    if (entries.length === 0) return;
    lines.push(`── ${title} ${'─'.repeat(Math.max(0, 38 - title.length))}`);
    entries.forEach((e, i) => {
      lines.push(`  #${i + 1}  ${e.symbol.padEnd(12)} Return: ${formatPct(e.kpis.returnPct)}  |  PF: ${formatRatio(e.kpis.profitFactor)}  |  MDD: ${formatPct(e.kpis.maxDrawdown)}  |  Trades: ${e.kpis.tradeCount}`);
    });
    lines.push('');
  };
  rows('Top', summary.top);
  rows('Bottom', summary.bottom);

  return lines.join('\n');
}
