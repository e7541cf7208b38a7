import type { ChartMarker, RunResult } from '../types/index.js';
import { type StrategyContext, type StrategyDefinition, emptyResult, numParam, primarySeries } from './strategy.js';
import { priorChannel } from '../indicators/donchian.js';
import { toDayKey } from '../utils/time.js';

/**
 * Donchian Breakout (롱전용): 명시적 trades 출력
 *
 * 진입: close가 직전 entryPeriod봉 최고가 돌파
 * 청산: close가 직전 exitPeriod봉 최저가 이탈 (없으면 열린 채로 반환 → 구간 끝 강제 청산)
 */
function runDonchianBreakout(context: StrategyContext): RunResult {
  const { bars } = primarySeries(context);
  const entryPeriod = Math.max(1, Math.floor(numParam(context.params, 'entryPeriod', 20)));
  const exitPeriod = Math.max(1, Math.floor(numParam(context.params, 'exitPeriod', 10)));
  if (bars.length === 0) return emptyResult('no bars');

  const entryChannel = priorChannel(bars, entryPeriod);
  const exitChannel = priorChannel(bars, exitPeriod);
  const trades: Array<Record<string, unknown>> = [];
  let open: Record<string, unknown> | null = null;

  for (const [i, bar] of bars.entries()) {
    if (!open) {
      const ch = entryChannel[i];
      if (ch && bar.close > ch.upper) {
        open = {
          entryTime: toDayKey(bar.timestamp),
          entryPrice: bar.close,
          score: bar.close / ch.upper - 1,
          reason: `donchian-${entryPeriod} breakout`,
        };
      }
      continue;
    }
    const ch = exitChannel[i];
    if (ch && bar.close < ch.lower) {
      trades.push({ ...open, exitTime: toDayKey(bar.timestamp), exitPrice: bar.close });
      open = null;
    }
  }
  if (open) trades.push(open);

  return {
    markers: trades.map((t): ChartMarker => ({ time: String(t['entryTime']), text: 'BUY', position: 'belowBar' })),
    overlays: [],
    extraData: { trades },
    statusMessage: `${trades.length} breakouts`,
  };
}

export const donchianBreakout: StrategyDefinition = {
  key: 'donchian-breakout',
  title: 'Donchian Breakout',
  description: '직전 N봉 최고가 돌파 진입, M봉 최저가 이탈 청산',
  category: 'trend',
  handler: runDonchianBreakout,
  parameters: [
    { key: 'entryPeriod', label: '진입 채널 기간', type: 'number', default: 20 },
    { key: 'exitPeriod', label: '청산 채널 기간', type: 'number', default: 10 },
  ],
  modes: { preview: true, scan: true, backtest: true },
};
