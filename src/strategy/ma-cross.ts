import type { ChartMarker, RunResult } from '../types/index.js';
import { type StrategyContext, type StrategyDefinition, emptyResult, numParam, primarySeries } from './strategy.js';
import { emaSeries } from '../indicators/ema.js';
import { toDayKey } from '../utils/time.js';

interface CrossSignal {
  readonly time: string;
  readonly side: 'buy' | 'sell';
  readonly price: number;
  readonly score: number;
  readonly reason: string;
}

/**
 * EMA 골든/데드 크로스: signals 출력
 * score = 크로스 시점 (fast - slow) / slow
 */
function runMaCross(context: StrategyContext): RunResult {
  const { bars } = primarySeries(context);
  const fast = Math.max(1, Math.floor(numParam(context.params, 'fast', 5)));
  const slow = Math.max(fast + 1, Math.floor(numParam(context.params, 'slow', 20)));
  if (bars.length === 0) return emptyResult('no bars');

  const closes = bars.map((b) => b.close);
  const fastLine = emaSeries(closes, fast);
  const slowLine = emaSeries(closes, slow);
  const signals: CrossSignal[] = [];
  let prevDiff: number | null = null;

  bars.forEach((bar, i) => {
    const f = fastLine[i];
    const s = slowLine[i];
    if (f == null || s == null) return;
    const diff = f - s;
    if (prevDiff !== null) {
      const score = s !== 0 ? diff / s : 0;
      if (prevDiff <= 0 && diff > 0) {
        signals.push({ time: toDayKey(bar.timestamp), side: 'buy', price: bar.close, score, reason: `ema-${fast}/${slow} golden cross` });
      } else if (prevDiff >= 0 && diff < 0) {
        signals.push({ time: toDayKey(bar.timestamp), side: 'sell', price: bar.close, score, reason: `ema-${fast}/${slow} dead cross` });
      }
    }
    prevDiff = diff;
  });

  return {
    markers: signals.map((sig): ChartMarker => ({
      time: sig.time,
      text: sig.side.toUpperCase(),
      position: sig.side === 'buy' ? 'belowBar' : 'aboveBar',
    })),
    overlays: [
      { name: `EMA ${fast}`, values: fastLine },
      { name: `EMA ${slow}`, values: slowLine },
    ],
    extraData: { signals },
  };
}

export const maCross: StrategyDefinition = {
  key: 'ma-cross',
  title: 'EMA Cross',
  description: '단기/장기 EMA 교차 매수·매도 신호',
  category: 'trend',
  handler: runMaCross,
  parameters: [
    { key: 'fast', label: '단기 EMA', type: 'number', default: 5 },
    { key: 'slow', label: '장기 EMA', type: 'number', default: 20 },
  ],
  modes: { preview: true, scan: true, backtest: true },
};
