import type { ChartMarker, RunResult } from '../types/index.js';
import { type StrategyContext, type StrategyDefinition, emptyResult, numParam, primarySeries } from './strategy.js';
import { priorAverageVolume } from '../indicators/volume.js';
import { toDayKey } from '../utils/time.js';

/**
 * 거래량 급증 양봉: 마커 + scanCandidates 출력
 * 청산 정보가 없어 백테스트는 마커 근사 규칙을 따른다
 */
function runVolumeSurge(context: StrategyContext): RunResult {
  const { bars } = primarySeries(context);
  const lookback = Math.max(1, Math.floor(numParam(context.params, 'lookback', 20)));
  const multiplier = numParam(context.params, 'multiplier', 2);
  if (bars.length === 0) return emptyResult('no bars');

  const avgVolume = priorAverageVolume(bars, lookback);
  const markers: ChartMarker[] = [];
  const scanCandidates: Array<Record<string, unknown>> = [];

  bars.forEach((bar, i) => {
    const avg = avgVolume[i];
    if (avg == null || avg <= 0 || bar.close <= bar.open) return;
    const ratio = bar.volume / avg;
    if (ratio < multiplier) return;
    const date = toDayKey(bar.timestamp);
    markers.push({ time: date, text: 'BUY', position: 'belowBar', score: ratio });
    scanCandidates.push({ date, close: bar.close, score: ratio, note: `volume x${ratio.toFixed(1)}` });
  });

  return { markers, overlays: [], extraData: { scanCandidates } };
}

export const volumeSurge: StrategyDefinition = {
  key: 'volume-surge',
  title: 'Volume Surge',
  description: '평균 대비 거래량 급증 양봉 포착',
  category: 'pattern',
  handler: runVolumeSurge,
  parameters: [
    { key: 'lookback', label: '평균 거래량 기간', type: 'number', default: 20 },
    { key: 'multiplier', label: '급증 배수', type: 'number', default: 2 },
  ],
  modes: { preview: true, scan: true, backtest: true },
};
