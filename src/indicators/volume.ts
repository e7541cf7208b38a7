import type { PriceBar } from '../types/index.js';

/** 직전 period봉 평균 거래량, 부족하면 null */
export function priorAverageVolume(bars: readonly PriceBar[], period: number): Array<number | null> {
  if (!Number.isInteger(period) || period < 1) throw new RangeError('Volume period must be an integer >= 1');
  return bars.map((_, i) => {
    if (i < period) return null;
    return bars.slice(i - period, i).reduce((s, b) => s + b.volume, 0) / period;
  });
}
