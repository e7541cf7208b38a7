import type { PriceBar } from '../types/index.js';

export interface ChannelPoint {
  readonly upper: number;
  readonly lower: number;
}

/**
 * 직전 period봉(현재 봉 제외)의 최고 고가 / 최저 저가
 * 돌파 판정용이라 i번째 값은 i-period..i-1 구간으로 계산, 부족하면 null
 */
export function priorChannel(bars: readonly PriceBar[], period: number): Array<ChannelPoint | null> {
  if (!Number.isInteger(period) || period < 1) throw new RangeError('Donchian period must be an integer >= 1');
  return bars.map((_, i) => {
    if (i < period) return null;
    let upper = Number.NEGATIVE_INFINITY;
    let lower = Number.POSITIVE_INFINITY;
    for (const bar of bars.slice(i - period, i)) {
      if (bar.high > upper) upper = bar.high;
      if (bar.low < lower) lower = bar.low;
    }
    return { upper, lower };
  });
}
