import type { PriceBar } from '../types/index.js';
import { toDayKey } from '../utils/time.js';

/**
 * 일봉 배열의 날짜 → 인덱스 조회
 * 같은 UTC 날짜의 시각은 모두 그 날 봉으로 매칭된다.
 */
export class BarIndex {
  private readonly bars: readonly PriceBar[];
  private readonly byDay = new Map<string, number>();

  constructor(bars: readonly PriceBar[]) {
    this.bars = bars;
    bars.forEach((bar, i) => {
      this.byDay.set(toDayKey(bar.timestamp), i);
    });
  }

  get length(): number {
    return this.bars.length;
  }

  get first(): PriceBar | undefined {
    return this.bars[0];
  }

  get last(): PriceBar | undefined {
    return this.bars[this.bars.length - 1];
  }

  indexOf(ms: number): number | undefined {
    return this.byDay.get(toDayKey(ms));
  }

  barAt(index: number): PriceBar | undefined {
    return this.bars[index];
  }

  find(ms: number): PriceBar | undefined {
    const i = this.indexOf(ms);
    return i === undefined ? undefined : this.bars[i];
  }
}
