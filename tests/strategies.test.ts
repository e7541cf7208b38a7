import { describe, it, expect } from 'vitest';
import { createDefaultRegistry } from '../src/strategy/index.js';
import type { RunMode, StrategyContext } from '../src/strategy/strategy.js';
import { numParam } from '../src/strategy/strategy.js';
import { emaSeries } from '../src/indicators/ema.js';
import { priorChannel } from '../src/indicators/donchian.js';
import { priorAverageVolume } from '../src/indicators/volume.js';
import { classifyOutput, extractScanCandidates } from '../src/signals/strategy-output.js';
import type { PriceBar } from '../src/types/index.js';
import { closeBars, dailyBars } from './helpers/bars.js';

function context(strategyKey: string, bars: PriceBar[], params: Record<string, unknown> = {}, mode: RunMode = 'backtest'): StrategyContext {
  return {
    strategyKey,
    symbols: ['AAA'],
    dateRange: { start: '2024-01-01', end: '2024-12-31' },
    mode,
    params,
    series: new Map([['AAA', bars]]),
  };
}

describe('indicators', () => {
  it('should seed the EMA with a simple average', () => {
    const ema = emaSeries([1, 2, 3, 4], 2);
    expect(ema[0]).toBeNull();
    expect(ema[1]).toBe(1.5);
    expect(ema[2]).toBeCloseTo(2.5, 10);
    expect(ema[3]).toBeCloseTo(3.5, 10);
  });

  it('should compute the channel over prior bars only', () => {
    const bars = closeBars('2024-01-01', [10, 12, 11, 20]);
    expect(priorChannel(bars, 2)).toEqual([null, null, { upper: 13, lower: 9 }, { upper: 13, lower: 10 }]);
  });

  it('should average prior volume', () => {
    const bars = dailyBars('2024-01-01', [[1, 1, 1, 1, 100], [1, 1, 1, 1, 300], [1, 1, 1, 1, 900]]);
    expect(priorAverageVolume(bars, 2)).toEqual([null, null, 200]);
  });

  it('should reject invalid periods', () => {
    expect(() => emaSeries([1], 0)).toThrow(RangeError);
  });
});

describe('built-in strategies', () => {
  const registry = createDefaultRegistry();

  it('should register the reference strategies', () => {
    expect(registry.all().map((s) => s.key)).toEqual(['donchian-breakout', 'ma-cross', 'volume-surge']);
  });

  it('donchian-breakout should emit explicit trades', async () => {
    // 횡보 후 돌파, 이후 급락
    const bars = closeBars('2024-01-01', [10, 10, 10, 10, 15, 16, 17, 5, 5]);
    const result = await registry.run(context('donchian-breakout', bars, { entryPeriod: 3, exitPeriod: 2 }));

    expect(result.extraData['trades']).toEqual([{
      entryTime: '2024-01-05',
      entryPrice: 15,
      score: 15 / 11 - 1,
      reason: 'donchian-3 breakout',
      exitTime: '2024-01-08',
      exitPrice: 5,
    }]);
    expect(classifyOutput(result).kind).toBe('trades');
  });

  it('ma-cross should emit scored signals', async () => {
    const bars = closeBars('2024-01-01', [10, 10, 10, 10, 20, 20, 20, 1, 1, 1]);
    const result = await registry.run(context('ma-cross', bars, { fast: 2, slow: 4 }));
    const output = classifyOutput(result);

    expect(output.kind).toBe('signals');
    if (output.kind === 'signals') {
      expect(output.signals.map((s) => [s.time, s.side])).toEqual([
        ['2024-01-05', 'buy'],
        ['2024-01-08', 'sell'],
      ]);
    }
  });

  it('volume-surge should emit markers and scan candidates', async () => {
    const bars = dailyBars('2024-01-01', [
      [10, 11, 9, 10, 100],
      [10, 11, 9, 10, 100],
      [10, 13, 10, 12, 500],
      [12, 12, 10, 11, 900],
    ]);
    const result = await registry.run(context('volume-surge', bars, { lookback: 2, multiplier: '3' }, 'scan'));

    expect(result.markers).toEqual([{ time: '2024-01-03', text: 'BUY', position: 'belowBar', score: 5 }]);
    expect(extractScanCandidates(result)).toEqual([
      { time: '2024-01-03', price: 12, score: 5, note: 'volume x5.0' },
    ]);
  });

  it('should return an empty result without bars', async () => {
    const result = await registry.run(context('ma-cross', []));
    expect(classifyOutput(result).kind).toBe('empty');
  });
});

describe('numParam', () => {
  it('should read numbers and numeric strings', () => {
    expect(numParam({ a: 3, b: '4.5', c: 'x' }, 'a', 0)).toBe(3);
    expect(numParam({ a: 3, b: '4.5', c: 'x' }, 'b', 0)).toBe(4.5);
    expect(numParam({ a: 3, b: '4.5', c: 'x' }, 'c', 7)).toBe(7);
  });
});
