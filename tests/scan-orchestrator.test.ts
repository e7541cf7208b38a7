import { describe, it, expect, vi } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { ScanOrchestrator } from '../src/scan/scan-orchestrator.js';
import { StrategyRegistry } from '../src/strategy/registry.js';
import type { StrategyHandler, StrategyRunner } from '../src/strategy/strategy.js';
import type { DataSource } from '../src/data/data-source.js';
import { filterRange } from '../src/data/csv-source.js';
import { DataUnavailableError, ValidationError } from '../src/errors.js';
import type { ChartMarker, PriceBar, RunResult, ScanProgress } from '../src/types/index.js';
import { closeBars } from './helpers/bars.js';

// 2024-01-01 ~ 2024-01-10, 종가 100..109
const bars = closeBars('2024-01-01', [100, 101, 102, 103, 104, 105, 106, 107, 108, 109]);

function memorySource(symbols: readonly string[], delays: Record<string, number> = {}) {
  const load = vi.fn(async (symbol: string, start: string, end: string): Promise<readonly PriceBar[]> => {
    const delay = delays[symbol];
    if (delay !== undefined) await sleep(delay);
    if (!symbols.includes(symbol)) throw new DataUnavailableError(symbol);
    return filterRange(bars, start, end);
  });
  const source: DataSource = { load };
  return { source, load };
}

function markers(...days: string[]): ChartMarker[] {
  return days.map((time) => ({ time, text: 'BUY' }));
}

function output(extraData: Record<string, unknown>, markerList: ChartMarker[] = []): RunResult {
  return { markers: markerList, overlays: [], extraData };
}

/** 심볼별로 정해진 출력을 돌려주는 전략 */
function registryWith(outputs: Record<string, RunResult | Error>): StrategyRegistry {
  const handler: StrategyHandler = (context) => {
    const symbol = context.symbols[0] ?? '';
    const out = outputs[symbol] ?? output({});
    if (out instanceof Error) throw out;
    return out;
  };
  const registry = new StrategyRegistry();
  registry.register({ key: 'test', title: 'Test', description: 'fixed outputs', handler });
  return registry;
}

function request(universe: string[], extra: Record<string, unknown> = {}) {
  return {
    universe,
    dateRange: { start: '2024-01-01', end: '2024-01-10' },
    strategyKey: 'test',
    commissionRate: 0,
    slippage: 0,
    initialCash: 1000,
    concurrency: 2,
    ...extra,
  };
}

const options = { normalize: { holdingBars: 2, trailingStopPct: 0 } };

describe('ScanOrchestrator.run', () => {
  it('should score marker-only output by marker count', async () => {
    const { source } = memorySource(['CCC']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      CCC: output({}, markers('2024-01-02', '2024-01-04', '2024-01-06')),
    }), options);

    const outcome = await orchestrator.run(request(['CCC']));

    expect(outcome.results).toHaveLength(1);
    const [c] = outcome.results;
    expect(c).toMatchObject({
      rank: 1,
      symbol: 'CCC',
      status: 'ok',
      entryDate: '2024-01-06',
      entryPrice: 109,
      score: 3,
      note: '3 markers',
    });
    expect(c?.kpis?.tradeCount).toBe(3);
    expect(outcome.cancelled).toBe(false);
    expect(outcome.failures).toEqual([]);
  });

  it('should order by score with ties broken by symbol', async () => {
    const { source } = memorySource(['CCC', 'AAA', 'BBB', 'DDD']);
    const two = output({}, markers('2024-01-02', '2024-01-05'));
    const orchestrator = new ScanOrchestrator(source, registryWith({
      CCC: two,
      AAA: two,
      BBB: two,
      DDD: output({}, markers('2024-01-02', '2024-01-05', '2024-01-08')),
    }), options);

    const outcome = await orchestrator.run(request(['CCC', 'AAA', 'BBB', 'DDD']));
    expect(outcome.results.map((r) => [r.rank, r.symbol])).toEqual([
      [1, 'DDD'],
      [2, 'AAA'],
      [3, 'BBB'],
      [4, 'CCC'],
    ]);
  });

  it('should score trades by strategy score or return', async () => {
    const { source } = memorySource(['AAA', 'BBB']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      AAA: output({ trades: [{ entryTime: '2024-01-02', exitTime: '2024-01-04', score: 0.7, reason: 'scored' }] }),
      BBB: output({ trades: [{ entryTime: '2024-01-02', exitTime: '2024-01-04' }] }),
    }), options);

    const outcome = await orchestrator.run(request(['AAA', 'BBB']));
    const [first, second] = outcome.results;

    expect(first).toMatchObject({ symbol: 'AAA', score: 0.7, entryDate: '2024-01-02', entryPrice: 101, note: 'scored' });
    expect(second?.symbol).toBe('BBB');
    // 1000 / 101 주 × (103 - 101) / 1000
    expect(second?.score).toBeCloseTo(2 / 101, 10);
    expect(second?.score).toBe(second?.kpis?.returnPct);
  });

  it('should use the latest paired signal', async () => {
    const { source } = memorySource(['AAA']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      AAA: output({
        signals: [
          { time: '2024-01-02', side: 'buy', score: 0.2 },
          { time: '2024-01-03', side: 'sell' },
          { time: '2024-01-06', side: 'buy', score: 0.9 },
        ],
      }),
    }), options);

    const [r] = (await orchestrator.run(request(['AAA']))).results;
    expect(r).toMatchObject({ entryDate: '2024-01-06', entryPrice: 105, score: 0.9 });
    expect(r?.kpis?.tradeCount).toBe(2);
  });

  it('should prefer the best scan candidate inside the range', async () => {
    const { source } = memorySource(['AAA']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      AAA: output({
        scanCandidates: [
          { date: '2023-12-01', score: 9 },
          { date: '2024-01-03', score: 0.4 },
          { date: '2024-01-05', score: 0.6, note: 'best' },
        ],
      }, markers('2024-01-03', '2024-01-05')),
    }), options);

    const [r] = (await orchestrator.run(request(['AAA']))).results;
    expect(r).toMatchObject({ entryDate: '2024-01-05', entryPrice: 104, score: 0.6, note: 'best' });
  });

  it('should skip scan candidates with unrepresentable dates', async () => {
    const { source } = memorySource(['AAA']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      AAA: output({
        scanCandidates: [
          { date: 1e16, score: 99 },
          { date: '2024-01-04', score: 0.5 },
        ],
      }),
    }), options);

    const outcome = await orchestrator.run(request(['AAA']));
    expect(outcome.failures).toEqual([]);
    expect(outcome.results[0]).toMatchObject({ status: 'ok', entryDate: '2024-01-04', entryPrice: 103, score: 0.5 });
  });

  it('should give zero score to symbols without output', async () => {
    const { source } = memorySource(['AAA']);
    const orchestrator = new ScanOrchestrator(source, registryWith({}), options);

    const [r] = (await orchestrator.run(request(['AAA']))).results;
    expect(r).toEqual({
      rank: 1,
      symbol: 'AAA',
      status: 'ok',
      entryDate: null,
      entryPrice: null,
      score: 0,
      note: 'no signals',
      kpis: undefined,
    });
  });

  it('should report per-symbol failures without aborting the scan', async () => {
    const { source } = memorySource(['AAA', 'BOOM', 'BAD']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      AAA: output({}, markers('2024-01-02')),
      BOOM: new Error('kaput'),
      BAD: output({ trades: [{ entryTime: '2023-06-01' }] }),
    }), options);

    const outcome = await orchestrator.run(request(['AAA', 'BOOM', 'MISSING', 'BAD']));

    expect(outcome.results.map((r) => [r.rank, r.symbol, r.status, r.score, r.note])).toEqual([
      [1, 'AAA', 'ok', 1, '1 markers'],
      [2, 'BOOM', 'failed', 0, 'Strategy "test" failed: kaput'],
    ]);
    expect(outcome.failures).toEqual([
      { symbol: 'BOOM', kind: 'strategy', reason: 'Strategy "test" failed: kaput' },
      { symbol: 'MISSING', kind: 'data-unavailable', reason: 'No price data for MISSING' },
      { symbol: 'BAD', kind: 'validation', reason: 'trades[0]: no price bar for 2023-06-01' },
    ]);
  });

  it('should treat an empty date window as unavailable data', async () => {
    const { source } = memorySource(['AAA']);
    const orchestrator = new ScanOrchestrator(source, registryWith({}), options);

    const outcome = await orchestrator.run(request(['AAA'], { dateRange: { start: '2025-01-01', end: '2025-01-31' } }));
    expect(outcome.results).toEqual([]);
    expect(outcome.failures).toEqual([{
      symbol: 'AAA',
      kind: 'data-unavailable',
      reason: 'No price data for AAA: no bars between 2025-01-01 and 2025-01-31',
    }]);
  });

  it('should wrap failures from a bare runner', async () => {
    const { source } = memorySource(['AAA']);
    const runner: StrategyRunner = {
      run: async () => {
        throw new TypeError('bad handle');
      },
    };
    const outcome = await new ScanOrchestrator(source, runner, options).run(request(['AAA']));
    expect(outcome.failures).toEqual([{ symbol: 'AAA', kind: 'strategy', reason: 'Strategy "test" failed: bad handle' }]);
  });

  it('should reject an invalid request before loading anything', async () => {
    const { source, load } = memorySource(['AAA']);
    const orchestrator = new ScanOrchestrator(source, registryWith({}), options);

    await expect(orchestrator.run(request(['AAA'], { strategyKey: 'nope' })))
      .rejects.toThrow(new ValidationError('Strategy "nope" is not available for scan'));
    await expect(orchestrator.run(request([]))).rejects.toBeInstanceOf(ValidationError);
    expect(load).not.toHaveBeenCalled();
  });

  it('should stop after cancellation and keep finished symbols', async () => {
    const universe = ['AAA', 'BBB', 'CCC', 'DDD', 'EEE'];
    const { source, load } = memorySource(universe);
    const orchestrator = new ScanOrchestrator(source, registryWith({}), options);
    const controller = new AbortController();
    const progress: ScanProgress[] = [];

    const outcome = await orchestrator.run(
      request(universe, { concurrency: 1 }),
      (p) => {
        progress.push(p);
        if (p.completed === 2) controller.abort();
      },
      controller.signal,
    );

    expect(outcome.cancelled).toBe(true);
    expect(outcome.results.map((r) => r.symbol)).toEqual(['AAA', 'BBB']);
    expect(progress).toEqual([
      { completed: 1, total: 5, symbol: 'AAA', status: 'ok' },
      { completed: 2, total: 5, symbol: 'BBB', status: 'ok' },
    ]);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('should not depend on completion order', async () => {
    const universe = ['AAA', 'BBB', 'CCC'];
    const outputs = {
      AAA: output({}, markers('2024-01-02')),
      BBB: output({}, markers('2024-01-02', '2024-01-03')),
      CCC: output({}, markers('2024-01-04')),
    };
    const slow = memorySource(universe, { AAA: 20, BBB: 0, CCC: 10 });
    const serial = memorySource(universe);

    const parallel = await new ScanOrchestrator(slow.source, registryWith(outputs), options)
      .run(request(universe, { concurrency: 3 }));
    const sequential = await new ScanOrchestrator(serial.source, registryWith(outputs), options)
      .run(request(universe, { concurrency: 1 }));

    expect(parallel).toEqual(sequential);
  });

  it('should be idempotent', async () => {
    const { source } = memorySource(['AAA', 'BBB']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      AAA: output({ trades: [{ entryTime: '2024-01-02', exitTime: '2024-01-05' }] }),
      BBB: output({}, markers('2024-01-03')),
    }), options);

    const first = await orchestrator.run(request(['AAA', 'BBB']));
    const second = await orchestrator.run(request(['AAA', 'BBB']));
    expect(second).toEqual(first);
  });

  it('should keep going when a progress callback throws', async () => {
    const { source } = memorySource(['AAA', 'BBB']);
    const orchestrator = new ScanOrchestrator(source, registryWith({}), options);

    const outcome = await orchestrator.run(request(['AAA', 'BBB']), () => {
      throw new Error('ui gone');
    });
    expect(outcome.results).toHaveLength(2);
  });
});

describe('ScanOrchestrator.backtest', () => {
  it('should report every evaluated symbol and summarize the universe', async () => {
    const { source } = memorySource(['AAA', 'BBB', 'CCC']);
    const orchestrator = new ScanOrchestrator(source, registryWith({
      AAA: output({ trades: [{ entryTime: '2024-01-02', exitTime: '2024-01-04' }] }),
      BBB: output({ trades: [{ entryTime: '2024-01-06', entryPrice: 105, exitTime: '2024-01-07', exitPrice: 100 }] }),
    }), options);

    const outcome = await orchestrator.backtest(request(['AAA', 'BBB', 'CCC', 'MISSING']));

    expect(outcome.reports.map((r) => [r.symbol, r.kpis.tradeCount])).toEqual([
      ['AAA', 1],
      ['BBB', 1],
      ['CCC', 0],
    ]);
    expect(outcome.failures.map((f) => f.symbol)).toEqual(['MISSING']);
    expect(outcome.summary.instrumentCount).toBe(3);
    expect(outcome.summary.totalTrades).toBe(2);
    expect(outcome.summary.totalWins).toBe(1);
    expect(outcome.summary.winRate).toBe(0.5);
    expect(outcome.summary.ranked.map((e) => e.symbol)).toEqual(['AAA', 'CCC', 'BBB']);
  });

  it('should reject strategies disabled for backtests', async () => {
    const { source } = memorySource(['AAA']);
    const registry = new StrategyRegistry();
    registry.register({
      key: 'scan-only',
      title: 'Scan only',
      description: 'no backtests',
      handler: () => output({}),
      modes: { backtest: false },
    });

    await expect(new ScanOrchestrator(source, registry).backtest(request(['AAA'], { strategyKey: 'scan-only' })))
      .rejects.toThrow('Strategy "scan-only" is not available for backtest');
  });
});
