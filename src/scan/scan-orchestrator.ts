import type {
  BacktestOutcome,
  BacktestReport,
  EvaluationRequest,
  FailureKind,
  KpiKey,
  PriceBar,
  ProgressCallback,
  RunResult,
  ScanOutcome,
  ScanProgress,
  ScanResult,
  SymbolFailure,
  UniverseSummary,
} from '../types/index.js';
import type { DataSource } from '../data/data-source.js';
import type { RunMode, StrategyRunner } from '../strategy/strategy.js';
import type { NormalizeOptions } from '../signals/normalizer.js';
import type { KpiOptions } from '../report/metrics.js';
import { normalizeOutput } from '../signals/normalizer.js';
import { classifyOutput, extractScanCandidates } from '../signals/strategy-output.js';
import { PositionSimulator } from '../engine/position-simulator.js';
import { buildReport, compareDesc, compareSymbols, summarizeUniverse } from '../report/metrics.js';
import { parseRequest } from './request.js';
import { runPool } from './worker-pool.js';
import { type ScanScore, scoreSymbol } from './scan-payload.js';
import { config } from '../config.js';
import {
  DataUnavailableError,
  StrategyExecutionError,
  ValidationError,
  describeError,
} from '../errors.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('scan');

export interface OrchestratorOptions {
  /** 마커 전용 전략의 청산 근사 규칙 */
  readonly normalize?: Partial<NormalizeOptions>;
  readonly kpi?: Partial<KpiOptions>;
  readonly rankBy?: KpiKey;
  readonly topN?: number;
}

type SymbolEvaluation =
  | {
      readonly status: 'ok';
      readonly symbol: string;
      readonly score: ScanScore;
      readonly report: BacktestReport | null;
    }
  | {
      readonly status: 'failed';
      readonly symbol: string;
      readonly failure: SymbolFailure;
      /** 전략 실패는 스캔 결과에도 failed 행으로 남긴다 */
      readonly listed: boolean;
    };

interface PoolRun {
  readonly request: EvaluationRequest;
  readonly evaluations: readonly SymbolEvaluation[];
  readonly cancelled: boolean;
}

/**
 * 유니버스 스캔 / 백테스트 오케스트레이터
 *
 * 심볼별 파이프라인: load → strategy → normalize → simulate → report
 * 심볼 단위 실패는 failures 목록으로만 보고되고 밖으로 던지지 않는다.
 * 요청 자체가 잘못되면 작업 시작 전에 ValidationError.
 */
export class ScanOrchestrator {
  private readonly dataSource: DataSource;
  private readonly runner: StrategyRunner;
  private readonly normalizeOptions: NormalizeOptions;
  private readonly kpiOptions: Partial<KpiOptions>;
  private readonly rankBy: KpiKey;
  private readonly topN: number;

  constructor(dataSource: DataSource, runner: StrategyRunner, options: OrchestratorOptions = {}) {
    this.dataSource = dataSource;
    this.runner = runner;
    this.normalizeOptions = {
      holdingBars: config.markers.holdingBars,
      trailingStopPct: config.markers.trailingStopPct,
      ...options.normalize,
    };
    this.kpiOptions = { annualizationDays: config.engine.annualizationDays, ...options.kpi };
    this.rankBy = options.rankBy ?? 'returnPct';
    this.topN = options.topN ?? config.scan.topN;
  }

  async run(input: unknown, onProgress?: ProgressCallback, signal?: AbortSignal): Promise<ScanOutcome> {
    const { evaluations, cancelled } = await this.execute('scan', input, onProgress, signal);

    const results: ScanResult[] = [];
    for (const ev of evaluations) {
      if (ev.status === 'ok') {
        results.push({
          rank: 0,
          symbol: ev.symbol,
          status: 'ok',
          entryDate: ev.score.entryDate,
          entryPrice: ev.score.entryPrice,
          score: ev.score.score,
          note: ev.score.note,
          kpis: ev.report?.kpis,
        });
      } else if (ev.listed) {
        results.push({
          rank: 0,
          symbol: ev.symbol,
          status: 'failed',
          entryDate: null,
          entryPrice: null,
          score: 0,
          note: ev.failure.reason,
        });
      }
    }

    const ranked = results
      .sort((a, b) => compareDesc(a.score, b.score) || compareSymbols(a.symbol, b.symbol))
      .map((r, i) => ({ ...r, rank: i + 1 }));

    return {
      results: ranked,
      failures: collectFailures(evaluations),
      cancelled,
      summary: this.summarize(reportsOf(evaluations)),
    };
  }

  async backtest(input: unknown, onProgress?: ProgressCallback, signal?: AbortSignal): Promise<BacktestOutcome> {
    const { evaluations, cancelled } = await this.execute('backtest', input, onProgress, signal);
    const reports = reportsOf(evaluations);

    return {
      reports,
      failures: collectFailures(evaluations),
      cancelled,
      summary: this.summarize(reports),
    };
  }

  private async execute(
    mode: RunMode,
    input: unknown,
    onProgress: ProgressCallback | undefined,
    signal: AbortSignal | undefined,
  ): Promise<PoolRun> {
    const request = parseRequest(input);
    if (this.runner.supports && !this.runner.supports(request.strategyKey, mode)) {
      throw new ValidationError(`Strategy "${request.strategyKey}" is not available for ${mode}`);
    }

    const total = request.universe.length;
    const startedAt = Date.now();
    let completed = 0;
    log.info(
      { mode, strategy: request.strategyKey, symbols: total, concurrency: request.concurrency },
      'Evaluation started',
    );

    const pool = await runPool(
      request.universe,
      request.concurrency,
      (symbol) => this.evaluateSymbol(symbol, request, mode),
      {
        signal,
        onSettled: (symbol, ev) => {
          completed++;
          this.reportProgress(onProgress, { completed, total, symbol, status: ev.status });
        },
      },
    );

    const evaluations = pool.results.filter((ev): ev is SymbolEvaluation => ev !== undefined);
    const failed = evaluations.filter((ev) => ev.status === 'failed').length;
    log.info(
      {
        mode,
        completed,
        failed,
        cancelled: pool.cancelled,
        durationMs: Date.now() - startedAt,
      },
      pool.cancelled ? 'Evaluation cancelled' : 'Evaluation finished',
    );

    return { request, evaluations, cancelled: pool.cancelled };
  }

  private async evaluateSymbol(
    symbol: string,
    request: EvaluationRequest,
    mode: RunMode,
  ): Promise<SymbolEvaluation> {
    try {
      const bars = await this.dataSource.load(symbol, request.dateRange.start, request.dateRange.end);
      if (bars.length === 0) {
        throw new DataUnavailableError(symbol, `no bars between ${request.dateRange.start} and ${request.dateRange.end}`);
      }
      return await this.pipeline(symbol, bars, request, mode);
    } catch (err) {
      const kind = classifyFailure(err);
      const reason = describeError(err);
      if (kind === 'internal') {
        log.error({ symbol, err }, 'Unexpected failure while evaluating symbol');
      } else {
        log.warn({ symbol, kind, reason }, 'Symbol skipped');
      }
      return {
        status: 'failed',
        symbol,
        failure: { symbol, kind, reason },
        listed: kind === 'strategy',
      };
    }
  }

  private async pipeline(
    symbol: string,
    bars: readonly PriceBar[],
    request: EvaluationRequest,
    mode: RunMode,
  ): Promise<SymbolEvaluation> {
    let result: RunResult;
    try {
      result = await this.runner.run({
        strategyKey: request.strategyKey,
        symbols: [symbol],
        dateRange: request.dateRange,
        mode,
        params: request.strategyParams,
        series: new Map([[symbol, bars]]),
      });
    } catch (err) {
      if (err instanceof StrategyExecutionError) throw err;
      throw new StrategyExecutionError(request.strategyKey, err);
    }

    const output = classifyOutput(result);
    const proposals = normalizeOutput(output, bars, this.normalizeOptions);

    let report: BacktestReport | null = null;
    if (proposals.length > 0 || mode === 'backtest') {
      const simulation = new PositionSimulator({
        symbol,
        initialCash: request.initialCash,
        commissionRate: request.commissionRate,
        slippage: request.slippage,
        maxPositions: request.maxPositions,
        positionSize: request.positionSize,
      }).run(proposals, bars);
      report = buildReport(simulation, this.kpiOptions);
    }

    const score = scoreSymbol({
      result,
      output,
      candidates: mode === 'scan' ? extractScanCandidates(result) : [],
      proposals,
      report,
      bars,
      dateRange: request.dateRange,
    });

    return { status: 'ok', symbol, score, report };
  }

  private reportProgress(
    onProgress: ProgressCallback | undefined,
    progress: ScanProgress,
  ): void {
    if (!onProgress) return;
    try {
      onProgress(progress);
    } catch (err) {
      log.warn({ err, symbol: progress.symbol }, 'Progress callback threw');
    }
  }

  private summarize(reports: readonly BacktestReport[]): UniverseSummary {
    return summarizeUniverse(
      reports.map((r) => ({ symbol: r.symbol, kpis: r.kpis })),
      { rankBy: this.rankBy, topN: this.topN },
    );
  }
}

function classifyFailure(err: unknown): FailureKind {
  if (err instanceof DataUnavailableError) return 'data-unavailable';
  if (err instanceof StrategyExecutionError) return 'strategy';
  if (err instanceof ValidationError) return 'validation';
  return 'internal';
}

function reportsOf(evaluations: readonly SymbolEvaluation[]): BacktestReport[] {
  return evaluations.flatMap((ev) => (ev.status === 'ok' && ev.report ? [ev.report] : []));
}

function collectFailures(evaluations: readonly SymbolEvaluation[]): SymbolFailure[] {
  return evaluations.flatMap((ev) => (ev.status === 'failed' ? [ev.failure] : []));
}
