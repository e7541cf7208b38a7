import type {
  BacktestReport,
  DateRange,
  PriceBar,
  RunResult,
  SignalProposal,
} from '../types/index.js';
import type { ScanCandidate, StrategyOutput } from '../signals/strategy-output.js';
import { BarIndex } from '../data/bar-index.js';
import { parseTime, toDayKey } from '../utils/time.js';

/** rank/status를 붙이기 전 심볼 1개의 스캔 점수 */
export interface ScanScore {
  readonly entryDate: string | null;
  readonly entryPrice: number | null;
  readonly score: number;
  readonly note: string;
}

export interface ScanScoreInput {
  readonly result: RunResult;
  readonly output: StrategyOutput;
  readonly candidates: readonly ScanCandidate[];
  readonly proposals: readonly SignalProposal[];
  readonly report: BacktestReport | null;
  readonly bars: readonly PriceBar[];
  readonly dateRange: DateRange;
}

export const NO_SIGNALS_NOTE = 'no signals';

/**
 * 점수 결정 순서
 * 1. scanCandidates 중 구간 내 최고 점수
 * 2. trades/signals → 가장 최근 제안 (점수 없으면 KPI returnPct)
 * 3. markers만 → 마커 개수, 마지막 마커 날짜, 마지막 종가
 * 4. 없음 → 0점
 */
export function scoreSymbol(input: ScanScoreInput): ScanScore {
  const candidate = bestCandidate(input.candidates, input.dateRange);
  if (candidate) {
    return fromCandidate(candidate, input.bars);
  }

  const { output } = input;
  if (output.kind === 'trades' || output.kind === 'signals') {
    const latest = latestProposal(input.proposals);
    if (latest) {
      return {
        entryDate: toDayKey(latest.entryTime),
        entryPrice: latest.entryPrice,
        score: latest.score ?? input.report?.kpis.returnPct ?? 0,
        note: latest.reason,
      };
    }
  }

  if (output.kind === 'markers') {
    const lastMarker = output.markers[output.markers.length - 1];
    const lastTime = lastMarker ? parseTime(lastMarker.time) : null;
    const lastBar = input.bars[input.bars.length - 1];
    return {
      entryDate: lastTime === null ? null : toDayKey(lastTime),
      entryPrice: lastBar ? lastBar.close : null,
      score: output.markers.length,
      note: `${output.markers.length} markers`,
    };
  }

  return {
    entryDate: null,
    entryPrice: null,
    score: 0,
    note: NO_SIGNALS_NOTE,
  };
}

interface DatedCandidate {
  readonly candidate: ScanCandidate;
  readonly time: number;
  readonly score: number;
}

/** 최고 점수, 동점이면 더 최근 날짜 */
function bestCandidate(candidates: readonly ScanCandidate[], range: DateRange): DatedCandidate | null {
  let best: DatedCandidate | null = null;
  for (const candidate of candidates) {
    if (candidate.time === undefined) continue;
    const time = parseTime(candidate.time);
    if (time === null) continue;
    const day = toDayKey(time);
    if (day < range.start || day > range.end) continue;

    const score = candidate.score ?? 0;
    if (!best || score > best.score || (score === best.score && time > best.time)) {
      best = { candidate, time, score };
    }
  }
  return best;
}

function fromCandidate(dated: DatedCandidate, bars: readonly PriceBar[]): ScanScore {
  const bar = new BarIndex(bars).find(dated.time);
  return {
    entryDate: toDayKey(dated.time),
    entryPrice: dated.candidate.price ?? bar?.close ?? null,
    score: dated.score,
    note: dated.candidate.note ?? 'scan candidate',
  };
}

function latestProposal(proposals: readonly SignalProposal[]): SignalProposal | undefined {
  let latest: SignalProposal | undefined;
  for (const p of proposals) {
    if (!latest || p.entryTime >= latest.entryTime) latest = p;
  }
  return latest;
}
