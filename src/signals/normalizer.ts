import type { ChartMarker, PriceBar, RunResult, SignalProposal, SignalSide } from '../types/index.js';
import { BarIndex } from '../data/bar-index.js';
import { ValidationError } from '../errors.js';
import { parseTime, toDayKey } from '../utils/time.js';
import { FORCED_CLOSE_REASON, MARKER_PAIR_REASON, appendReason } from './reasons.js';
import {
  classifyOutput,
  type RawSignal,
  type RawTrade,
  type StrategyOutput,
} from './strategy-output.js';

export interface NormalizeOptions {
  /** 마커 전용 전략: 진입 후 N봉 뒤 종가 청산 */
  readonly holdingBars: number;
  /** 0보다 크면 고정 보유 대신 트레일링 스톱 (0.05 = 고점 대비 5%) */
  readonly trailingStopPct: number;
}

const DEFAULT_OPTIONS: NormalizeOptions = {
  holdingBars: 5,
  trailingStopPct: 0,
};

interface Anchor {
  readonly index: number;
  readonly bar: PriceBar;
}

/**
 * 전략 원본 출력 → 시간순 SignalProposal[]
 *
 * - trades: 그대로 매핑 (가격 누락 시 해당일 종가)
 * - signals: buy/sell 시간순 페어링, 남은 buy는 마지막 봉 종가로 강제 청산
 * - markers: buy/sell 마커 페어링, 짝 없는 buy는 고정 보유 기간 / 트레일링 스톱 근사 (reason에 approximation 명시)
 *
 * 참조 시각에 해당하는 봉이 없으면 ValidationError
 */
export function normalize(
  result: RunResult,
  bars: readonly PriceBar[],
  options?: Partial<NormalizeOptions>,
): SignalProposal[] {
  return normalizeOutput(classifyOutput(result), bars, options);
}

export function normalizeOutput(
  output: StrategyOutput,
  bars: readonly PriceBar[],
  options?: Partial<NormalizeOptions>,
): SignalProposal[] {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  const index = new BarIndex(bars);
  return buildProposals(output, index, opts).sort((a, b) => a.entryTime - b.entryTime);
}

function buildProposals(
  output: StrategyOutput,
  index: BarIndex,
  opts: NormalizeOptions,
): SignalProposal[] {
  switch (output.kind) {
    case 'trades':
      return output.trades.map((t, i) => fromTrade(t, i, index));
    case 'signals':
      return pairSignals(output.signals, index);
    case 'markers':
      return fromMarkers(output.markers, index, opts);
    case 'empty':
      return [];
  }
}

function fromTrade(trade: RawTrade, i: number, index: BarIndex): SignalProposal {
  const label = `trades[${i}]`;
  const entry = anchorAt(trade.entryTime, index, label);

  let exitTime: number | undefined;
  let exitPrice: number | undefined;
  if (trade.exitTime !== undefined) {
    const exit = anchorAt(trade.exitTime, index, label);
    if (exit.bar.timestamp < entry.bar.timestamp) {
      throw new ValidationError(`${label}: exit ${toDayKey(exit.bar.timestamp)} precedes entry ${toDayKey(entry.bar.timestamp)}`);
    }
    exitTime = exit.bar.timestamp;
    exitPrice = trade.exitPrice ?? exit.bar.close;
  } else if (trade.exitPrice !== undefined) {
    throw new ValidationError(`${label}: exit price given without exit time`);
  }

  return {
    entryTime: entry.bar.timestamp,
    entryPrice: trade.entryPrice ?? entry.bar.close,
    exitTime,
    exitPrice,
    sizeHint: positiveOrUndefined(trade.size),
    score: trade.score,
    reason: trade.reason ?? 'strategy-trade',
  };
}

function pairSignals(signals: readonly RawSignal[], index: BarIndex): SignalProposal[] {
  const anchored = signals
    .map((s, i) => ({ signal: s, anchor: anchorAt(s.time, index, `signals[${i}]`) }))
    .sort((a, b) => a.anchor.bar.timestamp - b.anchor.bar.timestamp);

  const proposals: SignalProposal[] = [];
  let pending: { signal: RawSignal; anchor: Anchor } | null = null;

  for (const item of anchored) {
    if (item.signal.side === 'buy') {
      // 보유 중 추가 buy는 무시 (첫 buy 유지)
      if (!pending) pending = item;
      continue;
    }
    if (!pending) continue; // 미보유 상태의 sell은 무시

    proposals.push({
      entryTime: pending.anchor.bar.timestamp,
      entryPrice: pending.signal.price ?? pending.anchor.bar.close,
      exitTime: item.anchor.bar.timestamp,
      exitPrice: item.signal.price ?? item.anchor.bar.close,
      sizeHint: positiveOrUndefined(pending.signal.size),
      score: pending.signal.score,
      reason: pending.signal.reason ?? item.signal.reason ?? 'signal-pair',
    });
    pending = null;
  }

  const last = index.last;
  if (pending && last) {
    proposals.push({
      entryTime: pending.anchor.bar.timestamp,
      entryPrice: pending.signal.price ?? pending.anchor.bar.close,
      exitTime: last.timestamp,
      exitPrice: last.close,
      sizeHint: positiveOrUndefined(pending.signal.size),
      score: pending.signal.score,
      reason: appendReason(pending.signal.reason ?? '', FORCED_CLOSE_REASON),
    });
  }

  return proposals;
}

interface AnchoredMarker {
  readonly marker: ChartMarker;
  readonly side: SignalSide;
  readonly anchor: Anchor;
}

/**
 * buy 마커 다음의 첫 sell 마커가 청산 시점
 * 짝이 없는 buy (다음 buy가 먼저 오거나 끝까지 sell 없음)만 근사 청산
 */
function fromMarkers(
  markers: readonly ChartMarker[],
  index: BarIndex,
  opts: NormalizeOptions,
): SignalProposal[] {
  const anchored: AnchoredMarker[] = markers
    .map((marker, i) => ({
      marker,
      side: inferMarkerSide(marker) ?? 'buy',
      anchor: anchorAt(marker.time, index, `markers[${i}]`),
    }))
    .sort((a, b) => a.anchor.bar.timestamp - b.anchor.bar.timestamp);

  const proposals: SignalProposal[] = [];
  let pending: AnchoredMarker | null = null;

  for (const item of anchored) {
    if (item.side === 'sell') {
      if (pending) {
        proposals.push(pairMarkers(pending, item));
        pending = null;
      }
      continue; // 미보유 상태의 sell은 무시
    }
    if (pending) proposals.push(approximateExit(pending, index, opts));
    pending = item;
  }
  if (pending) proposals.push(approximateExit(pending, index, opts));

  return proposals;
}

function pairMarkers(buy: AnchoredMarker, sell: AnchoredMarker): SignalProposal {
  return {
    entryTime: buy.anchor.bar.timestamp,
    entryPrice: buy.marker.price ?? buy.anchor.bar.close,
    exitTime: sell.anchor.bar.timestamp,
    exitPrice: sell.marker.price ?? sell.anchor.bar.close,
    score: buy.marker.score,
    reason: MARKER_PAIR_REASON,
  };
}

function approximateExit(buy: AnchoredMarker, index: BarIndex, opts: NormalizeOptions): SignalProposal {
  const entry = buy.anchor;
  const entryPrice = buy.marker.price ?? entry.bar.close;
  const exit = opts.trailingStopPct > 0
    ? trailingStopExit(entry, entryPrice, index, opts.trailingStopPct)
    : fixedHoldingExit(entry, index, opts.holdingBars);

  return {
    entryTime: entry.bar.timestamp,
    entryPrice,
    exitTime: exit.time,
    exitPrice: exit.price,
    score: buy.marker.score,
    reason: exit.reason,
  };
}

interface MarkerExit {
  readonly time: number;
  readonly price: number;
  readonly reason: string;
}

function fixedHoldingExit(entry: Anchor, index: BarIndex, holdingBars: number): MarkerExit {
  const label = `fixed-holding-${holdingBars}-bars (approximation)`;
  const target = entry.index + Math.max(0, Math.floor(holdingBars));
  const exitBar = index.barAt(target);
  if (exitBar) {
    return { time: exitBar.timestamp, price: exitBar.close, reason: label };
  }
  return rangeEndExit(entry, index, label);
}

/**
 * 진입 다음 봉부터: 직전까지의 고점 대비 pct 하락선에 저가가 닿으면 청산
 * 갭 하락으로 시가가 이미 스톱 아래면 시가 체결
 */
function trailingStopExit(entry: Anchor, entryPrice: number, index: BarIndex, pct: number): MarkerExit {
  const label = `trailing-stop-${Number((pct * 100).toFixed(4))}% (approximation)`;
  let highWaterMark = Math.max(entryPrice, entry.bar.high);

  for (let i = entry.index + 1; i < index.length; i++) {
    const bar = index.barAt(i);
    if (!bar) break;
    const stop = highWaterMark * (1 - pct);
    if (bar.low <= stop) {
      return { time: bar.timestamp, price: bar.open <= stop ? bar.open : stop, reason: label };
    }
    if (bar.high > highWaterMark) highWaterMark = bar.high;
  }

  return rangeEndExit(entry, index, label);
}

function rangeEndExit(entry: Anchor, index: BarIndex, label: string): MarkerExit {
  const last = index.last ?? entry.bar;
  return { time: last.timestamp, price: last.close, reason: appendReason(label, FORCED_CLOSE_REASON) };
}

export function inferMarkerSide(marker: ChartMarker): SignalSide | null {
  const text = (marker.text ?? '').toUpperCase();
  if (text.includes('BUY') || marker.position === 'belowBar') return 'buy';
  if (text.includes('SELL') || marker.position === 'aboveBar') return 'sell';
  return null;
}

function anchorAt(value: string | number, index: BarIndex, label: string): Anchor {
  const ms = parseTime(value);
  if (ms === null) {
    throw new ValidationError(`${label}: unparseable time "${value}"`);
  }
  const i = index.indexOf(ms);
  const bar = i === undefined ? undefined : index.barAt(i);
  if (i === undefined || !bar) {
    throw new ValidationError(`${label}: no price bar for ${toDayKey(ms)}`);
  }
  return { index: i, bar };
}

function positiveOrUndefined(value: number | undefined): number | undefined {
  return value !== undefined && value > 0 ? value : undefined;
}
