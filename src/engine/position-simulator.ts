import type {
  PriceBar,
  SignalProposal,
  RealizedTrade,
  SkippedProposal,
  EquityPoint,
  PositionSize,
} from '../types/index.js';
import { CostModel } from './cost-model.js';
import { PositionStateMachine, type StateChange } from './state-machine.js';
import { SimulationError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { daysBetween } from '../utils/time.js';
import { FORCED_CLOSE_REASON, SKIPPED_OVERLAP, appendReason } from '../signals/reasons.js';

const log = createChildLogger('position-simulator');

export interface SimulatorConfig {
  readonly symbol: string;
  readonly initialCash: number;
  readonly commissionRate: number;
  readonly slippage: number;
  readonly maxPositions: number;
  readonly positionSize: PositionSize;
}

export interface SimulationResult {
  readonly symbol: string;
  readonly initialCash: number;
  readonly trades: RealizedTrade[];
  readonly skipped: SkippedProposal[];
  readonly equityCurve: EquityPoint[];
  readonly finalEquity: number;
  readonly maxOpenPositions: number;
  /** IDLE ⇄ IN_POSITION → CLOSED 전이 기록 */
  readonly stateHistory: StateChange[];
}

interface OpenPosition {
  readonly proposal: SignalProposal;
  readonly exitTime: number;
  readonly exitPrice: number;
  readonly size: number;
  readonly forced: boolean;
}

const DEFAULT_CONFIG: SimulatorConfig = {
  symbol: '',
  initialCash: 1_000_000,
  commissionRate: 0,
  slippage: 0,
  maxPositions: 1,
  positionSize: { kind: 'percent', pct: 1.0 },
};

/**
 * 심볼 1개의 제안 스트림 → 실현 트레이드 원장 + 에쿼티 커브
 *
 * - 진입 시각 순 처리. 진입 전에 exitTime <= entryTime 인 포지션부터 청산
 * - 동시 보유가 maxPositions에 도달하면 새 제안은 대기열 없이 skipped-overlap
 * - 에쿼티는 이벤트(진입/청산) 사이에서 평탄 유지 (시가 평가 없음)
 * - 청산 정보가 없는 제안은 마지막 봉 종가로 강제 청산
 */
export class PositionSimulator {
  private readonly config: SimulatorConfig;
  private readonly costs: CostModel;
  private readonly state = new PositionStateMachine();

  private open: OpenPosition[] = [];
  private trades: RealizedTrade[] = [];
  private skipped: SkippedProposal[] = [];
  private equityCurve: EquityPoint[] = [];
  private equity: number;
  private maxOpen: number = 0;

  constructor(config?: Partial<SimulatorConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.costs = new CostModel({
      commissionRate: this.config.commissionRate,
      slippage: this.config.slippage,
    });
    this.equity = this.config.initialCash;
  }

  run(proposals: readonly SignalProposal[], bars: readonly PriceBar[]): SimulationResult {
    this.reset();

    const firstBar = bars[0];
    const lastBar = bars[bars.length - 1];
    if (firstBar) {
      this.recordEquity(firstBar.timestamp);
    }

    // Array.prototype.sort는 안정 정렬 → 같은 진입 시각은 입력 순서 유지
    const ordered = [...proposals].sort((a, b) => a.entryTime - b.entryTime);

    for (const proposal of ordered) {
      this.closeUntil(proposal.entryTime);

      if (this.open.length >= this.config.maxPositions) {
        this.skip(proposal, SKIPPED_OVERLAP);
        continue;
      }

      try {
        this.openPosition(proposal, lastBar);
      } catch (err) {
        if (!(err instanceof SimulationError)) throw err;
        this.skip(proposal, err.message);
      }
    }

    this.closeUntil(Number.POSITIVE_INFINITY);
    this.state.transition('CLOSED', lastBar?.timestamp ?? 0);

    return {
      symbol: this.config.symbol,
      initialCash: this.config.initialCash,
      trades: this.trades,
      skipped: this.skipped,
      equityCurve: this.equityCurve,
      finalEquity: this.equity,
      maxOpenPositions: this.maxOpen,
      stateHistory: this.state.getHistory(),
    };
  }

  private openPosition(proposal: SignalProposal, lastBar: PriceBar | undefined): void {
    let exitTime = proposal.exitTime;
    let exitPrice = proposal.exitPrice;
    let forced = false;

    if (exitTime === undefined) {
      if (!lastBar) {
        throw new SimulationError('No price data to close an open proposal');
      }
      exitTime = lastBar.timestamp;
      exitPrice = lastBar.close;
      forced = true;
    }
    if (exitPrice === undefined) {
      throw new SimulationError(`Missing exit price for exit at ${new Date(exitTime).toISOString()}`);
    }
    if (exitTime < proposal.entryTime) {
      throw new SimulationError('Exit precedes entry');
    }

    const size = this.resolveSize(proposal);
    this.open.push({ proposal, exitTime, exitPrice, size, forced });
    this.open.sort((a, b) => a.exitTime - b.exitTime);
    this.maxOpen = Math.max(this.maxOpen, this.open.length);

    this.state.transition('IN_POSITION', proposal.entryTime);
    this.recordEquity(proposal.entryTime);
  }

  private resolveSize(proposal: SignalProposal): number {
    const entryFill = this.costs.entryFill(proposal.entryPrice);
    if (!Number.isFinite(entryFill) || entryFill <= 0) {
      throw new SimulationError(`Degenerate entry price ${proposal.entryPrice}`);
    }

    let size: number;
    if (proposal.sizeHint !== undefined && proposal.sizeHint > 0) {
      size = proposal.sizeHint;
    } else if (this.config.positionSize.kind === 'percent') {
      size = (this.config.initialCash * this.config.positionSize.pct) / entryFill;
    } else {
      size = this.config.positionSize.units;
    }

    if (!Number.isFinite(size) || size <= 0) {
      throw new SimulationError(`Position size resolved to ${size}`);
    }
    return size;
  }

  /** exitTime <= until 인 포지션을 청산 시각 순으로 정리 */
  private closeUntil(until: number): void {
    while (this.open.length > 0) {
      const next = this.open[0];
      if (!next || next.exitTime > until) break;
      this.open.shift();
      this.closePosition(next);
    }
  }

  private closePosition(pos: OpenPosition): void {
    const { proposal, size } = pos;
    const fills = this.costs.apply(
      { entryPrice: proposal.entryPrice, exitPrice: pos.exitPrice },
      size,
    );

    const grossPnl = (fills.exitFillPrice - fills.entryFillPrice) * size;
    const netPnl = grossPnl - fills.totalCost;
    const notional = fills.entryFillPrice * size;

    this.trades.push({
      symbol: this.config.symbol,
      entryTime: proposal.entryTime,
      entryFillPrice: fills.entryFillPrice,
      exitTime: pos.exitTime,
      exitFillPrice: fills.exitFillPrice,
      size,
      grossPnl,
      totalCost: fills.totalCost,
      netPnl,
      returnPct: notional > 0 ? netPnl / notional : 0,
      holdingDays: daysBetween(proposal.entryTime, pos.exitTime),
      reason: pos.forced ? appendReason(proposal.reason, FORCED_CLOSE_REASON) : proposal.reason,
      forcedClose: pos.forced || proposal.reason.includes(FORCED_CLOSE_REASON),
    });

    this.equity += netPnl;
    this.recordEquity(pos.exitTime);

    if (this.open.length === 0) {
      this.state.transition('IDLE', pos.exitTime);
    }
  }

  private skip(proposal: SignalProposal, reason: string): void {
    log.debug({ symbol: this.config.symbol, entryTime: proposal.entryTime, reason }, 'Proposal skipped');
    this.skipped.push({ proposal, reason });
  }

  /** 같은 시각 이벤트는 한 점으로 합쳐 타임스탬프를 엄격 증가로 유지 */
  private recordEquity(timestamp: number): void {
    const last = this.equityCurve[this.equityCurve.length - 1];
    if (last && timestamp <= last.timestamp) {
      this.equityCurve[this.equityCurve.length - 1] = { timestamp: last.timestamp, equity: this.equity };
      return;
    }
    this.equityCurve.push({ timestamp, equity: this.equity });
  }

  private reset(): void {
    this.state.reset();
    this.open = [];
    this.trades = [];
    this.skipped = [];
    this.equityCurve = [];
    this.equity = this.config.initialCash;
    this.maxOpen = 0;
  }
}
