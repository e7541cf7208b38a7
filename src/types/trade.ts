import type { SignalProposal } from './signal.js';

export interface RealizedTrade {
  readonly symbol: string;
  readonly entryTime: number;
  readonly entryFillPrice: number;
  readonly exitTime: number;
  readonly exitFillPrice: number;
  readonly size: number;
  readonly grossPnl: number;
  readonly totalCost: number;
  readonly netPnl: number;        // grossPnl - totalCost
  readonly returnPct: number;     // netPnl / (entryFillPrice * size)
  readonly holdingDays: number;
  readonly reason: string;
  readonly forcedClose: boolean;
}

export interface SkippedProposal {
  readonly proposal: SignalProposal;
  readonly reason: string;
}

export interface EquityPoint {
  readonly timestamp: number;
  readonly equity: number;
}
