export type SignalSide = 'buy' | 'sell';

/** 정규화된 트레이드 후보 (비용 반영 전) */
export interface SignalProposal {
  readonly entryTime: number;
  readonly entryPrice: number;
  readonly exitTime?: number;
  readonly exitPrice?: number;
  readonly sizeHint?: number;
  readonly score?: number;
  readonly reason: string;
}

/** 차트 마커: 전략이 찍는 점 표시 */
export interface ChartMarker {
  readonly time: string | number;
  readonly text?: string;
  readonly position?: 'belowBar' | 'aboveBar' | 'inBar';
  readonly price?: number;
  readonly score?: number;
}

/**
 * 전략 실행 결과 원본.
 * extraData는 전략마다 형식이 달라 unknown으로 받고 정규화 단계에서 검증한다.
 * 인식하는 키: trades, signals, scanCandidates (scan_candidates)
 */
export interface RunResult {
  readonly markers: readonly ChartMarker[];
  readonly overlays: readonly unknown[];
  readonly extraData: Readonly<Record<string, unknown>>;
  readonly statusMessage?: string;
}
