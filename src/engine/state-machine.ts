import { createChildLogger } from '../logger.js';

const log = createChildLogger('position-state');

export type PositionState = 'IDLE' | 'IN_POSITION' | 'CLOSED';

type StateTransition = [PositionState, PositionState];

export interface StateChange {
  readonly from: PositionState;
  readonly to: PositionState;
  /** 시뮬레이션 시각 (Unix ms) */
  readonly at: number;
}

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['IDLE', 'IN_POSITION'],
  ['IN_POSITION', 'IDLE'],     // 마지막 보유 포지션 청산
  ['IDLE', 'CLOSED'],          // 제안 스트림 소진
  ['CLOSED', 'IDLE'],          // 재사용 (reset)
];

/**
 * 심볼 1개 시뮬레이션의 포지션 상태 머신
 * 잘못된 전이 시도 시 에러
 */
export class PositionStateMachine {
  private state: PositionState = 'IDLE';
  private history: StateChange[] = [];

  get current(): PositionState {
    return this.state;
  }

  /** @param at 시뮬레이션 시각 (Unix ms) */
  transition(to: PositionState, at: number): void {
    if (this.state === to) return; // noop

    if (!this.canTransition(to)) {
      const msg = `Invalid state transition: ${this.state} → ${to}`;
      log.error({ from: this.state, to }, msg);
      throw new Error(msg);
    }

    log.trace({ from: this.state, to, at }, 'State transition');
    this.history.push({ from: this.state, to, at });
    this.state = to;
  }

  private canTransition(to: PositionState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  getHistory(): StateChange[] {
    return [...this.history];
  }

  reset(): void {
    this.state = 'IDLE';
    this.history = [];
  }
}
