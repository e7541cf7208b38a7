/**
 * 엔진 에러 분류
 *
 * - ValidationError: 요청/제안이 잘못됨 (요청 단위면 스캔 시작 전 중단)
 * - DataUnavailableError: 심볼/테이블 없음 → 해당 심볼만 건너뜀
 * - SimulationError: 사이징/순서 위반 → 해당 트레이드만 건너뜀
 * - StrategyExecutionError: 외부 전략 호출 실패 → 심볼 실패로 기록
 */
export class BacktestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends BacktestError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.issues = issues;
  }
}

export class DataUnavailableError extends BacktestError {
  readonly symbol: string;

  constructor(symbol: string, detail?: string) {
    super(detail ? `No price data for ${symbol}: ${detail}` : `No price data for ${symbol}`);
    this.symbol = symbol;
  }
}

export class SimulationError extends BacktestError {}

export class StrategyExecutionError extends BacktestError {
  readonly strategyKey: string;

  constructor(strategyKey: string, cause: unknown) {
    super(`Strategy "${strategyKey}" failed: ${describeError(cause)}`, { cause });
    this.strategyKey = strategyKey;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}
