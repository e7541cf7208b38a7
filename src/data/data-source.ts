import type { PriceBar } from '../types/index.js';

/**
 * 심볼별 일봉 공급자
 * start/end는 YYYY-MM-DD (양끝 포함). 심볼이 없으면 DataUnavailableError.
 * 엔진은 결과를 읽기만 하며 동시 호출될 수 있다.
 */
export interface DataSource {
  load(symbol: string, start: string, end: string): Promise<readonly PriceBar[]>;
}
