/** 일봉 1개. DataSource가 timestamp 오름차순, 심볼 내 유일하게 제공 */
export interface PriceBar {
  readonly timestamp: number;   // Unix ms (UTC)
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}
