export interface CostModelConfig {
  readonly commissionRate: number;  // 0.0003 = 0.03%, 진입/청산 각각 부과
  readonly slippage: number;        // 왕복 슬리피지 비율, 한쪽에 절반씩
}

export interface RawPrices {
  readonly entryPrice: number;
  readonly exitPrice: number;
}

export interface CostBreakdown {
  readonly entryFillPrice: number;
  readonly exitFillPrice: number;
  readonly totalCost: number;
}

const DEFAULT_CONFIG: CostModelConfig = {
  commissionRate: 0,
  slippage: 0,
};

/**
 * 원시 가격 → 체결가 변환
 * 매수는 불리하게 위로, 매도는 아래로 slippage/2 만큼 밀린다.
 * 수수료 = commissionRate × (진입체결가 + 청산체결가) × 수량
 *
 * 입력을 거부하지 않는다. 비율 0이면 항등 변환.
 */
export class CostModel {
  readonly config: CostModelConfig;

  constructor(config?: Partial<CostModelConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  entryFill(price: number): number {
    return price * (1 + this.config.slippage / 2);
  }

  exitFill(price: number): number {
    return price * (1 - this.config.slippage / 2);
  }

  commission(entryFillPrice: number, exitFillPrice: number, size: number): number {
    return this.config.commissionRate * (entryFillPrice + exitFillPrice) * size;
  }

  apply(prices: RawPrices, size: number = 1): CostBreakdown {
    const entryFillPrice = this.entryFill(prices.entryPrice);
    const exitFillPrice = this.exitFill(prices.exitPrice);
    return {
      entryFillPrice,
      exitFillPrice,
      totalCost: this.commission(entryFillPrice, exitFillPrice, size),
    };
  }
}

export function applyCosts(
  prices: RawPrices,
  commissionRate: number,
  slippage: number,
  size: number = 1,
): CostBreakdown {
  return new CostModel({ commissionRate, slippage }).apply(prices, size);
}
