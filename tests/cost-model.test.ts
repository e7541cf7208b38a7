import { describe, it, expect } from 'vitest';
import { CostModel, applyCosts } from '../src/engine/cost-model.js';

describe('CostModel', () => {
  it('should be identity when rates are zero', () => {
    const fills = applyCosts({ entryPrice: 100, exitPrice: 110 }, 0, 0, 5);
    expect(fills).toEqual({ entryFillPrice: 100, exitFillPrice: 110, totalCost: 0 });
  });

  it('should split slippage across entry and exit', () => {
    const model = new CostModel({ slippage: 0.002 });
    expect(model.entryFill(100)).toBeCloseTo(100.1, 10);
    expect(model.exitFill(110)).toBeCloseTo(109.89, 10);
  });

  it('should charge commission on both fills times size', () => {
    const fills = applyCosts({ entryPrice: 100, exitPrice: 110 }, 0.001, 0.002, 2);
    expect(fills.entryFillPrice).toBeCloseTo(100.1, 10);
    expect(fills.exitFillPrice).toBeCloseTo(109.89, 10);
    expect(fills.totalCost).toBeCloseTo(0.41998, 10);
  });

  it('should default to size 1 and zero rates', () => {
    const model = new CostModel();
    expect(model.config).toEqual({ commissionRate: 0, slippage: 0 });
    expect(model.apply({ entryPrice: 10, exitPrice: 12 }).totalCost).toBe(0);
  });
});
