import { z } from 'zod';
import type { EvaluationRequest } from '../types/index.js';
import { config } from '../config.js';
import { ValidationError } from '../errors.js';
import { isDayKey } from '../utils/time.js';

const dayKeySchema = z.string().refine(isDayKey, { message: 'must be a YYYY-MM-DD date' });

const positionSizeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('percent'), pct: z.number().gt(0).lte(1) }),
  z.object({ kind: z.literal('units'), units: z.number().gt(0).finite() }),
]);

export const evaluationRequestSchema = z
  .object({
    universe: z.array(z.string().trim().min(1)).min(1, 'universe must not be empty'),
    dateRange: z.object({ start: dayKeySchema, end: dayKeySchema }),
    strategyKey: z.string().trim().min(1),
    strategyParams: z.record(z.unknown()).default({}),
    commissionRate: z.number().finite().nonnegative().default(config.engine.commissionRate),
    slippage: z.number().finite().nonnegative().default(config.engine.slippage),
    maxPositions: z.number().int().min(1).default(config.engine.maxPositions),
    positionSize: positionSizeSchema.default({ kind: 'percent', pct: config.engine.positionSizePct }),
    initialCash: z.number().finite().positive().default(config.engine.initialCash),
    concurrency: z.number().int().min(1).default(config.scan.concurrency),
  })
  .superRefine((req, ctx) => {
    if (req.dateRange.start > req.dateRange.end) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['dateRange'],
        message: `start ${req.dateRange.start} is after end ${req.dateRange.end}`,
      });
    }
    const seen = new Set<string>();
    for (const symbol of req.universe) {
      if (seen.has(symbol)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['universe'], message: `duplicate symbol ${symbol}` });
      }
      seen.add(symbol);
    }
  });

export type EvaluationRequestInput = z.input<typeof evaluationRequestSchema>;

/** 요청 검증 + 기본값 채우기. 실패하면 작업 시작 전에 ValidationError */
export function parseRequest(input: unknown): EvaluationRequest {
  const parsed = evaluationRequestSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    });
    throw new ValidationError(`Invalid request: ${issues.join(', ')}`, issues);
  }
  return parsed.data;
}
