import { z } from 'zod';
import type { ChartMarker, RunResult, SignalSide } from '../types/index.js';
import { ValidationError } from '../errors.js';

// 전략 extraData는 형식이 느슨하다: camelCase/snake_case, 숫자 문자열, null 모두 허용

const timeValueSchema = z.union([z.string(), z.number()]);

const numericSchema = z.union([
  z.number(),
  z.string().trim().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/).transform(Number),
]);

const textSchema = z.union([z.string(), z.number()]).transform(String);

export const rawTradeSchema = z
  .object({
    entryTime: timeValueSchema.nullish(),
    entry_time: timeValueSchema.nullish(),
    entryPrice: numericSchema.nullish(),
    entry_price: numericSchema.nullish(),
    exitTime: timeValueSchema.nullish(),
    exit_time: timeValueSchema.nullish(),
    exitPrice: numericSchema.nullish(),
    exit_price: numericSchema.nullish(),
    size: numericSchema.nullish(),
    shares: numericSchema.nullish(),
    quantity: numericSchema.nullish(),
    score: numericSchema.nullish(),
    reason: textSchema.nullish(),
    note: textSchema.nullish(),
  })
  .transform((r, ctx) => {
    const entryTime = r.entryTime ?? r.entry_time;
    if (entryTime == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'entry time is required' });
      return z.NEVER;
    }
    return {
      entryTime,
      entryPrice: r.entryPrice ?? r.entry_price ?? undefined,
      exitTime: r.exitTime ?? r.exit_time ?? undefined,
      exitPrice: r.exitPrice ?? r.exit_price ?? undefined,
      size: r.size ?? r.shares ?? r.quantity ?? undefined,
      score: r.score ?? undefined,
      reason: r.reason ?? r.note ?? undefined,
    };
  });

export type RawTrade = z.output<typeof rawTradeSchema>;

const BUY_WORDS = new Set(['buy', 'long', 'long_entry', 'entry', 'b']);
const SELL_WORDS = new Set(['sell', 'exit', 'long_exit', 'close', 's']);

export const rawSignalSchema = z
  .object({
    time: timeValueSchema.nullish(),
    date: timeValueSchema.nullish(),
    side: z.string().nullish(),
    type: z.string().nullish(),
    action: z.string().nullish(),
    price: numericSchema.nullish(),
    score: numericSchema.nullish(),
    size: numericSchema.nullish(),
    reason: textSchema.nullish(),
  })
  .transform((r, ctx) => {
    const time = r.time ?? r.date;
    if (time == null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'signal time is required' });
      return z.NEVER;
    }
    const word = (r.side ?? r.type ?? r.action ?? '').trim().toLowerCase();
    let side: SignalSide;
    if (BUY_WORDS.has(word)) {
      side = 'buy';
    } else if (SELL_WORDS.has(word)) {
      side = 'sell';
    } else {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown signal side "${word}"` });
      return z.NEVER;
    }
    return {
      time,
      side,
      price: r.price ?? undefined,
      score: r.score ?? undefined,
      size: r.size ?? undefined,
      reason: r.reason ?? undefined,
    };
  });

export type RawSignal = z.output<typeof rawSignalSchema>;

export const scanCandidateSchema = z
  .object({
    date: timeValueSchema.nullish(),
    time: timeValueSchema.nullish(),
    price: numericSchema.nullish(),
    close: numericSchema.nullish(),
    score: numericSchema.nullish(),
    confidence: numericSchema.nullish(),
    note: textSchema.nullish(),
    label: textSchema.nullish(),
  })
  .transform((r) => ({
    time: r.date ?? r.time ?? undefined,
    price: r.price ?? r.close ?? undefined,
    score: r.score ?? r.confidence ?? undefined,
    note: r.note ?? r.label ?? undefined,
  }));

export type ScanCandidate = z.output<typeof scanCandidateSchema>;

/**
 * 전략 출력의 태그드 변형
 * 필드 유무로만 결정: trades > signals > markers > empty
 */
export type StrategyOutput =
  | { readonly kind: 'trades'; readonly trades: readonly RawTrade[] }
  | { readonly kind: 'signals'; readonly signals: readonly RawSignal[] }
  | { readonly kind: 'markers'; readonly markers: readonly ChartMarker[] }
  | { readonly kind: 'empty' };

export function classifyOutput(result: RunResult): StrategyOutput {
  const trades = result.extraData['trades'];
  if (Array.isArray(trades) && trades.length > 0) {
    return { kind: 'trades', trades: parseRows('trades', trades, rawTradeSchema) };
  }

  const signals = result.extraData['signals'];
  if (Array.isArray(signals) && signals.length > 0) {
    return { kind: 'signals', signals: parseRows('signals', signals, rawSignalSchema) };
  }

  if (result.markers.length > 0) {
    return { kind: 'markers', markers: result.markers };
  }

  return { kind: 'empty' };
}

export function extractScanCandidates(result: RunResult): ScanCandidate[] {
  const raw = result.extraData['scanCandidates'] ?? result.extraData['scan_candidates'];
  if (!Array.isArray(raw) || raw.length === 0) return [];
  return parseRows('scanCandidates', raw, scanCandidateSchema);
}

function parseRows<S extends z.ZodTypeAny>(
  field: string,
  rows: readonly unknown[],
  schema: S,
): Array<z.output<S>> {
  return rows.map((row, i) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
        return `${path}${issue.message}`;
      });
      throw new ValidationError(`${field}[${i}] is malformed: ${issues.join(', ')}`, issues);
    }
    return parsed.data;
  });
}
