import { readFileSync } from 'node:fs';
import type { PriceBar } from '../types/index.js';
import { ValidationError } from '../errors.js';
import { parseTime, toDayKey } from '../utils/time.js';

export interface CsvLoaderOptions {
  /** 미지정 시 timestamp → date → time 순으로 탐색 */
  readonly timestampCol?: string;
  readonly openCol?: string;
  readonly highCol?: string;
  readonly lowCol?: string;
  readonly closeCol?: string;
  readonly volumeCol?: string;
}

const TIME_COLUMNS = ['timestamp', 'date', 'time'];

function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        inQuotes = false;
      } else {
        current += ch;
      }
    } else {
      if (ch === '"') {
        inQuotes = true;
      } else if (ch === ',') {
        fields.push(current.trim());
        current = '';
      } else {
        current += ch;
      }
    }
  }
  fields.push(current.trim());
  return fields;
}

function validateBar(bar: PriceBar, lineNum: number): void {
  if ([bar.open, bar.high, bar.low, bar.close, bar.volume].some((v) => Number.isNaN(v))) {
    throw new ValidationError(`Line ${lineNum}: non-numeric field`);
  }
  if (bar.high < bar.low) {
    throw new ValidationError(`Line ${lineNum}: high (${bar.high}) < low (${bar.low})`);
  }
  if (bar.close < 0 || bar.open < 0) {
    throw new ValidationError(`Line ${lineNum}: negative price`);
  }
  if (bar.volume < 0) {
    throw new ValidationError(`Line ${lineNum}: negative volume`);
  }
}

/** CSV 텍스트 → 시간순 PriceBar[] (중복 타임스탬프 거부) */
export function parseCsv(raw: string, options?: CsvLoaderOptions): PriceBar[] {
  const lines = raw.split(/\r?\n/).filter((l) => l.trim().length > 0);
  const headerLine = lines[0];

  if (headerLine === undefined || lines.length < 2) {
    throw new ValidationError('CSV must have header + at least 1 data row');
  }

  const header = parseCsvLine(headerLine).map((h) => h.toLowerCase());
  const colIndex = (name: string): number => {
    const idx = header.indexOf(name.toLowerCase());
    if (idx === -1) {
      throw new ValidationError(`Column "${name}" not found. Available: ${header.join(', ')}`);
    }
    return idx;
  };

  const timeCol = options?.timestampCol
    ?? TIME_COLUMNS.find((c) => header.includes(c))
    ?? 'timestamp';
  const ti = colIndex(timeCol);
  const oi = colIndex(options?.openCol ?? 'open');
  const hi = colIndex(options?.highCol ?? 'high');
  const li = colIndex(options?.lowCol ?? 'low');
  const ci = colIndex(options?.closeCol ?? 'close');
  const vi = colIndex(options?.volumeCol ?? 'volume');

  const bars: PriceBar[] = [];

  lines.slice(1).forEach((line, i) => {
    const lineNum = i + 2;
    const fields = parseCsvLine(line);
    const rawTime = fields[ti] ?? '';
    const timestamp = parseTime(rawTime);
    if (timestamp === null) {
      throw new ValidationError(`Line ${lineNum}: invalid timestamp "${rawTime}"`);
    }
    const bar: PriceBar = {
      timestamp,
      open: Number(fields[oi]),
      high: Number(fields[hi]),
      low: Number(fields[li]),
      close: Number(fields[ci]),
      volume: Number(fields[vi]),
    };
    validateBar(bar, lineNum);
    bars.push(bar);
  });

  // 시간순 정렬
  bars.sort((a, b) => a.timestamp - b.timestamp);
  assertUniqueTimestamps(bars);

  return bars;
}

/** 정렬된 봉 배열에서 인접 중복 시각 검사 (종목당 시각은 유일) */
export function assertUniqueTimestamps(bars: readonly PriceBar[], context?: string): void {
  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1];
    const cur = bars[i];
    if (prev && cur && prev.timestamp === cur.timestamp) {
      const prefix = context ? `${context}: ` : '';
      throw new ValidationError(`${prefix}Duplicate timestamp: ${toDayKey(cur.timestamp)}`);
    }
  }
}

export function loadCsv(filePath: string, options?: CsvLoaderOptions): PriceBar[] {
  return parseCsv(readFileSync(filePath, 'utf-8'), options);
}
