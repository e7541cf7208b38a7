import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';
import type { PriceBar } from '../types/index.js';
import type { DataSource } from './data-source.js';
import { parseCsv, type CsvLoaderOptions } from './csv-loader.js';
import { DataUnavailableError } from '../errors.js';
import { dayKeyToMs, DAY_MS } from '../utils/time.js';

/**
 * 디렉터리 내 <symbol>.csv 파일을 심볼 1개로 취급
 */
export class CsvDataSource implements DataSource {
  private readonly dir: string;
  private readonly options?: CsvLoaderOptions;

  constructor(dir: string, options?: CsvLoaderOptions) {
    this.dir = dir;
    this.options = options;
  }

  async load(symbol: string, start: string, end: string): Promise<readonly PriceBar[]> {
    if (symbol.includes('/') || symbol.includes('\\') || symbol.startsWith('.')) {
      throw new DataUnavailableError(symbol, 'invalid symbol name');
    }
    const file = path.join(this.dir, `${symbol}.csv`);

    let raw: string;
    try {
      raw = await readFile(file, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        throw new DataUnavailableError(symbol, `${file} not found`);
      }
      throw err;
    }

    return filterRange(parseCsv(raw, this.options), start, end);
  }

  /** 디렉터리의 *.csv 파일명 → 심볼 (이름순) */
  async listSymbols(): Promise<string[]> {
    const entries = await readdir(this.dir, { withFileTypes: true });
    return entries
      .filter((e) => e.isFile() && e.name.toLowerCase().endsWith('.csv'))
      .map((e) => e.name.slice(0, -'.csv'.length))
      .sort();
  }
}

/** [start 00:00, end 다음날 00:00) UTC 구간 */
export function filterRange(bars: readonly PriceBar[], start: string, end: string): PriceBar[] {
  const from = dayKeyToMs(start);
  const to = dayKeyToMs(end) + DAY_MS;
  return bars.filter((b) => b.timestamp >= from && b.timestamp < to);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
