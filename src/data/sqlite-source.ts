import Database from 'better-sqlite3';
import { z } from 'zod';
import type { PriceBar } from '../types/index.js';
import type { DataSource } from './data-source.js';
import { filterRange } from './csv-source.js';
import { assertUniqueTimestamps } from './csv-loader.js';
import { DataUnavailableError, ValidationError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { parseTime } from '../utils/time.js';

const log = createChildLogger('sqlite-source');

const barRowSchema = z.object({
  date: z.union([z.string(), z.number()]),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  volume: z.number().nullable().transform((v) => v ?? 0),
});

/**
 * 심볼당 테이블 1개 (date, open, high, low, close, volume) 구조의 일봉 DB
 * 읽기 전용으로 열며 커넥션은 동시 심볼 작업이 공유한다
 */
export class SqliteDataSource implements DataSource {
  private readonly db: Database.Database;
  private readonly ownsConnection: boolean;

  constructor(db: Database.Database | string) {
    if (typeof db === 'string') {
      this.db = new Database(db, { readonly: true, fileMustExist: true });
      this.ownsConnection = true;
      log.info({ path: db }, 'Price database opened');
    } else {
      this.db = db;
      this.ownsConnection = false;
    }
  }

  async load(symbol: string, start: string, end: string): Promise<readonly PriceBar[]> {
    if (!this.hasTable(symbol)) {
      throw new DataUnavailableError(symbol, 'table does not exist');
    }

    const rows: unknown[] = this.db
      .prepare(`SELECT date, open, high, low, close, volume FROM ${quoteIdent(symbol)} ORDER BY date`)
      .all();

    const bars: PriceBar[] = [];
    for (const row of rows) {
      const parsed = barRowSchema.safeParse(row);
      if (!parsed.success) {
        throw new ValidationError(`${symbol}: malformed price row`, parsed.error.issues.map((i) => i.message));
      }
      const { date, ...prices } = parsed.data;
      const timestamp = parseTime(date);
      if (timestamp === null) {
        throw new ValidationError(`${symbol}: invalid date "${date}"`);
      }
      bars.push({ timestamp, ...prices });
    }

    bars.sort((a, b) => a.timestamp - b.timestamp);
    assertUniqueTimestamps(bars, symbol);
    return filterRange(bars, start, end);
  }

  hasTable(name: string): boolean {
    const row = this.db
      .prepare(`SELECT 1 AS found FROM sqlite_master WHERE type = 'table' AND name = ?`)
      .get(name);
    return row !== undefined;
  }

  /** 시스템 테이블 제외 전체 심볼 (이름순) */
  listSymbols(): string[] {
    const rows: unknown[] = this.db
      .prepare(`SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name`)
      .all();
    return rows.flatMap((row) => {
      const parsed = z.object({ name: z.string() }).safeParse(row);
      return parsed.success ? [parsed.data.name] : [];
    });
  }

  close(): void {
    if (this.ownsConnection) {
      this.db.close();
    }
  }
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
