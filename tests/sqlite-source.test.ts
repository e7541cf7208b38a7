import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { SqliteDataSource } from '../src/data/sqlite-source.js';
import { DataUnavailableError, ValidationError } from '../src/errors.js';
import { day } from './helpers/bars.js';

let db: Database.Database;

function createSymbol(name: string, rows: Array<[string, number, number | null]>): void {
  db.prepare(`CREATE TABLE "${name}" (date TEXT, open REAL, high REAL, low REAL, close REAL, volume REAL)`).run();
  const insert = db.prepare(`INSERT INTO "${name}" VALUES (?, ?, ?, ?, ?, ?)`);
  for (const [date, close, volume] of rows) {
    insert.run(date, close, close + 1, close - 1, close, volume);
  }
}

beforeEach(() => {
  db = new Database(':memory:');
});

afterEach(() => {
  db.close();
});

describe('SqliteDataSource', () => {
  it('should load bars in range ordered by date', async () => {
    createSymbol('005930', [
      ['2024-01-03', 12, 300],
      ['2024-01-01', 10, 100],
      ['2024-01-02', 11, null],
      ['2024-01-04', 13, 400],
    ]);
    const source = new SqliteDataSource(db);

    const bars = await source.load('005930', '2024-01-02', '2024-01-03');
    expect(bars).toEqual([
      { timestamp: day('2024-01-02'), open: 11, high: 12, low: 10, close: 11, volume: 0 },
      { timestamp: day('2024-01-03'), open: 12, high: 13, low: 11, close: 12, volume: 300 },
    ]);
  });

  it('should raise DataUnavailableError for a missing table', async () => {
    const source = new SqliteDataSource(db);
    await expect(source.load('NOPE', '2024-01-01', '2024-01-31')).rejects.toBeInstanceOf(DataUnavailableError);
  });

  it('should reject malformed rows', async () => {
    db.prepare('CREATE TABLE "BAD" (date TEXT, open REAL, high REAL, low REAL, close TEXT, volume REAL)').run();
    db.prepare(`INSERT INTO "BAD" VALUES ('2024-01-01', 1, 1, 1, 'n/a', 1)`).run();
    const source = new SqliteDataSource(db);
    await expect(source.load('BAD', '2024-01-01', '2024-01-31')).rejects.toBeInstanceOf(ValidationError);
  });

  it('should reject duplicate dates', async () => {
    createSymbol('DUP', [
      ['2024-01-02', 11, 100],
      ['2024-01-03', 12, 100],
      ['2024-01-02', 11.5, 100],
    ]);
    const source = new SqliteDataSource(db);
    await expect(source.load('DUP', '2024-01-01', '2024-01-31'))
      .rejects.toThrow(new ValidationError('DUP: Duplicate timestamp: 2024-01-02'));
  });

  it('should list symbol tables by name', () => {
    createSymbol('BBB', []);
    createSymbol('AAA', []);
    const source = new SqliteDataSource(db);
    expect(source.listSymbols()).toEqual(['AAA', 'BBB']);
    expect(source.hasTable('AAA')).toBe(true);
    expect(source.hasTable('CCC')).toBe(false);
  });

  it('should leave a borrowed connection open', () => {
    const source = new SqliteDataSource(db);
    source.close();
    expect(db.open).toBe(true);
  });
});
