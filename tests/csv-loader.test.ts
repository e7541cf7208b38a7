import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadCsv, parseCsv } from '../src/data/csv-loader.js';
import { CsvDataSource } from '../src/data/csv-source.js';
import { DataUnavailableError, ValidationError } from '../src/errors.js';
import { day } from './helpers/bars.js';

let tmpDir = '';

beforeEach(() => {
  tmpDir = mkdtempSync(join(tmpdir(), 'csv-loader-'));
});

afterEach(() => {
  rmSync(tmpDir, { recursive: true, force: true });
});

function writeTmp(name: string, content: string): string {
  const p = join(tmpDir, name);
  writeFileSync(p, content, 'utf-8');
  return p;
}

describe('csv-loader', () => {
  it('should parse basic CSV', () => {
    const path = writeTmp('test.csv', [
      'timestamp,open,high,low,close,volume',
      '1700000000,100,110,90,105,1000',
      '1700086400,105,115,95,110,2000',
    ].join('\n'));

    const bars = loadCsv(path);
    expect(bars).toHaveLength(2);
    expect(bars[0]?.open).toBe(100);
    expect(bars[0]?.timestamp).toBe(1700000000000); // seconds → ms
    expect(bars[1]?.volume).toBe(2000);
  });

  it('should detect a date column and sort by time', () => {
    const bars = parseCsv([
      'Date,Open,High,Low,Close,Volume',
      '2024-01-03,11,12,10,11.5,300',
      '20240102,10,11,9,10.5,200',
    ].join('\n'));

    expect(bars.map((b) => b.timestamp)).toEqual([day('2024-01-02'), day('2024-01-03')]);
    expect(bars[0]?.close).toBe(10.5);
  });

  it('should reject high < low', () => {
    expect(() => parseCsv([
      'timestamp,open,high,low,close,volume',
      '1700000000,100,80,90,105,1000',
    ].join('\n'))).toThrow('Line 2: high (80) < low (90)');
  });

  it('should reject duplicate timestamps', () => {
    expect(() => parseCsv([
      'date,open,high,low,close,volume',
      '2024-01-02,100,110,90,105,1000',
      '2024-01-02,105,115,95,110,2000',
    ].join('\n'))).toThrow(ValidationError);
  });

  it('should reject a missing column', () => {
    expect(() => parseCsv('date,open,high,low,close\n2024-01-02,1,1,1,1'))
      .toThrow('Column "volume" not found. Available: date, open, high, low, close');
  });
});

describe('CsvDataSource', () => {
  const rows = [
    'date,open,high,low,close,volume',
    '2024-01-01,10,11,9,10,100',
    '2024-01-02,10,11,9,11,100',
    '2024-01-03,11,12,10,12,100',
    '2024-01-04,12,13,11,13,100',
  ].join('\n');

  it('should load the inclusive date range', async () => {
    writeTmp('AAA.csv', rows);
    const source = new CsvDataSource(tmpDir);
    const bars = await source.load('AAA', '2024-01-02', '2024-01-03');
    expect(bars.map((b) => b.close)).toEqual([11, 12]);
  });

  it('should raise DataUnavailableError for a missing file', async () => {
    const source = new CsvDataSource(tmpDir);
    await expect(source.load('ZZZ', '2024-01-01', '2024-01-31')).rejects.toBeInstanceOf(DataUnavailableError);
  });

  it('should reject path-like symbols', async () => {
    const source = new CsvDataSource(tmpDir);
    await expect(source.load('../AAA', '2024-01-01', '2024-01-31')).rejects.toThrow('invalid symbol name');
  });

  it('should list symbols from file names', async () => {
    writeTmp('BBB.csv', rows);
    writeTmp('AAA.csv', rows);
    writeTmp('notes.txt', 'x');
    expect(await new CsvDataSource(tmpDir).listSymbols()).toEqual(['AAA', 'BBB']);
  });
});
