#!/usr/bin/env node
import { config } from './config.js';
import { createChildLogger } from './logger.js';
import { describeError, ValidationError } from './errors.js';
import type { DataSource } from './data/data-source.js';
import { SqliteDataSource } from './data/sqlite-source.js';
import { CsvDataSource } from './data/csv-source.js';
import { CachedDataSource } from './data/cached-source.js';
import { createDefaultRegistry } from './strategy/index.js';
import { ScanOrchestrator } from './scan/scan-orchestrator.js';
import type { EvaluationRequestInput } from './scan/request.js';
import {
  formatFailures,
  formatJson,
  formatReport,
  formatScanResults,
  formatTrades,
  formatUniverseSummary,
} from './report/formatter.js';
import type { ScanProgress } from './types/index.js';

const log = createChildLogger('cli');

function printUsage(): void {
  console.log(`
Usage:
  tsx src/index.ts scan --strategy <key> --start <YYYY-MM-DD> --end <YYYY-MM-DD> [options]
  tsx src/index.ts backtest --strategy <key> --start <YYYY-MM-DD> --end <YYYY-MM-DD> [options]
  tsx src/index.ts strategies

Commands:
  scan          Rank the universe by the strategy's latest entry score
  backtest      Simulate trades and report KPIs per symbol
  strategies    List registered strategies

Data (one of):
  --db <path>               SQLite daily bar database, one table per symbol (default: DB_PATH)
  --csv-dir <dir>           Directory of <symbol>.csv files

Options:
  --universe <A,B,...>      Symbols to evaluate (default: every symbol in the source)
  --params <k=v,...>        Strategy parameters
  --commission <number>     One-way commission rate (default: ${config.engine.commissionRate})
  --slippage <number>       Round-trip slippage fraction (default: ${config.engine.slippage})
  --max-positions <number>  Concurrent open positions (default: ${config.engine.maxPositions})
  --size <number>           Fraction of initial cash per entry (default: ${config.engine.positionSizePct})
  --units <number>          Fixed units per entry (overrides --size)
  --capital <number>        Initial cash (default: ${config.engine.initialCash})
  --concurrency <number>    Symbols evaluated in parallel (default: ${config.scan.concurrency})
  --top <number>            Rows to print (default: all for scan)
  --trades                  Show individual trades (backtest)
  --json                    Print machine-readable JSON

Ctrl-C stops taking new symbols; symbols already running finish.
`);
}

function parseArgs(args: string[]): Map<string, string> {
  const map = new Map<string, string>();
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        map.set(arg, next);
        i++;
      } else {
        map.set(arg, 'true');
      }
    } else if (!map.has('_command')) {
      map.set('_command', arg);
    }
  }
  return map;
}

function getNum(args: Map<string, string>, key: string): number | undefined {
  const v = args.get(key);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) {
    throw new ValidationError(`${key} expects a number, got "${v}"`);
  }
  return n;
}

function getList(args: Map<string, string>, key: string): string[] | undefined {
  const v = args.get(key);
  if (v === undefined) return undefined;
  return v.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/** --params "fast=5,slow=20" → { fast: 5, slow: 20 } (숫자로 읽히면 숫자) */
function parseParams(raw: string | undefined): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  if (!raw) return params;
  for (const pair of raw.split(',')) {
    const [key, ...rest] = pair.split('=');
    const name = key?.trim();
    if (!name) continue;
    const value = rest.join('=').trim();
    params[name] = value !== '' && Number.isFinite(Number(value)) ? Number(value) : value;
  }
  return params;
}

interface OpenedSource {
  readonly source: DataSource;
  listSymbols(): Promise<string[]>;
  close(): void;
}

function openSource(args: Map<string, string>): OpenedSource {
  const csvDir = args.get('--csv-dir');
  if (csvDir) {
    const csv = new CsvDataSource(csvDir);
    return {
      source: new CachedDataSource(csv),
      listSymbols: () => csv.listSymbols(),
      close: () => undefined,
    };
  }
  const sqlite = new SqliteDataSource(args.get('--db') ?? config.db.path);
  return {
    source: new CachedDataSource(sqlite),
    listSymbols: async () => sqlite.listSymbols(),
    close: () => sqlite.close(),
  };
}

function buildRequest(args: Map<string, string>, universe: string[]): EvaluationRequestInput {
  const units = getNum(args, '--units');
  const pct = getNum(args, '--size');
  return {
    universe,
    dateRange: { start: args.get('--start') ?? '', end: args.get('--end') ?? '' },
    strategyKey: args.get('--strategy') ?? '',
    strategyParams: parseParams(args.get('--params')),
    commissionRate: getNum(args, '--commission'),
    slippage: getNum(args, '--slippage'),
    maxPositions: getNum(args, '--max-positions'),
    positionSize: units !== undefined
      ? { kind: 'units', units }
      : pct !== undefined ? { kind: 'percent', pct } : undefined,
    initialCash: getNum(args, '--capital'),
    concurrency: getNum(args, '--concurrency'),
  };
}

function progressPrinter(enabled: boolean): (p: ScanProgress) => void {
  return (p) => {
    if (!enabled) return;
    process.stderr.write(`\r  [${p.completed}/${p.total}] ${p.symbol} ${p.status}    `);
    if (p.completed === p.total) process.stderr.write('\n');
  };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.get('_command');
  const json = args.has('--json');
  const registry = createDefaultRegistry();

  if (command === 'strategies') {
    for (const s of registry.all()) {
      console.log(`  ${s.key.padEnd(20)} ${s.title}: ${s.description}`);
    }
    return;
  }

  if (command !== 'scan' && command !== 'backtest') {
    if (command) console.error(`Unknown command: ${command}`);
    printUsage();
    process.exit(1);
  }

  const opened = openSource(args);
  const controller = new AbortController();
  const onSigint = (): void => {
    log.warn('Interrupted, finishing running symbols');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const universe = getList(args, '--universe') ?? (await opened.listSymbols());
    const request = buildRequest(args, universe);
    const orchestrator = new ScanOrchestrator(opened.source, registry);
    const onProgress = progressPrinter(!json && process.stderr.isTTY === true);
    const top = getNum(args, '--top');

    if (command === 'scan') {
      const outcome = await orchestrator.run(request, onProgress, controller.signal);
      console.log(json ? formatJson(outcome) : formatScanResults(outcome, top));
    } else {
      const outcome = await orchestrator.backtest(request, onProgress, controller.signal);
      if (json) {
        console.log(formatJson(outcome));
      } else {
        for (const report of outcome.reports) {
          console.log(formatReport(report));
          if (args.has('--trades')) console.log(formatTrades(report));
        }
        if (outcome.reports.length > 1) console.log(formatUniverseSummary(outcome.summary));
        if (outcome.failures.length > 0) console.log(formatFailures(outcome.failures));
        if (outcome.cancelled) console.log('Cancelled before every symbol was evaluated.');
      }
    }
  } finally {
    process.off('SIGINT', onSigint);
    opened.close();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ValidationError) {
    console.error(describeError(err));
    for (const issue of err.issues) console.error(`  - ${issue}`);
  } else {
    log.fatal({ err }, 'Fatal error');
  }
  process.exit(1);
});
