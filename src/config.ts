import dotenv from 'dotenv';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// 프로젝트 루트 .env 먼저, cwd의 .env가 있으면 덮어씀
dotenv.config({ path: path.join(__dirname, '..', '.env') });
dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v.trim() === '') return fallback;
  const n = Number(v);
  return Number.isFinite(n) ? n : fallback;
}

export const config = {
  engine: {
    initialCash: envNum('INITIAL_CASH', 1_000_000),
    /** 편도 수수료율 (0.0003 = 0.03%) */
    commissionRate: envNum('COMMISSION_RATE', 0.0003),
    /** 왕복 슬리피지 비율, 진입/청산에 절반씩 적용 */
    slippage: envNum('SLIPPAGE', 0.0005),
    maxPositions: envNum('MAX_POSITIONS', 1),
    /** 초기 자본 대비 1회 진입 비중 (0~1] */
    positionSizePct: envNum('POSITION_SIZE_PCT', 1.0),
    annualizationDays: envNum('ANNUALIZATION_DAYS', 365),
  },

  /** 마커만 내는 전략의 청산 근사 규칙 */
  markers: {
    holdingBars: envNum('HOLDING_BARS', 5),
    /** 0이면 트레일링 스톱 미사용 (0.05 = 5%) */
    trailingStopPct: envNum('TRAILING_STOP_PCT', 0),
  },

  scan: {
    concurrency: envNum('SCAN_CONCURRENCY', 4),
    topN: envNum('SCAN_TOP_N', 5),
  },

  db: {
    path: env('DB_PATH', './data/daily.db'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },
} as const;
