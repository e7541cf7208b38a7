export const DAY_MS = 24 * 3600 * 1000;

const DATE_PREFIX = /^(\d{4})[-/](\d{2})[-/](\d{2})/;
const COMPACT_DATE = /^(\d{4})(\d{2})(\d{2})$/;

/** Unix ms → UTC 날짜 키 (YYYY-MM-DD) */
export function toDayKey(ms: number): string {
  return new Date(ms).toISOString().slice(0, 10);
}

/** YYYY-MM-DD → 해당일 00:00 UTC ms */
export function dayKeyToMs(key: string): number {
  return Date.UTC(Number(key.slice(0, 4)), Number(key.slice(5, 7)) - 1, Number(key.slice(8, 10)));
}

/**
 * 전략이 내놓는 다양한 시간 표현을 Unix ms로 변환
 * - 숫자: 11자리 미만이면 초 단위로 간주
 * - YYYY-MM-DD / YYYY/MM/DD 로 시작하는 문자열: 날짜 부분만 사용 (UTC)
 * - YYYYMMDD
 * 해석 불가이거나 Date 표현 범위 밖이면 null
 */
export function parseTime(value: string | number): number | null {
  const ms = parseTimeUnchecked(value);
  return ms === null || Number.isNaN(new Date(ms).getTime()) ? null : ms;
}

function parseTimeUnchecked(value: string | number): number | null {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) return null;
    return Math.abs(value) < 1e11 ? value * 1000 : value;
  }

  const text = value.trim();
  if (text.length === 0) return null;

  const compact = COMPACT_DATE.exec(text);
  if (compact) {
    return Date.UTC(Number(compact[1]), Number(compact[2]) - 1, Number(compact[3]));
  }

  const prefixed = DATE_PREFIX.exec(text);
  if (prefixed) {
    return Date.UTC(Number(prefixed[1]), Number(prefixed[2]) - 1, Number(prefixed[3]));
  }

  if (/^-?\d+(\.\d+)?$/.test(text)) {
    return parseTimeUnchecked(Number(text));
  }

  const ms = Date.parse(text);
  return Number.isNaN(ms) ? null : ms;
}

export function isDayKey(value: string): boolean {
  return /^\d{4}-\d{2}-\d{2}$/.test(value) && toDayKey(dayKeyToMs(value)) === value;
}

/** 두 시점 사이 일수 (소수점 반올림) */
export function daysBetween(fromMs: number, toMs: number): number {
  return Math.round((toMs - fromMs) / DAY_MS);
}
