export const SKIPPED_OVERLAP = 'skipped-overlap';
export const FORCED_CLOSE_REASON = 'forced-close-at-range-end';
export const MARKER_PAIR_REASON = 'marker-pair';

/** "a; b" 형태로 사유 덧붙이기 (중복 방지) */
export function appendReason(reason: string, extra: string): string {
  if (reason.includes(extra)) return reason;
  return reason.length > 0 ? `${reason}; ${extra}` : extra;
}
