/**
 * 지수이동평균 시계열
 * 첫 period개는 단순평균으로 시드, 그 전 구간은 null
 */
export function emaSeries(values: readonly number[], period: number): Array<number | null> {
  if (!Number.isInteger(period) || period < 1) throw new RangeError('EMA period must be an integer >= 1');
  const k = 2 / (period + 1);
  const out: Array<number | null> = [];
  let sum = 0;
  let current: number | null = null;

  values.forEach((value, i) => {
    if (current === null) {
      sum += value;
      if (i + 1 === period) current = sum / period;
    } else {
      current = (value - current) * k + current;
    }
    out.push(current);
  });

  return out;
}
