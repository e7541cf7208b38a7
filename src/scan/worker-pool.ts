import { setImmediate as yieldToLoop } from 'node:timers/promises';

export interface PoolOptions<T, R> {
  readonly signal?: AbortSignal;
  /** 항목 하나가 끝날 때마다 호출 (완료 순서) */
  readonly onSettled?: (item: T, result: R) => void;
}

export interface PoolResult<R> {
  /** 입력 순서, 시작하지 못한 항목은 undefined */
  readonly results: Array<R | undefined>;
  readonly started: number;
  readonly cancelled: boolean;
}

/**
 * 동시 실행 상한이 있는 워커 풀
 *
 * 각 워커는 다음 항목을 집기 전에 signal을 확인한다. 이미 시작한 항목은 끝까지 실행.
 * task가 throw하면 풀 전체가 reject: 항목별 실패는 task 안에서 값으로 돌려줄 것
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>,
  options: PoolOptions<T, R> = {},
): Promise<PoolResult<R>> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const workers = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      if (options.signal?.aborted) return;
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      const result = await task(item, index);
      results[index] = result;
      options.onSettled?.(item, result);
      // 큰 유니버스에서도 이벤트 루프를 막지 않도록
      await yieldToLoop();
    }
  };

  await Promise.all(Array.from({ length: items.length === 0 ? 0 : workers }, () => worker()));

  return {
    results,
    started: next,
    cancelled: next < items.length,
  };
}
