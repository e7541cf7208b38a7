import type { PriceBar } from '../types/index.js';
import type { DataSource } from './data-source.js';

/**
 * (symbol, start, end) 키 메모이제이션 래퍼
 * 진행 중인 요청도 공유해 같은 키의 동시 로드는 1회로 합친다.
 * 실패한 로드는 캐시하지 않는다.
 */
export class CachedDataSource implements DataSource {
  private readonly inner: DataSource;
  private readonly maxEntries: number;
  private readonly cache = new Map<string, Promise<readonly PriceBar[]>>();

  constructor(inner: DataSource, maxEntries: number = 512) {
    this.inner = inner;
    this.maxEntries = maxEntries;
  }

  load(symbol: string, start: string, end: string): Promise<readonly PriceBar[]> {
    const key = `${symbol}|${start}|${end}`;
    const hit = this.cache.get(key);
    if (hit) return hit;

    const pending = this.inner.load(symbol, start, end);
    this.cache.set(key, pending);
    pending.catch(() => {
      this.cache.delete(key);
    });
    this.evict();
    return pending;
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  /** 삽입 순서 기준 가장 오래된 항목부터 제거 */
  private evict(): void {
    while (this.cache.size > this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }
}
