/**
 * 제한된 동시성 워커 풀
 * 불변 작업 항목 큐를 p-queue로 처리하고, 항목별 결과를 입력 순서대로 모은다.
 */

import PQueue from 'p-queue';
import * as os from 'os';

/**
 * 워커 수 결정 (기본값: 사용 가능한 CPU 수, 최소 1)
 */
export function resolveJobs(requested?: number): number {
  const value = requested ?? os.availableParallelism();
  if (!Number.isFinite(value)) return 1;
  return Math.max(1, Math.floor(value));
}

export interface BoundedRunOptions<T, R> {
  concurrency: number;
  /** 워커 예외를 항목 결과로 변환 (형제 워커는 계속 진행) */
  onError: (error: unknown, item: T) => R;
  /** 항목 하나가 끝날 때마다 호출 */
  onSettled?: (result: R, completed: number, total: number) => void;
}

export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  options: BoundedRunOptions<T, R>
): Promise<R[]> {
  const queue = new PQueue({ concurrency: resolveJobs(options.concurrency) });
  const results: R[] = new Array(items.length);
  let completed = 0;

  const tasks = items.map((item, index) =>
    queue.add(async () => {
      let result: R;
      try {
        result = await worker(item);
      } catch (error) {
        result = options.onError(error, item);
      }
      results[index] = result;
      completed++;
      options.onSettled?.(result, completed, items.length);
    })
  );

  await Promise.all(tasks);
  return results;
}
