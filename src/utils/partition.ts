import { PageRange } from '../types';

/**
 * Split pages [1, total] into at most `workerCount` contiguous ranges of
 * ceil(total / workerCount) pages. The last range may be shorter.
 */
export function plan(total: number, workerCount: number): PageRange[] {
  const ranges: PageRange[] = [];
  if (total <= 0) {
    return ranges;
  }

  const perWorker = Math.ceil(total / workerCount);
  for (let first = 1; first <= total; first += perWorker) {
    ranges.push({ first, last: Math.min(first + perWorker - 1, total) });
  }
  return ranges;
}
