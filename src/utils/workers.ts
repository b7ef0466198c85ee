import { PageRange, PageFailure, WorkerResult } from '../types';
import { errorCode, toError } from '../errors';
import { plan } from './partition';

export interface PartitionedRun {
  ranges: PageRange[];
  results: WorkerResult[];
  failures: PageFailure[];
}

/**
 * Partition [1, total] and run one worker per range concurrently.
 * Resolves only once every worker has settled. A worker that rejects
 * instead of returning its result is recorded as failing on its first page.
 */
export async function runPartitioned(
  total: number,
  workerCount: number,
  worker: (range: PageRange) => Promise<WorkerResult>
): Promise<PartitionedRun> {
  const ranges = plan(total, workerCount);
  const settled = await Promise.allSettled(ranges.map((range) => worker(range)));

  const results = settled.map((outcome, index): WorkerResult => {
    if (outcome.status === 'fulfilled') {
      return outcome.value;
    }
    const error = toError(outcome.reason);
    return {
      range: ranges[index],
      completedPages: [],
      failure: { page: ranges[index].first, code: errorCode(error), message: error.message }
    };
  });

  const failures: PageFailure[] = [];
  for (const result of results) {
    if (result.failure) {
      failures.push(result.failure);
    }
  }

  return { ranges, results, failures };
}
