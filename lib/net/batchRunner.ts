import pLimit from 'p-limit';
import logger from '../logger';
import { toError } from '../errors';
import type { BatchPolicy } from '../types';

export type BatchItemResult<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: Error };

export interface BatchRunOptions<T, R> {
  batchSize: number;
  policy?: BatchPolicy;
  signal?: AbortSignal;
  /** Barrier policy only: called right before a batch is launched. */
  onBatchStart?: (batchIndex: number, items: readonly T[]) => void;
  /** Barrier policy only: called once every item of the batch has settled. */
  onBatchComplete?: (batchIndex: number, results: ReadonlyArray<BatchItemResult<T, R>>) => void;
}

export interface BatchOutcome<T, R> {
  results: Array<BatchItemResult<T, R>>; // input order, skipped items omitted
  batches: number;
  cancelled: boolean;
}

function assertBatchSize(batchSize: number) {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batch size must be an integer >= 1, got ${batchSize}`);
  }
}

/**
 * Split items into contiguous batches of at most `batchSize`, preserving order.
 */
export function planBatches<T>(items: readonly T[], batchSize: number): T[][] {
  assertBatchSize(batchSize);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

// Starting the worker inside an async function turns a synchronous throw into a rejection.
async function launch<T, R>(worker: (item: T) => Promise<R>, item: T): Promise<R> {
  return worker(item);
}

function settle<T, R>(item: T, s: PromiseSettledResult<R>): BatchItemResult<T, R> {
  return s.status === 'fulfilled'
    ? { item, ok: true, value: s.value }
    : { item, ok: false, error: toError(s.reason) };
}

/**
 * Run `worker` over every item with at most `batchSize` in flight.
 *
 * `barrier`: launch a batch, wait for all of it to settle, then launch the next.
 * `window`: keep `batchSize` items in flight, starting the next as soon as one settles.
 *
 * A worker that rejects (or throws) yields an `ok: false` entry; the run continues.
 * An aborted `signal` stops new work from starting; in-flight items run to completion.
 */
export async function runInBatches<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  opts: BatchRunOptions<T, R>,
): Promise<BatchOutcome<T, R>> {
  assertBatchSize(opts.batchSize);
  if ((opts.policy ?? 'barrier') === 'window') {
    return runWindowed(items, worker, opts.batchSize, opts.signal);
  }

  const results: Array<BatchItemResult<T, R>> = [];
  const batches = planBatches(items, opts.batchSize);
  let launched = 0;

  for (const [index, batch] of batches.entries()) {
    if (opts.signal?.aborted) {
      logger.debug({ batch: index, remaining: batches.length - index }, 'batch runner stopping after abort');
      return { results, batches: launched, cancelled: true };
    }
    opts.onBatchStart?.(index, batch);
    launched++;
    const settled = await Promise.allSettled(batch.map((item) => launch(worker, item)));
    const batchResults = batch.map((item, i) => settle(item, settled[i]));
    opts.onBatchComplete?.(index, batchResults);
    results.push(...batchResults);
  }

  return { results, batches: launched, cancelled: false };
}

async function runWindowed<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  concurrency: number,
  signal: AbortSignal | undefined,
): Promise<BatchOutcome<T, R>> {
  const limit = pLimit(concurrency);
  const SKIPPED = Symbol('skipped');
  let cancelled = false;

  const settled = await Promise.allSettled(
    items.map((item) =>
      limit(async (): Promise<R | typeof SKIPPED> => {
        if (signal?.aborted) {
          cancelled = true;
          return SKIPPED;
        }
        return launch(worker, item);
      }),
    ),
  );

  const results: Array<BatchItemResult<T, R>> = [];
  settled.forEach((s, i) => {
    if (s.status === 'fulfilled') {
      const value = s.value;
      if (value !== SKIPPED) results.push({ item: items[i], ok: true, value });
    } else {
      results.push({ item: items[i], ok: false, error: toError(s.reason) });
    }
  });
  return { results, batches: items.length ? 1 : 0, cancelled };
}

export default runInBatches;
