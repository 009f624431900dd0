/**
 * Tapir Runtime Host — Bounded Worker Pool
 *
 * Runs one async task per item with at most `concurrency` tasks in flight.
 *
 * Results are index-addressed: the task for items[i] writes only slots[i].
 * Output order therefore always equals input order, whatever order tasks
 * complete in, and no lock or shared collection is needed.
 *
 * A task that throws does not stop its siblings; its slot records the
 * error. Cancellation is cooperative: the signal is checked before each task
 * starts, tasks already running are allowed to finish, and then runPool()
 * rejects with CancelledError.
 */

import { CancelledError } from '@tapir/kernel';

export type Outcome<R> = { readonly ok: true; readonly value: R } | { readonly ok: false; readonly error: unknown };

export interface PoolOptions {
  /** Maximum tasks in flight. Values below 1 are treated as 1. */
  readonly concurrency: number;
  readonly signal?: AbortSignal | undefined;
}

/**
 * @returns One outcome per item, index-aligned with `items`
 * @throws {CancelledError} If `signal` aborted before every task started
 */
export async function runPool<T, R>(
  items: ReadonlyArray<T>,
  opts: PoolOptions,
  task: (item: T, index: number) => Promise<R>,
): Promise<Outcome<R>[]> {
  const slots = new Array<Outcome<R> | undefined>(items.length).fill(undefined);
  const requested = Number.isFinite(opts.concurrency) ? Math.floor(opts.concurrency) : 1;
  const width = Math.max(1, Math.min(requested, items.length));
  const queue = items.map((item, index) => ({ item, index }));
  let next = 0;
  let cancelled = false;

  const worker = async (): Promise<void> => {
    for (;;) {
      const job = queue[next];
      if (job === undefined) return;
      if (opts.signal?.aborted === true) {
        cancelled = true;
        return;
      }
      next++;
      try {
        slots[job.index] = { ok: true, value: await task(job.item, job.index) };
      } catch (error: unknown) {
        slots[job.index] = { ok: false, error };
      }
    }
  };

  await Promise.all(Array.from({ length: width }, () => worker()));

  if (cancelled) throw new CancelledError(opts.signal?.reason);

  return slots.map((slot, i) => slot ?? { ok: false, error: new Error(`pool slot ${i} was never filled`) });
}
