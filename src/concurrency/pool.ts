/**
 * Bounded worker pool that reports results as they complete.
 *
 * At most `concurrency` workers run at once; a new item starts as soon as
 * one settles. Settlements are yielded in completion order, never in
 * submission order, so consumers must not rely on ordering.
 */

export type Settled<T, R> =
  | { status: "fulfilled"; item: T; index: number; value: R }
  | { status: "rejected"; item: T; index: number; reason: unknown };

export async function* completed<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): AsyncGenerator<Settled<T, R>> {
  const limit = Math.max(1, Math.floor(concurrency));
  const done: Settled<T, R>[] = [];
  let wake: (() => void) | undefined;
  let active = 0;
  let next = 0;

  function settle(result: Settled<T, R>): void {
    active--;
    done.push(result);
    if (next < items.length) launch();
    const resume = wake;
    wake = undefined;
    resume?.();
  }

  function launch(): void {
    const index = next++;
    const item = items[index];
    active++;
    void Promise.resolve()
      .then(() => worker(item, index))
      .then(
        (value) => settle({ status: "fulfilled", item, index, value }),
        (reason: unknown) => settle({ status: "rejected", item, index, reason })
      );
  }

  while (next < items.length && active < limit) launch();

  while (active > 0 || done.length > 0) {
    if (done.length === 0) {
      await new Promise<void>((resolve) => {
        wake = resolve;
      });
      continue;
    }

    // Take everything settled so far; new settlements queue behind it.
    for (const settled of done.splice(0, done.length)) {
      yield settled;
    }
  }
}

/** Pool size for a configured concurrency; "unbounded" fans out to every item. */
export function poolSize(concurrency: number | "unbounded", itemCount: number): number {
  return concurrency === "unbounded" ? Math.max(1, itemCount) : concurrency;
}
