/**
 * Run `worker` over `items` with at most `limit` in flight, keeping result order.
 * The first rejection settles the returned promise and stops further launches;
 * workers already in flight finish but their results are dropped.
 */
export function runBounded<T, R>(items: readonly T[], limit: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(limit) || 1);
  const results = new Array<R>(items.length);
  if (!items.length) return Promise.resolve(results);
  return new Promise<R[]>((resolve, reject) => {
    let idx = 0; let active = 0; let done = 0; let failed = false;
    const launch = () => {
      while (!failed && active < concurrency && idx < items.length) {
        const current = idx++; active++;
        worker(items[current], current).then(
          (value) => {
            active--; done++;
            results[current] = value;
            if (failed) return;
            if (done === items.length) resolve(results); else launch();
          },
          (err: unknown) => {
            active--;
            if (failed) return;
            failed = true;
            reject(err);
          },
        );
      }
    };
    launch();
  });
}
