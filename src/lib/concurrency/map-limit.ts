export type DeadlineOutcome<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'timeout' };

export async function mapLimit<T, R>(items: readonly T[], limit: number, fn: (item: T) => Promise<R>): Promise<R[]> {
  const safeLimit = Math.max(1, Math.floor(limit));
  const results: R[] = new Array(items.length);
  let idx = 0;

  const workers = new Array(Math.min(safeLimit, items.length)).fill(null).map(async () => {
    while (true) {
      const current = idx++;
      if (current >= items.length) return;
      results[current] = await fn(items[current]);
    }
  });

  await Promise.all(workers);
  return results;
}

/**
 * Bounded worker pool with one deadline shared by the whole batch.
 *
 * Items still running or not yet started when the deadline passes resolve to `timeout`;
 * the signal handed to `fn` aborts at the same moment so callers can release resources.
 */
export async function mapLimitWithDeadline<T, R>(
  items: readonly T[],
  opts: { limit: number; timeoutMs: number },
  fn: (item: T, signal: AbortSignal) => Promise<R>,
): Promise<DeadlineOutcome<R>[]> {
  const outcomes: DeadlineOutcome<R>[] = items.map(() => ({ status: 'timeout' }));
  if (items.length === 0) return outcomes;

  const controller = new AbortController();
  const signal = controller.signal;
  const timer = setTimeout(() => controller.abort(), Math.max(0, opts.timeoutMs));

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<{ kind: 'aborted' }>((resolve) => {
    onAbort = () => resolve({ kind: 'aborted' });
    signal.addEventListener('abort', onAbort, { once: true });
  });

  const safeLimit = Math.max(1, Math.floor(opts.limit));
  let idx = 0;

  const runOne = async (item: T): Promise<{ kind: 'done'; outcome: DeadlineOutcome<R> }> => {
    try {
      return { kind: 'done', outcome: { status: 'fulfilled', value: await fn(item, signal) } };
    } catch (reason) {
      return { kind: 'done', outcome: { status: 'rejected', reason } };
    }
  };

  const workers = new Array(Math.min(safeLimit, items.length)).fill(null).map(async () => {
    while (!signal.aborted) {
      const current = idx++;
      if (current >= items.length) return;
      const res = await Promise.race([runOne(items[current]), aborted]);
      if (res.kind === 'aborted') return;
      outcomes[current] = res.outcome;
    }
  });

  try {
    await Promise.all(workers);
  } finally {
    clearTimeout(timer);
    if (onAbort) signal.removeEventListener('abort', onAbort);
    // Stragglers still holding the signal get told the batch is over.
    if (!signal.aborted) controller.abort();
  }

  return outcomes;
}
