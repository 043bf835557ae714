import { BrokerClientError } from '@/lib/broker/client';
import { errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import type { BrokerApi, TaskStatus } from '@/lib/broker/types';
import type { RunContext } from './run-context';
import type { PendingTask } from './types';

export type MonitorOptions = {
  broker: BrokerApi;
  context: RunContext;
  timeoutMs: number;
  pollIntervalMs: number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
  onProgress?: (elapsedMs: number, pendingCount: number) => void;
  signal?: AbortSignal;
};

export type MonitorResult = {
  succeeded: number;
  failed: number;
  stillPending: PendingTask[];
  elapsedMs: number;
  timedOut: boolean;
};

function sleep(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Polls submitted power actions until all of them finish or the deadline passes.
 * Never runs longer than `timeoutMs` plus one poll interval.
 */
export async function monitorPowerActions(opts: MonitorOptions): Promise<MonitorResult> {
  const now = opts.now ?? Date.now;
  const wait = opts.sleep ?? sleep;
  const startedAt = now();
  const deadline = startedAt + Math.max(0, opts.timeoutMs);
  const interval = Math.max(1, opts.pollIntervalMs);

  let succeeded = 0;
  let failed = 0;

  type PollOutcome = { kind: 'status'; status: TaskStatus } | { kind: 'error'; err: unknown } | { kind: 'stopped' };

  // The request is cancelled when the deadline passes or the caller aborts.
  async function pollWithin(task: PendingTask, remainingMs: number): Promise<PollOutcome> {
    const controller = new AbortController();
    const stop = () => controller.abort();
    const stopped = new Promise<PollOutcome>((resolve) => {
      controller.signal.addEventListener('abort', () => resolve({ kind: 'stopped' }), { once: true });
    });
    opts.signal?.addEventListener('abort', stop, { once: true });
    const timer = setTimeout(stop, remainingMs);

    try {
      return await Promise.race([
        opts.broker.pollTask(task.endpoint, task.taskId, controller.signal).then(
          (status): PollOutcome => ({ kind: 'status', status }),
          (err: unknown): PollOutcome => ({ kind: 'error', err }),
        ),
        stopped,
      ]);
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', stop);
    }
  }

  const outOfTime = () => deadline - now() <= 0 || opts.signal?.aborted === true;

  // Resolves false when the round was cut short.
  async function pollRound(): Promise<boolean> {
    for (const task of opts.context.pendingTasks()) {
      if (outOfTime()) return false;

      const outcome = await pollWithin(task, deadline - now());
      if (outcome.kind === 'stopped') return false;

      if (outcome.kind === 'error') {
        logEvent({
          level: 'warn',
          service: 'rollout',
          event_type: 'power_action.poll_failed',
          task_id: task.taskId,
          endpoint: task.endpoint,
          machine: task.machineName,
          ...(outcome.err instanceof BrokerClientError
            ? { error: outcome.err.appError }
            : { cause_excerpt: errorMessage(outcome.err) }),
        });
        continue;
      }

      const { status } = outcome;
      if (status.state === 'pending') continue;

      opts.context.removePending(task);
      if (status.outcome === 'success') {
        succeeded += 1;
        opts.context.count('restartsSucceeded');
      } else {
        failed += 1;
        opts.context.count('restartsFailed');
      }

      logEvent({
        level: status.outcome === 'success' ? 'info' : 'error',
        service: 'rollout',
        event_type: 'power_action.completed',
        task_id: task.taskId,
        endpoint: task.endpoint,
        site_id: task.siteId,
        machine: task.machineName,
        outcome: status.outcome,
        completion_time: status.completionTime,
        duration_ms: now() - task.submittedAt,
        ...(status.detail ? { detail_excerpt: status.detail } : {}),
      });
    }
    return true;
  }

  while (opts.context.pendingTasks().length > 0) {
    if (!(await pollRound())) break;
    if (opts.context.pendingTasks().length === 0 || outOfTime()) break;

    await wait(Math.min(interval, deadline - now()), opts.signal);
    opts.onProgress?.(now() - startedAt, opts.context.pendingTasks().length);
    if (outOfTime()) break;
  }

  const stillPending = opts.context.pendingTasks();
  const elapsedMs = now() - startedAt;

  if (stillPending.length > 0) {
    logEvent({
      level: 'warn',
      service: 'rollout',
      event_type: 'power_action.monitor_timeout',
      timeout_ms: opts.timeoutMs,
      elapsed_ms: elapsedMs,
      aborted: opts.signal?.aborted ?? false,
      pending: stillPending.map((t) => ({ task_id: t.taskId, endpoint: t.endpoint, machine: t.machineName })),
    });
  }

  return { succeeded, failed, stillPending, elapsedMs, timedOut: stillPending.length > 0 };
}
