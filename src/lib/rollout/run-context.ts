import type { PendingTask } from './types';

export type RunCounters = {
  nagsSent: number;
  nagsFailed: number;
  nagsSimulated: number;
  restartsRequested: number;
  restartsSimulated: number;
  restartsSubmitFailed: number;
  restartsSucceeded: number;
  restartsFailed: number;
  restartsSkipped: number;
  restartsBudgetExceeded: number;
};

function emptyCounters(): RunCounters {
  return {
    nagsSent: 0,
    nagsFailed: 0,
    nagsSimulated: 0,
    restartsRequested: 0,
    restartsSimulated: 0,
    restartsSubmitFailed: 0,
    restartsSucceeded: 0,
    restartsFailed: 0,
    restartsSkipped: 0,
    restartsBudgetExceeded: 0,
  };
}

/**
 * Everything one run mutates: counters and the pending power-action set.
 *
 * Budget checks and increments happen in one synchronous step, so concurrent submitters
 * cannot both take the last slot.
 */
export class RunContext {
  readonly maxRestartActions: number;
  private readonly counters: RunCounters = emptyCounters();
  private readonly pending = new Map<string, PendingTask>();
  // Slots taken by restart attempts, whether they were simulated, submitted or rejected.
  private reserved = 0;

  constructor(opts: { maxRestartActions: number }) {
    this.maxRestartActions = Math.max(0, Math.floor(opts.maxRestartActions));
  }

  get snapshot(): Readonly<RunCounters> {
    return { ...this.counters };
  }

  restartsAttempted(): number {
    return this.reserved;
  }

  /**
   * Takes one budget slot. A real submission is counted as requested only once the broker
   * hands back a task id; until then only the slot is taken.
   */
  tryReserveRestart(simulate: boolean): boolean {
    if (this.reserved >= this.maxRestartActions) {
      this.counters.restartsBudgetExceeded += 1;
      return false;
    }
    this.reserved += 1;
    if (simulate) this.counters.restartsSimulated += 1;
    return true;
  }

  count(counter: Exclude<keyof RunCounters, 'restartsSimulated' | 'restartsBudgetExceeded'>) {
    this.counters[counter] += 1;
  }

  addPending(task: PendingTask) {
    this.pending.set(`${task.endpoint}\u0000${task.taskId}`, task);
  }

  removePending(task: PendingTask) {
    this.pending.delete(`${task.endpoint}\u0000${task.taskId}`);
  }

  pendingTasks(): PendingTask[] {
    return Array.from(this.pending.values());
  }
}
