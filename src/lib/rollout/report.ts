import type { RunContext, RunCounters } from './run-context';
import type { ActionRecord, PendingTask } from './types';

export type GroupKey = 'status' | 'action' | 'diskImage';

export type GroupCount = { name: string; count: number };

export const UNRESOLVED_IMAGE = '(unresolved)';

export type RunReport = {
  records: number;
  byStatus: GroupCount[];
  byAction: GroupCount[];
  byDiskImage: GroupCount[];
  counters: RunCounters & { restartsPending: number };
  pendingTasks: PendingTask[];
  startedAt: string;
  finishedAt: string;
  elapsedMs: number;
};

function groupName(record: ActionRecord, key: GroupKey): string {
  if (key === 'status') return record.status;
  if (key === 'action') return record.action;
  return record.entity.diskImage ?? UNRESOLVED_IMAGE;
}

export function groupCounts(records: readonly ActionRecord[], key: GroupKey): GroupCount[] {
  const counts = new Map<string, number>();
  for (const record of records) {
    const name = groupName(record, key);
    counts.set(name, (counts.get(name) ?? 0) + 1);
  }
  return Array.from(counts, ([name, count]) => ({ name, count })).sort(
    (a, b) => b.count - a.count || a.name.localeCompare(b.name),
  );
}

export function buildRunReport(
  records: readonly ActionRecord[],
  context: RunContext,
  timing: { startedAt: Date; finishedAt: Date },
): RunReport {
  const pendingTasks = context.pendingTasks();
  return {
    records: records.length,
    byStatus: groupCounts(records, 'status'),
    byAction: groupCounts(records, 'action'),
    byDiskImage: groupCounts(records, 'diskImage'),
    counters: { ...context.snapshot, restartsPending: pendingTasks.length },
    pendingTasks,
    startedAt: timing.startedAt.toISOString(),
    finishedAt: timing.finishedAt.toISOString(),
    elapsedMs: Math.max(0, timing.finishedAt.getTime() - timing.startedAt.getTime()),
  };
}

function formatGroup(title: string, groups: readonly GroupCount[]): string[] {
  if (groups.length === 0) return [`${title}: none`];
  return [`${title}:`, ...groups.map((g) => `  ${g.name}: ${g.count}`)];
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.round(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return minutes > 0 ? `${minutes}m ${seconds}s` : `${seconds}s`;
}

export function formatRunReport(report: RunReport): string[] {
  const c = report.counters;
  return [
    `Records analyzed: ${report.records}`,
    ...formatGroup('By update status', report.byStatus),
    ...formatGroup('By proposed action', report.byAction),
    ...formatGroup('By disk image', report.byDiskImage),
    `Nags: sent ${c.nagsSent}, failed ${c.nagsFailed}, simulated ${c.nagsSimulated}`,
    `Restarts: requested ${c.restartsRequested}, simulated ${c.restartsSimulated}, submit failed ${c.restartsSubmitFailed}, ` +
      `succeeded ${c.restartsSucceeded}, failed ${c.restartsFailed}, pending ${c.restartsPending}`,
    `Restarts not attempted: stale ${c.restartsSkipped}, over budget ${c.restartsBudgetExceeded}`,
    ...report.pendingTasks.map((t) => `  still pending: ${t.machineName} (task ${t.taskId} on ${t.endpoint})`),
    `Elapsed: ${formatDuration(report.elapsedMs)}`,
  ];
}
