import { classify } from './classify';

import type { Machine, Session } from '@/lib/broker/types';
import type { ActionRecord, MachineRecord, ProposedAction, SessionRecord, UpdateStatus, VersionPatterns } from './types';

const HOUR_MS = 60 * 60 * 1000;

export type SessionPlanOptions = {
  now: Date;
  restartIdleHours: number;
};

export function isInactive(session: Pick<Session, 'sessionState'>): boolean {
  return session.sessionState !== 'Active';
}

/**
 * Time since the session last changed state. An unknown change time counts as no idle time,
 * so such a session is never force-restarted.
 */
export function idleDurationMs(session: Pick<Session, 'sessionStateChangeTime'>, now: Date): number {
  if (!session.sessionStateChangeTime) return 0;
  const changedAt = Date.parse(session.sessionStateChangeTime);
  if (!Number.isFinite(changedAt)) return 0;
  return Math.max(0, now.getTime() - changedAt);
}

export function planMachineAction(status: UpdateStatus): ProposedAction {
  return status === 'RestartRequired' ? 'Restart' : 'None';
}

export function planSessionAction(
  status: UpdateStatus,
  session: Pick<Session, 'sessionState' | 'sessionStateChangeTime'>,
  opts: SessionPlanOptions,
): ProposedAction {
  if (status !== 'RestartRequired') return 'None';
  const idleEnough = idleDurationMs(session, opts.now) >= opts.restartIdleHours * HOUR_MS;
  return isInactive(session) && idleEnough ? 'Restart' : 'Nag';
}

// Machines in maintenance mode are never restarted and never hold the session gate.
export function planMachines(machines: readonly Machine[], patterns: VersionPatterns): MachineRecord[] {
  return machines.map((machine) => {
    const status = classify(machine.diskImage, patterns.allVersions, patterns.targetVersion);
    const action = machine.inMaintenanceMode ? 'None' : planMachineAction(status);
    return { kind: 'machine', entity: machine, status, action };
  });
}

export function planSessions(
  sessions: readonly Session[],
  patterns: VersionPatterns,
  opts: SessionPlanOptions,
): SessionRecord[] {
  return sessions.map((session) => {
    const status = classify(session.diskImage, patterns.allVersions, patterns.targetVersion);
    return { kind: 'session', entity: session, status, action: planSessionAction(status, session, opts) };
  });
}

/**
 * Session work on a site waits while any of its available machines still needs a restart:
 * those machines are the less disruptive way to move users onto the new image.
 */
export function hasOutstandingMachineRestarts(records: readonly ActionRecord[], siteId: string): boolean {
  return records.some((r) => r.kind === 'machine' && r.action === 'Restart' && r.entity.siteId === siteId);
}
