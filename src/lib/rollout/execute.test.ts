import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { FakeBroker, makeMachine, makeSession } from '@/test/fake-broker';

import { executeActions, shuffleRecords } from './execute';
import { RunContext } from './run-context';

import type { Machine, Session } from '@/lib/broker/types';
import type { ActionRecord, ProposedAction } from './types';

const EAST = 'ddc01.corp.example';
const WEST = 'ddc02.corp.example';
const notification = { title: 'Image update', text: 'Please log off to pick up the new desktop image.' };

function machineRecord(machine: Machine, action: ProposedAction = 'Restart'): ActionRecord {
  return { kind: 'machine', entity: machine, status: 'RestartRequired', action };
}

function sessionRecord(session: Session, action: ProposedAction): ActionRecord {
  return { kind: 'session', entity: session, status: 'RestartRequired', action };
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('shuffleRecords', () => {
  it('returns a permutation and leaves the input untouched', () => {
    const input = [1, 2, 3, 4, 5];
    const out = shuffleRecords(input, () => 0);

    expect(out).toEqual([2, 3, 4, 5, 1]);
    expect(input).toEqual([1, 2, 3, 4, 5]);
    expect([...out].sort()).toEqual(input);
  });

  it('keeps order when random always picks the last slot', () => {
    expect(shuffleRecords(['a', 'b', 'c'], () => 0.999)).toEqual(['a', 'b', 'c']);
  });
});

describe('executeActions', () => {
  it('restarts an available machine and records the pending task', async () => {
    const m = makeMachine({ id: 'vdi-001', siteId: 'east', endpoint: EAST });
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines: [m] } });
    const context = new RunContext({ maxRestartActions: 10 });

    const res = await executeActions([machineRecord(m)], {
      broker,
      context,
      notification,
      simulate: false,
      clock: () => 1_000,
    });

    expect(res).toEqual([{ kind: 'machine', entityId: 'vdi-001', siteId: 'east', outcome: 'restart_submitted', taskId: 'task-1' }]);
    expect(broker.restarts).toEqual([{ endpoint: EAST, machineId: 'vdi-001', taskId: 'task-1' }]);
    expect(context.pendingTasks()).toEqual([
      { taskId: 'task-1', endpoint: EAST, siteId: 'east', machineName: 'CORP\\VDI-001', submittedAt: 1_000 },
    ]);
    expect(context.snapshot.restartsRequested).toBe(1);
  });

  it('skips a machine that is no longer available', async () => {
    const m = makeMachine({ id: 'vdi-001', siteId: 'east', endpoint: EAST });
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines: [m] } });
    broker.updateMachine(EAST, 'vdi-001', { summaryState: 'InUse' });
    const context = new RunContext({ maxRestartActions: 10 });

    const res = await executeActions([machineRecord(m)], { broker, context, notification, simulate: false });

    expect(res.map((r) => r.outcome)).toEqual(['restart_skipped_stale']);
    expect(broker.restarts).toEqual([]);
    expect(context.snapshot).toMatchObject({ restartsRequested: 0, restartsSkipped: 1 });
  });

  it('skips a machine put into maintenance mode or removed since analysis', async () => {
    const a = makeMachine({ id: 'vdi-001', siteId: 'east', endpoint: EAST });
    const b = makeMachine({ id: 'vdi-002', siteId: 'east', endpoint: EAST });
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines: [a] } });
    broker.updateMachine(EAST, 'vdi-001', { inMaintenanceMode: true });
    const context = new RunContext({ maxRestartActions: 10 });

    const res = await executeActions([machineRecord(a), machineRecord(b)], { broker, context, notification, simulate: false });

    expect(res.map((r) => r.outcome)).toEqual(['restart_skipped_stale', 'restart_skipped_stale']);
    expect(context.snapshot.restartsSkipped).toBe(2);
  });

  it('never lets requested plus simulated restarts exceed the budget', async () => {
    const machines = ['a', 'b', 'c', 'd', 'e'].map((id) => makeMachine({ id, siteId: 'east', endpoint: EAST }));
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines } });
    const context = new RunContext({ maxRestartActions: 2 });

    const res = await executeActions(machines.map((m) => machineRecord(m)), {
      broker,
      context,
      notification,
      simulate: false,
    });

    expect(res.filter((r) => r.outcome === 'restart_submitted')).toHaveLength(2);
    expect(res.filter((r) => r.outcome === 'restart_budget_exceeded')).toHaveLength(3);
    expect(broker.restarts).toHaveLength(2);
    expect(context.restartsAttempted()).toBe(2);
    expect(context.snapshot.restartsBudgetExceeded).toBe(3);
  });

  it('counts simulated restarts against the same budget without calling the broker', async () => {
    const machines = ['a', 'b', 'c'].map((id) => makeMachine({ id, siteId: 'east', endpoint: EAST }));
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines } });
    const context = new RunContext({ maxRestartActions: 2 });

    const res = await executeActions(machines.map((m) => machineRecord(m)), { broker, context, notification, simulate: true });

    expect(res.filter((r) => r.outcome === 'restart_simulated')).toHaveLength(2);
    expect(broker.restarts).toEqual([]);
    expect(context.pendingTasks()).toEqual([]);
    expect(context.snapshot).toMatchObject({ restartsRequested: 0, restartsSimulated: 2, restartsBudgetExceeded: 1 });
  });

  it('counts a rejected restart as a submission failure and carries on', async () => {
    const a = makeMachine({ id: 'a', siteId: 'east', endpoint: EAST });
    const b = makeMachine({ id: 'b', siteId: 'east', endpoint: EAST });
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines: [a, b] } });
    broker.failRestartFor.add('a');
    const context = new RunContext({ maxRestartActions: 5 });

    const res = await executeActions([machineRecord(a), machineRecord(b)], {
      broker,
      context,
      notification,
      simulate: false,
      random: () => 0.999,
    });

    expect(res.map((r) => [r.entityId, r.outcome])).toEqual([
      ['a', 'restart_submit_failed'],
      ['b', 'restart_submitted'],
    ]);
    expect(context.snapshot).toMatchObject({ restartsRequested: 1, restartsSubmitFailed: 1 });
    expect(context.restartsAttempted()).toBe(2);
    expect(context.pendingTasks().map((t) => t.machineName)).toEqual(['CORP\\B']);
  });

  it('spends the budget on a rejected restart', async () => {
    const a = makeMachine({ id: 'a', siteId: 'east', endpoint: EAST });
    const b = makeMachine({ id: 'b', siteId: 'east', endpoint: EAST });
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines: [a, b] } });
    broker.failRestartFor.add('a');
    const context = new RunContext({ maxRestartActions: 1 });

    const res = await executeActions([machineRecord(a), machineRecord(b)], {
      broker,
      context,
      notification,
      simulate: false,
      random: () => 0.999,
    });

    expect(res.map((r) => [r.entityId, r.outcome])).toEqual([
      ['a', 'restart_submit_failed'],
      ['b', 'restart_budget_exceeded'],
    ]);
    expect(context.snapshot).toMatchObject({ restartsRequested: 0, restartsSubmitFailed: 1, restartsBudgetExceeded: 1 });
    expect(broker.restarts).toEqual([]);
  });

  it('restarts the machine behind a session that is still inactive', async () => {
    const s = makeSession({ id: 's-1', machineId: 'vdi-009', siteId: 'west', endpoint: WEST });
    const broker = new FakeBroker({ [WEST]: { siteId: 'west', sessions: [s] } });
    const context = new RunContext({ maxRestartActions: 5 });

    await executeActions([sessionRecord(s, 'Restart')], { broker, context, notification, simulate: false });

    expect(broker.restarts).toEqual([{ endpoint: WEST, machineId: 'vdi-009', taskId: 'task-1' }]);
    expect(broker.notifications).toEqual([]);
  });

  it('downgrades a restart to a notification when the session became active', async () => {
    const s = makeSession({ id: 's-1', siteId: 'west', endpoint: WEST });
    const broker = new FakeBroker({ [WEST]: { siteId: 'west', sessions: [s] } });
    broker.updateSession(WEST, 's-1', { sessionState: 'Active' });
    const context = new RunContext({ maxRestartActions: 5 });

    const res = await executeActions([sessionRecord(s, 'Restart')], { broker, context, notification, simulate: false });

    expect(res.map((r) => r.outcome)).toEqual(['nag_sent']);
    expect(broker.restarts).toEqual([]);
    expect(broker.notifications).toEqual([{ endpoint: WEST, sessionId: 's-1', ...notification }]);
    expect(context.restartsAttempted()).toBe(0);
  });

  it('sends, fails and skips notifications without stopping', async () => {
    const ok = makeSession({ id: 's-ok', siteId: 'west', endpoint: WEST });
    const bad = makeSession({ id: 's-bad', siteId: 'west', endpoint: WEST });
    const gone = makeSession({ id: 's-gone', siteId: 'west', endpoint: WEST });
    const broker = new FakeBroker({ [WEST]: { siteId: 'west', sessions: [ok, bad] } });
    broker.failNotificationFor.add('s-bad');
    const context = new RunContext({ maxRestartActions: 5 });

    const res = await executeActions([sessionRecord(ok, 'Nag'), sessionRecord(bad, 'Nag'), sessionRecord(gone, 'Nag')], {
      broker,
      context,
      notification,
      simulate: false,
      random: () => 0.999,
    });

    expect(res.map((r) => r.outcome)).toEqual(['nag_sent', 'nag_failed', 'nag_skipped']);
    expect(context.snapshot).toMatchObject({ nagsSent: 1, nagsFailed: 1 });
  });

  it('does not send notifications in simulate mode', async () => {
    const s = makeSession({ id: 's-1', siteId: 'west', endpoint: WEST, sessionState: 'Active' });
    const broker = new FakeBroker({ [WEST]: { siteId: 'west', sessions: [s] } });
    const context = new RunContext({ maxRestartActions: 5 });

    const res = await executeActions([sessionRecord(s, 'Nag')], { broker, context, notification, simulate: true });

    expect(res.map((r) => r.outcome)).toEqual(['nag_simulated']);
    expect(broker.notifications).toEqual([]);
    expect(context.snapshot.nagsSimulated).toBe(1);
  });

  it('ignores records with no proposed action', async () => {
    const m = makeMachine({ id: 'vdi-001', siteId: 'east', endpoint: EAST });
    const broker = new FakeBroker({ [EAST]: { siteId: 'east', machines: [m] } });
    const context = new RunContext({ maxRestartActions: 5 });

    await expect(executeActions([machineRecord(m, 'None')], { broker, context, notification, simulate: false })).resolves.toEqual(
      [],
    );
  });
});
