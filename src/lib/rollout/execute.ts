import { errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { BrokerClientError } from '@/lib/broker/client';

import type { BrokerApi, Machine, Session } from '@/lib/broker/types';
import type { RunContext } from './run-context';
import type { ActionRecord, MachineRecord, SessionRecord } from './types';

export type ActionOutcome =
  | 'restart_submitted'
  | 'restart_simulated'
  | 'restart_submit_failed'
  | 'restart_budget_exceeded'
  | 'restart_skipped_stale'
  | 'nag_sent'
  | 'nag_simulated'
  | 'nag_failed'
  | 'nag_skipped';

export type ExecutedAction = {
  kind: ActionRecord['kind'];
  entityId: string;
  siteId: string;
  outcome: ActionOutcome;
  taskId?: string;
};

export type ExecuteOptions = {
  broker: BrokerApi;
  context: RunContext;
  notification: { title: string; text: string };
  simulate: boolean;
  random?: () => number;
  clock?: () => number;
};

function errorFields(err: unknown): Record<string, unknown> {
  return err instanceof BrokerClientError ? { error: err.appError } : { cause_excerpt: errorMessage(err) };
}

/**
 * Fisher–Yates over a copy, so no single site drains the restart budget just by being listed first.
 */
export function shuffleRecords<T>(records: readonly T[], random: () => number = Math.random): T[] {
  const out = records.slice();
  for (let i = out.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}

export async function executeActions(
  records: readonly ActionRecord[],
  opts: ExecuteOptions,
): Promise<ExecutedAction[]> {
  const clock = opts.clock ?? Date.now;
  const results: ExecutedAction[] = [];
  const actionable = shuffleRecords(
    records.filter((r) => r.action !== 'None'),
    opts.random,
  );

  const done = (record: ActionRecord, outcome: ActionOutcome, taskId?: string) => {
    results.push({
      kind: record.kind,
      entityId: record.entity.id,
      siteId: record.entity.siteId,
      outcome,
      ...(taskId ? { taskId } : {}),
    });
  };

  const skipStale = (record: ActionRecord, reason: string, extra?: Record<string, unknown>) => {
    opts.context.count('restartsSkipped');
    logEvent({
      level: 'info',
      service: 'rollout',
      event_type: 'action.restart_skipped_stale',
      kind: record.kind,
      entity_id: record.entity.id,
      site_id: record.entity.siteId,
      reason,
      ...extra,
    });
    done(record, 'restart_skipped_stale');
  };

  async function restart(record: ActionRecord, target: { machineId: string; machineName: string }) {
    const { endpoint, siteId } = record.entity;
    if (!opts.context.tryReserveRestart(opts.simulate)) {
      logEvent({
        level: 'warn',
        service: 'rollout',
        event_type: 'action.restart_budget_exceeded',
        site_id: siteId,
        machine: target.machineName,
        max_restart_actions: opts.context.maxRestartActions,
      });
      done(record, 'restart_budget_exceeded');
      return;
    }

    if (opts.simulate) {
      logEvent({
        level: 'info',
        service: 'rollout',
        event_type: 'action.restart_simulated',
        site_id: siteId,
        endpoint,
        machine: target.machineName,
      });
      done(record, 'restart_simulated');
      return;
    }

    try {
      const taskId = await opts.broker.submitRestart(endpoint, target.machineId);
      opts.context.count('restartsRequested');
      opts.context.addPending({ taskId, endpoint, siteId, machineName: target.machineName, submittedAt: clock() });
      logEvent({
        level: 'info',
        service: 'rollout',
        event_type: 'action.restart_submitted',
        site_id: siteId,
        endpoint,
        machine: target.machineName,
        task_id: taskId,
      });
      done(record, 'restart_submitted', taskId);
    } catch (err) {
      opts.context.count('restartsSubmitFailed');
      logEvent({
        level: 'error',
        service: 'rollout',
        event_type: 'action.restart_submit_failed',
        site_id: siteId,
        endpoint,
        machine: target.machineName,
        ...errorFields(err),
      });
      done(record, 'restart_submit_failed');
    }
  }

  async function nag(record: ActionRecord, session: Session) {
    const { endpoint, siteId } = record.entity;
    if (opts.simulate) {
      opts.context.count('nagsSimulated');
      logEvent({
        level: 'info',
        service: 'rollout',
        event_type: 'action.notification_simulated',
        site_id: siteId,
        session_id: session.id,
        user: session.userName,
      });
      done(record, 'nag_simulated');
      return;
    }

    let result: 'ok' | 'fail';
    let failure: Record<string, unknown> = {};
    try {
      result = await opts.broker.submitNotification(endpoint, session.id, opts.notification.title, opts.notification.text);
    } catch (err) {
      result = 'fail';
      failure = errorFields(err);
    }

    if (result === 'ok') {
      opts.context.count('nagsSent');
      logEvent({
        level: 'info',
        service: 'rollout',
        event_type: 'action.notification_sent',
        site_id: siteId,
        session_id: session.id,
        user: session.userName,
      });
      done(record, 'nag_sent');
      return;
    }

    opts.context.count('nagsFailed');
    logEvent({
      level: 'error',
      service: 'rollout',
      event_type: 'action.notification_failed',
      site_id: siteId,
      session_id: session.id,
      user: session.userName,
      ...failure,
    });
    done(record, 'nag_failed');
  }

  async function lookupSession(record: SessionRecord): Promise<Session | null> {
    try {
      return await opts.broker.refreshSession(record.entity.endpoint, record.entity.id);
    } catch (err) {
      logEvent({
        level: 'warn',
        service: 'rollout',
        event_type: 'action.session_lookup_failed',
        site_id: record.entity.siteId,
        session_id: record.entity.id,
        ...errorFields(err),
      });
      return null;
    }
  }

  async function lookupMachine(record: MachineRecord): Promise<{ machine: Machine | null; failure?: unknown }> {
    try {
      return { machine: await opts.broker.refreshMachine(record.entity.endpoint, record.entity.id) };
    } catch (err) {
      return { machine: null, failure: err };
    }
  }

  for (const record of actionable) {
    if (record.kind === 'machine') {
      if (record.action !== 'Restart') continue;
      const { machine, failure } = await lookupMachine(record);
      if (failure !== undefined) {
        skipStale(record, 'lookup_failed', errorFields(failure));
        continue;
      }
      if (!machine) {
        skipStale(record, 'machine_gone');
        continue;
      }
      if (machine.summaryState !== 'Available' || machine.inMaintenanceMode) {
        skipStale(record, 'machine_not_available', {
          summary_state: machine.summaryState,
          in_maintenance_mode: machine.inMaintenanceMode,
        });
        continue;
      }
      await restart(record, { machineId: machine.id, machineName: machine.name });
      continue;
    }

    const live = await lookupSession(record);
    if (!live) {
      if (record.action === 'Restart') {
        skipStale(record, 'session_gone');
      } else {
        logEvent({
          level: 'info',
          service: 'rollout',
          event_type: 'action.notification_skipped',
          site_id: record.entity.siteId,
          session_id: record.entity.id,
          reason: 'session_gone',
        });
        done(record, 'nag_skipped');
      }
      continue;
    }

    if (record.action === 'Restart' && live.sessionState !== 'Active') {
      await restart(record, { machineId: live.machineId, machineName: live.machineName });
      continue;
    }

    if (record.action === 'Restart') {
      logEvent({
        level: 'info',
        service: 'rollout',
        event_type: 'action.restart_downgraded',
        site_id: record.entity.siteId,
        session_id: live.id,
        machine: live.machineName,
      });
    }
    await nag(record, live);
  }

  return results;
}
