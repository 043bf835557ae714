import { logEvent } from '@/lib/logging/logger';

import { compilePattern } from './classify';
import { selectHealthyEndpoints } from './endpoints';
import { executeActions } from './execute';
import { collectInventory } from './inventory';
import { monitorPowerActions } from './monitor';
import { hasOutstandingMachineRestarts, planMachines, planSessions } from './plan';
import { buildRunReport } from './report';
import { RunContext } from './run-context';

import type { RunConfig, RunMode } from '@/lib/config/run-config';
import type { BrokerApi } from '@/lib/broker/types';
import type { DiskImageQuery } from '@/lib/disk-image/query';
import type { ExecutedAction } from './execute';
import type { MonitorOptions, MonitorResult } from './monitor';
import type { RunReport } from './report';
import type { ActionRecord, MachineRecord, SessionRecord, VersionPatterns } from './types';

export type RolloutDeps = {
  broker: BrokerApi;
  diskImages: DiskImageQuery;
  clock?: () => number;
  random?: () => number;
  sleep?: MonitorOptions['sleep'];
  onMonitorProgress?: MonitorOptions['onProgress'];
  signal?: AbortSignal;
};

export type SiteAnalysis = {
  siteId: string;
  endpoint: string;
  machines: MachineRecord[];
  sessions: SessionRecord[];
  sessionPassDeferred: boolean;
};

export type RolloutResult = {
  mode: RunMode;
  sites: Map<string, string>;
  analyses: SiteAnalysis[];
  records: ActionRecord[];
  executed: ExecutedAction[];
  monitor: MonitorResult | null;
  report: RunReport | null;
};

export function compilePatterns(config: Pick<RunConfig, 'allVersionsPattern' | 'targetVersionPattern'>): VersionPatterns {
  return {
    allVersions: compilePattern(config.allVersionsPattern, 'all_versions_pattern'),
    targetVersion: compilePattern(config.targetVersionPattern, 'target_version_pattern'),
  };
}

async function analyzeSite(
  config: RunConfig,
  deps: RolloutDeps,
  patterns: VersionPatterns,
  site: { siteId: string; endpoint: string },
  clock: () => number,
): Promise<SiteAnalysis> {
  const inventory = {
    broker: deps.broker,
    diskImages: deps.diskImages,
    endpoint: site.endpoint,
    siteId: site.siteId,
    desktopGroup: config.desktopGroup,
    maxRecords: config.maxRecords,
    concurrency: config.queryConcurrency,
    timeoutMs: config.queryTimeoutMs,
  };

  const machines =
    config.searchScope === 'MachinesWithSessions'
      ? []
      : planMachines(await collectInventory({ ...inventory, kind: 'machines' }), patterns);

  if (config.searchScope === 'AvailableMachines') {
    return { ...site, machines, sessions: [], sessionPassDeferred: false };
  }

  if (hasOutstandingMachineRestarts(machines, site.siteId)) {
    logEvent({
      level: 'info',
      service: 'rollout',
      event_type: 'rollout.session_pass_deferred',
      site_id: site.siteId,
      endpoint: site.endpoint,
      machine_restarts: machines.filter((r) => r.action === 'Restart').length,
    });
    return { ...site, machines, sessions: [], sessionPassDeferred: true };
  }

  const sessions = planSessions(await collectInventory({ ...inventory, kind: 'sessions' }), patterns, {
    now: new Date(clock()),
    restartIdleHours: config.restartIdleHours,
  });
  return { ...site, machines, sessions, sessionPassDeferred: false };
}

/**
 * One run: bind endpoints, analyze each site, then act on every site's records together
 * and wait for the submitted power actions unless the run is asynchronous.
 */
export async function runRollout(config: RunConfig, deps: RolloutDeps): Promise<RolloutResult> {
  const clock = deps.clock ?? Date.now;
  const startedAt = new Date(clock());
  const patterns = compilePatterns(config);
  const context = new RunContext({ maxRestartActions: config.maxRestartActions });

  logEvent({
    level: 'info',
    service: 'rollout',
    event_type: 'rollout.started',
    mode: config.mode,
    simulate: config.simulate,
    run_async: config.runAsync,
    search_scope: config.searchScope,
    desktop_group: config.desktopGroup,
    endpoints: config.endpoints.length,
    max_restart_actions: context.maxRestartActions,
  });

  const sites = await selectHealthyEndpoints(config.endpoints, {
    broker: deps.broker,
    concurrency: config.queryConcurrency,
  });

  if (config.mode === 'healthcheck') {
    logEvent({
      level: 'info',
      service: 'rollout',
      event_type: 'rollout.healthcheck',
      sites: Object.fromEntries(sites),
    });
    return { mode: config.mode, sites, analyses: [], records: [], executed: [], monitor: null, report: null };
  }

  const analyses: SiteAnalysis[] = [];
  for (const [siteId, endpoint] of sites) {
    analyses.push(await analyzeSite(config, deps, patterns, { siteId, endpoint }, clock));
  }
  const records: ActionRecord[] = analyses.flatMap((a) => [...a.machines, ...a.sessions]);

  let executed: ExecutedAction[] = [];
  let monitor: MonitorResult | null = null;

  if (config.mode === 'remediate') {
    executed = await executeActions(records, {
      broker: deps.broker,
      context,
      notification: config.notification,
      simulate: config.simulate,
      random: deps.random,
      clock,
    });

    if (config.runAsync) {
      logEvent({
        level: 'info',
        service: 'rollout',
        event_type: 'power_action.monitor_skipped',
        pending: context.pendingTasks().length,
      });
    } else if (context.pendingTasks().length > 0) {
      monitor = await monitorPowerActions({
        broker: deps.broker,
        context,
        timeoutMs: config.powerActionTimeoutMs,
        pollIntervalMs: config.pollIntervalMs,
        sleep: deps.sleep,
        now: clock,
        onProgress: deps.onMonitorProgress,
        signal: deps.signal,
      });
    }
  }

  const report = buildRunReport(records, context, { startedAt, finishedAt: new Date(clock()) });
  logEvent({
    level: 'info',
    service: 'rollout',
    event_type: 'rollout.summary',
    mode: config.mode,
    simulate: config.simulate,
    sites: sites.size,
    deferred_sites: analyses.filter((a) => a.sessionPassDeferred).map((a) => a.siteId),
    records: report.records,
    by_status: report.byStatus,
    by_action: report.byAction,
    by_disk_image: report.byDiskImage,
    counters: report.counters,
    elapsed_ms: report.elapsedMs,
  });

  return { mode: config.mode, sites, analyses, records, executed, monitor, report };
}
