import { matchesGlob } from '@/lib/rollout/glob';

import type {
  BrokerApi,
  EndpointHealth,
  Machine,
  NotificationResult,
  Session,
  TaskStatus,
} from '@/lib/broker/types';

export type FakeSite = {
  siteId: string | null;
  health?: EndpointHealth;
  probeThrows?: boolean;
  machines?: Machine[];
  sessions?: Session[];
  listThrows?: boolean;
};

export function makeMachine(partial: Partial<Machine> & Pick<Machine, 'id' | 'siteId' | 'endpoint'>): Machine {
  return {
    name: `CORP\\${partial.id.toUpperCase()}`,
    hostName: `${partial.id}.corp.example`,
    desktopGroup: 'Shared Desktops',
    summaryState: 'Available',
    inMaintenanceMode: false,
    diskImage: null,
    ...partial,
  };
}

export function makeSession(partial: Partial<Session> & Pick<Session, 'id' | 'siteId' | 'endpoint'>): Session {
  const machineId = partial.machineId ?? `${partial.id}-vm`;
  return {
    machineId,
    machineName: `CORP\\${machineId.toUpperCase()}`,
    hostName: `${machineId}.corp.example`,
    userName: 'CORP\\user',
    desktopGroup: 'Shared Desktops',
    sessionState: 'Disconnected',
    sessionStateChangeTime: '2026-10-17T00:00:00.000Z',
    diskImage: null,
    ...partial,
  };
}

/**
 * In-process stand-in for the management service of several sites, keyed by endpoint.
 */
export class FakeBroker implements BrokerApi {
  readonly restarts: Array<{ endpoint: string; machineId: string; taskId: string }> = [];
  readonly notifications: Array<{ endpoint: string; sessionId: string; title: string; text: string }> = [];
  readonly polls: Array<{ endpoint: string; taskId: string }> = [];

  failRestartFor = new Set<string>();
  failNotificationFor = new Set<string>();
  taskBehavior: (taskId: string, pollCount: number) => TaskStatus = () => ({
    state: 'completed',
    outcome: 'success',
    completionTime: '2026-10-18T12:05:00.000Z',
  });

  private readonly sites: Map<string, FakeSite>;
  private readonly pollCounts = new Map<string, number>();
  private nextTask = 1;

  constructor(sites: Record<string, FakeSite>) {
    this.sites = new Map(Object.entries(sites));
  }

  private site(endpoint: string): FakeSite {
    const site = this.sites.get(endpoint);
    if (!site) throw new Error(`connect ECONNREFUSED ${endpoint}`);
    return site;
  }

  updateMachine(endpoint: string, id: string, patch: Partial<Machine>) {
    const site = this.site(endpoint);
    site.machines = (site.machines ?? []).map((m) => (m.id === id ? { ...m, ...patch } : m));
  }

  updateSession(endpoint: string, id: string, patch: Partial<Session>) {
    const site = this.site(endpoint);
    site.sessions = (site.sessions ?? []).map((s) => (s.id === id ? { ...s, ...patch } : s));
  }

  removeSession(endpoint: string, id: string) {
    const site = this.site(endpoint);
    site.sessions = (site.sessions ?? []).filter((s) => s.id !== id);
  }

  async probe(endpoint: string): Promise<EndpointHealth> {
    const site = this.sites.get(endpoint);
    if (!site) return { brokerStatus: 'Offline', hypervisorStatus: 'Offline' };
    if (site.probeThrows) throw new Error('probe exploded');
    return site.health ?? { brokerStatus: 'OK', hypervisorStatus: 'OK' };
  }

  async siteOf(endpoint: string): Promise<string | null> {
    return this.site(endpoint).siteId;
  }

  async listAvailableMachines(endpoint: string, groupFilter: string, maxRecords: number): Promise<Machine[]> {
    const site = this.site(endpoint);
    if (site.listThrows) throw new Error('broker listing failed');
    return (site.machines ?? [])
      .filter((m) => m.summaryState === 'Available' && matchesGlob(groupFilter, m.desktopGroup))
      .slice(0, maxRecords)
      .map((m) => ({ ...m, diskImage: null }));
  }

  async listSessions(endpoint: string, groupFilter: string, maxRecords: number): Promise<Session[]> {
    const site = this.site(endpoint);
    if (site.listThrows) throw new Error('broker listing failed');
    return (site.sessions ?? [])
      .filter((s) => matchesGlob(groupFilter, s.desktopGroup))
      .slice(0, maxRecords)
      .map((s) => ({ ...s, diskImage: null }));
  }

  async refreshMachine(endpoint: string, machineId: string): Promise<Machine | null> {
    return (this.site(endpoint).machines ?? []).find((m) => m.id === machineId) ?? null;
  }

  async refreshSession(endpoint: string, sessionId: string): Promise<Session | null> {
    return (this.site(endpoint).sessions ?? []).find((s) => s.id === sessionId) ?? null;
  }

  async submitRestart(endpoint: string, machineId: string): Promise<string> {
    this.site(endpoint);
    if (this.failRestartFor.has(machineId)) throw new Error('hypervisor rejected the power action');
    const taskId = `task-${this.nextTask++}`;
    this.restarts.push({ endpoint, machineId, taskId });
    return taskId;
  }

  async submitNotification(endpoint: string, sessionId: string, title: string, text: string): Promise<NotificationResult> {
    this.site(endpoint);
    if (this.failNotificationFor.has(sessionId)) return 'fail';
    this.notifications.push({ endpoint, sessionId, title, text });
    return 'ok';
  }

  async pollTask(endpoint: string, taskId: string, _signal?: AbortSignal): Promise<TaskStatus> {
    this.polls.push({ endpoint, taskId });
    const count = (this.pollCounts.get(taskId) ?? 0) + 1;
    this.pollCounts.set(taskId, count);
    return this.taskBehavior(taskId, count);
  }
}
