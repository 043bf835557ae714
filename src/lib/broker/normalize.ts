import type {
  EndpointHealth,
  Machine,
  MachineSummaryState,
  ServiceStatus,
  Session,
  SessionState,
  TaskStatus,
} from './types';

type Origin = { siteId: string; endpoint: string };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function nonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

// Management services differ in casing (`machine_name` vs `MachineName`); accept both.
function pick(raw: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (raw[key] !== undefined && raw[key] !== null) return raw[key];
  }
  return undefined;
}

function pickString(raw: Record<string, unknown>, ...keys: string[]): string | null {
  return nonEmptyString(pick(raw, ...keys));
}

export function normalizeServiceStatus(value: unknown): ServiceStatus {
  const v = nonEmptyString(typeof value === 'number' ? String(value) : value);
  if (!v) return 'Unknown';
  const lower = v.toLowerCase();
  if (lower === 'ok' || lower === 'healthy' || lower === 'up') return 'OK';
  if (lower.includes('offline') || lower.includes('down') || lower.includes('failed')) return 'Offline';
  return 'Unknown';
}

export function normalizeEndpointHealth(raw: unknown): EndpointHealth {
  if (!isRecord(raw)) return { brokerStatus: 'Unknown', hypervisorStatus: 'Unknown' };
  return {
    brokerStatus: normalizeServiceStatus(pick(raw, 'broker_status', 'BrokerStatus', 'ServiceStatus')),
    hypervisorStatus: normalizeServiceStatus(pick(raw, 'hypervisor_status', 'HypervisorStatus')),
  };
}

export function normalizeMachineSummaryState(value: unknown): MachineSummaryState {
  const v = nonEmptyString(value)?.toLowerCase();
  if (v === 'available') return 'Available';
  if (v === 'inuse' || v === 'in_use' || v === 'in use' || v === 'disconnected') return 'InUse';
  if (v === 'off' || v === 'poweredoff') return 'Off';
  if (v === 'unregistered') return 'Unregistered';
  return 'Unknown';
}

export function normalizeSessionState(value: unknown): SessionState {
  const v = nonEmptyString(value)?.toLowerCase();
  if (v === 'active') return 'Active';
  if (v === 'connected') return 'Connected';
  if (v === 'disconnected') return 'Disconnected';
  return 'Unknown';
}

function toIsoTimestamp(value: unknown): string | null {
  const v = nonEmptyString(value);
  if (!v) return null;
  const ms = Date.parse(v);
  return Number.isFinite(ms) ? new Date(ms).toISOString() : null;
}

function toBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') return value.trim().toLowerCase() === 'true';
  return false;
}

// `DOMAIN\MACHINE01` → `machine01.<dns suffix>` is the broker's job; fall back to the bare name.
function hostNameFrom(raw: Record<string, unknown>, machineName: string): string {
  const dns = pickString(raw, 'dns_name', 'DNSName', 'host_name', 'HostName');
  if (dns) return dns;
  const slash = machineName.lastIndexOf('\\');
  return slash >= 0 ? machineName.slice(slash + 1) : machineName;
}

export function normalizeMachine(raw: unknown, origin: Origin): Machine | null {
  if (!isRecord(raw)) return null;
  const name = pickString(raw, 'machine_name', 'MachineName', 'name', 'Name');
  const id = pickString(raw, 'uid', 'Uid', 'id', 'Id') ?? name;
  if (!id || !name) return null;

  return {
    id,
    name,
    hostName: hostNameFrom(raw, name),
    desktopGroup: pickString(raw, 'desktop_group_name', 'DesktopGroupName', 'desktop_group'),
    summaryState: normalizeMachineSummaryState(pick(raw, 'summary_state', 'SummaryState')),
    inMaintenanceMode: toBoolean(pick(raw, 'in_maintenance_mode', 'InMaintenanceMode')),
    diskImage: null,
    siteId: origin.siteId,
    endpoint: origin.endpoint,
  };
}

export function normalizeSession(raw: unknown, origin: Origin): Session | null {
  if (!isRecord(raw)) return null;
  const id = pickString(raw, 'session_uid', 'Uid', 'uid', 'id');
  const machineName = pickString(raw, 'machine_name', 'MachineName');
  const machineId = pickString(raw, 'machine_uid', 'MachineUid', 'machine_id') ?? machineName;
  if (!id || !machineName || !machineId) return null;

  return {
    id,
    machineId,
    machineName,
    hostName: hostNameFrom(raw, machineName),
    userName: pickString(raw, 'user_name', 'UserName'),
    desktopGroup: pickString(raw, 'desktop_group_name', 'DesktopGroupName', 'desktop_group'),
    sessionState: normalizeSessionState(pick(raw, 'session_state', 'SessionState')),
    sessionStateChangeTime: toIsoTimestamp(pick(raw, 'session_state_change_time', 'SessionStateChangeTime')),
    diskImage: null,
    siteId: origin.siteId,
    endpoint: origin.endpoint,
  };
}

export function normalizeList<T>(raw: unknown, fn: (item: unknown) => T | null): T[] {
  const items = Array.isArray(raw) ? raw : isRecord(raw) && Array.isArray(raw.items) ? raw.items : [];
  const out: T[] = [];
  for (const item of items) {
    const normalized = fn(item);
    if (normalized) out.push(normalized);
  }
  return out;
}

const PENDING_TASK_STATES = new Set(['pending', 'running', 'inprogress', 'in_progress', 'queued', 'notstarted']);
const SUCCESS_TASK_STATES = new Set(['completed', 'success', 'succeeded', 'finished']);

/**
 * Maps a task payload to pending/completed. Unrecognized states stay pending so the monitor
 * keeps asking until its deadline instead of guessing an outcome.
 */
export function normalizeTaskStatus(raw: unknown): TaskStatus {
  if (!isRecord(raw)) return { state: 'pending' };
  const state = pickString(raw, 'state', 'State', 'status', 'Status')?.toLowerCase() ?? '';
  const completionTime = toIsoTimestamp(pick(raw, 'completion_time', 'ActionCompletionTime', 'completed_at'));
  const detail = pickString(raw, 'failure_reason', 'FailureReason', 'detail') ?? undefined;

  if (PENDING_TASK_STATES.has(state) || !state) return { state: 'pending' };
  if (SUCCESS_TASK_STATES.has(state)) return { state: 'completed', outcome: 'success', completionTime };
  if (state === 'failed' || state === 'canceled' || state === 'cancelled' || state === 'lost' || state === 'deleted') {
    return { state: 'completed', outcome: 'failure', completionTime, ...(detail ? { detail } : {}) };
  }
  return { state: 'pending' };
}
