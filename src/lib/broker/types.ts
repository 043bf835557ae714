export type ServiceStatus = 'OK' | 'Offline' | 'Unknown';

export type EndpointHealth = {
  brokerStatus: ServiceStatus;
  hypervisorStatus: ServiceStatus;
};

export type MachineSummaryState = 'Available' | 'InUse' | 'Off' | 'Unregistered' | 'Unknown';

export type SessionState = 'Active' | 'Connected' | 'Disconnected' | 'Unknown';

export type Machine = {
  id: string;
  name: string;
  // DNS name the disk image query is sent to.
  hostName: string;
  desktopGroup: string | null;
  summaryState: MachineSummaryState;
  inMaintenanceMode: boolean;
  diskImage: string | null;
  siteId: string;
  endpoint: string;
};

export type Session = {
  id: string;
  machineId: string;
  machineName: string;
  hostName: string;
  userName: string | null;
  desktopGroup: string | null;
  sessionState: SessionState;
  sessionStateChangeTime: string | null;
  diskImage: string | null;
  siteId: string;
  endpoint: string;
};

export type TaskStatus =
  | { state: 'pending' }
  | { state: 'completed'; outcome: 'success' | 'failure'; completionTime: string | null; detail?: string };

export type NotificationResult = 'ok' | 'fail';

/**
 * Management service of one site (broker + hypervisor connection).
 *
 * `probe` never throws; every other call may reject with a `BrokerClientError`.
 * `pollTask` gives up when `signal` aborts.
 */
export interface BrokerApi {
  probe(endpoint: string): Promise<EndpointHealth>;
  siteOf(endpoint: string): Promise<string | null>;
  listAvailableMachines(endpoint: string, groupFilter: string, maxRecords: number): Promise<Machine[]>;
  listSessions(endpoint: string, groupFilter: string, maxRecords: number): Promise<Session[]>;
  refreshMachine(endpoint: string, machineId: string): Promise<Machine | null>;
  refreshSession(endpoint: string, sessionId: string): Promise<Session | null>;
  submitRestart(endpoint: string, machineId: string): Promise<string>;
  submitNotification(endpoint: string, sessionId: string, title: string, text: string): Promise<NotificationResult>;
  pollTask(endpoint: string, taskId: string, signal?: AbortSignal): Promise<TaskStatus>;
}
