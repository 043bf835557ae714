import type { Machine, Session } from '@/lib/broker/types';

export const UPDATE_STATUSES = ['Ineligible', 'Unknown', 'RestartRequired', 'UpdateCompleted'] as const;
export type UpdateStatus = (typeof UPDATE_STATUSES)[number];

export type ProposedAction = 'None' | 'Nag' | 'Restart';

export type MachineRecord = {
  readonly kind: 'machine';
  readonly entity: Readonly<Machine>;
  readonly status: UpdateStatus;
  readonly action: ProposedAction;
};

export type SessionRecord = {
  readonly kind: 'session';
  readonly entity: Readonly<Session>;
  readonly status: UpdateStatus;
  readonly action: ProposedAction;
};

export type ActionRecord = MachineRecord | SessionRecord;

export type VersionPatterns = {
  allVersions: RegExp;
  targetVersion: RegExp;
};

export type PendingTask = {
  taskId: string;
  endpoint: string;
  siteId: string;
  machineName: string;
  submittedAt: number;
};
