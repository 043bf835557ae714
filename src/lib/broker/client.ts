import { ErrorCode } from '@/lib/errors/error-codes';
import { errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import {
  isRecord,
  nonEmptyString,
  normalizeEndpointHealth,
  normalizeList,
  normalizeMachine,
  normalizeSession,
  normalizeTaskStatus,
} from './normalize';

import type { AppError } from '@/lib/errors/error';
import type { BrokerApi, EndpointHealth, Machine, NotificationResult, Session, TaskStatus } from './types';

export type HttpBrokerOptions = {
  token?: string;
  timeoutMs: number;
  requestId?: string;
  fetchImpl?: typeof fetch;
};

export class BrokerClientError extends Error {
  readonly appError: AppError;

  constructor(appError: AppError) {
    super(appError.message);
    this.name = 'BrokerClientError';
    this.appError = appError;
  }
}

function excerpt(text: string, limit = 500): string {
  const trimmed = text.trim();
  return trimmed.length > limit ? trimmed.slice(0, limit) : trimmed;
}

/**
 * Management endpoints are usually configured as bare host names (`ddc01.corp.example`).
 */
export function toBaseUrl(endpoint: string): string {
  const trimmed = endpoint.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function httpError(input: {
  code: AppError['code'];
  category: AppError['category'];
  message: string;
  retryable: boolean;
  stage: string;
  url: string;
  status?: number;
  bodyExcerpt?: string;
  cause?: string;
}): BrokerClientError {
  return new BrokerClientError({
    code: input.code,
    category: input.category,
    message: input.message,
    retryable: input.retryable,
    redacted_context: {
      stage: input.stage,
      url: input.url,
      ...(input.status !== undefined ? { status: input.status } : {}),
      ...(input.bodyExcerpt ? { body_excerpt: input.bodyExcerpt } : {}),
      ...(input.cause ? { cause: input.cause } : {}),
    },
  });
}

export async function requestBrokerJson(
  opts: HttpBrokerOptions,
  endpoint: string,
  method: 'GET' | 'POST',
  path: string,
  body: unknown,
  stage: string,
  signal?: AbortSignal,
): Promise<unknown> {
  const fetchImpl = opts.fetchImpl ?? fetch;
  const url = new URL(path, toBaseUrl(endpoint)).toString();

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), opts.timeoutMs);
  const onCancel = () => controller.abort();
  if (signal?.aborted) controller.abort();
  else signal?.addEventListener('abort', onCancel, { once: true });

  let res: Response;
  let text = '';
  try {
    res = await fetchImpl(url, {
      method,
      headers: {
        accept: 'application/json',
        ...(body !== undefined ? { 'content-type': 'application/json' } : {}),
        ...(opts.token ? { authorization: `Bearer ${opts.token}` } : {}),
        ...(opts.requestId ? { 'x-request-id': opts.requestId } : {}),
      },
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
      signal: controller.signal,
    });
    text = await res.text();
  } catch (err) {
    const timeoutLike = err instanceof Error && err.name === 'AbortError';
    const cancelled = signal?.aborted === true;
    throw httpError({
      code: ErrorCode.BROKER_UNREACHABLE,
      category: 'network',
      message: cancelled ? 'broker request cancelled' : timeoutLike ? 'broker request timed out' : 'broker unreachable',
      retryable: true,
      stage,
      url,
      cause: errorMessage(err),
    });
  } finally {
    clearTimeout(timeout);
    signal?.removeEventListener('abort', onCancel);
  }

  const bodyExcerpt = text ? excerpt(text) : undefined;
  const status = res.status;

  // Map auth errors even if the body isn't valid JSON.
  if (status === 401) {
    throw httpError({
      code: ErrorCode.BROKER_AUTH_FAILED,
      category: 'auth',
      message: 'broker authentication failed',
      retryable: false,
      stage,
      url,
      status,
      bodyExcerpt,
    });
  }
  if (status === 403) {
    throw httpError({
      code: ErrorCode.BROKER_PERMISSION_DENIED,
      category: 'permission',
      message: 'broker permission denied',
      retryable: false,
      stage,
      url,
      status,
      bodyExcerpt,
    });
  }
  if (status === 404) {
    throw httpError({
      code: ErrorCode.BROKER_NOT_FOUND,
      category: 'not_found',
      message: 'broker object not found',
      retryable: false,
      stage,
      url,
      status,
    });
  }

  let parsed: unknown = null;
  try {
    parsed = text ? JSON.parse(text) : null;
  } catch (err) {
    throw httpError({
      code: ErrorCode.BROKER_BAD_RESPONSE,
      category: 'parse',
      message: 'broker bad response',
      retryable: false,
      stage,
      url,
      status,
      bodyExcerpt,
      cause: errorMessage(err),
    });
  }

  if (!isRecord(parsed) || typeof parsed.ok !== 'boolean') {
    throw httpError({
      code: ErrorCode.BROKER_BAD_RESPONSE,
      category: 'parse',
      message: 'broker bad response',
      retryable: false,
      stage,
      url,
      status,
      bodyExcerpt,
    });
  }

  if (parsed.ok) {
    if (!('data' in parsed)) {
      throw httpError({
        code: ErrorCode.BROKER_BAD_RESPONSE,
        category: 'parse',
        message: 'broker bad response',
        retryable: false,
        stage,
        url,
        status,
        bodyExcerpt,
      });
    }
    return parsed.data;
  }

  const brokerErr: Record<string, unknown> = isRecord(parsed.error) ? parsed.error : {};
  const brokerCode = nonEmptyString(brokerErr.code) ?? 'BROKER_INTERNAL';
  const brokerMessage = nonEmptyString(brokerErr.message) ?? 'broker error';

  throw new BrokerClientError({
    code: ErrorCode.BROKER_REQUEST_FAILED,
    category: 'unknown',
    message: 'broker request failed',
    retryable: status >= 500,
    redacted_context: {
      stage,
      url,
      status,
      broker_code: brokerCode,
      broker_message_excerpt: excerpt(brokerMessage, 200),
    },
  });
}

function isNotFound(err: unknown): boolean {
  return err instanceof BrokerClientError && err.appError.code === ErrorCode.BROKER_NOT_FOUND;
}

export function createHttpBroker(opts: HttpBrokerOptions): BrokerApi {
  const siteByEndpoint = new Map<string, string>();

  const call = (
    endpoint: string,
    method: 'GET' | 'POST',
    path: string,
    body: unknown,
    stage: string,
    signal?: AbortSignal,
  ) => requestBrokerJson(opts, endpoint, method, path, body, stage, signal);

  async function siteOf(endpoint: string): Promise<string | null> {
    const cached = siteByEndpoint.get(endpoint);
    if (cached) return cached;

    const data = await call(endpoint, 'GET', '/v1/site', undefined, 'site.lookup');
    const siteId = isRecord(data) ? nonEmptyString(data.site_id ?? data.SiteUid ?? data.name ?? data.Name) : null;
    if (siteId) siteByEndpoint.set(endpoint, siteId);
    return siteId;
  }

  async function originOf(endpoint: string) {
    return { siteId: (await siteOf(endpoint)) ?? endpoint, endpoint };
  }

  return {
    async probe(endpoint: string): Promise<EndpointHealth> {
      try {
        const data = await call(endpoint, 'GET', '/v1/health', undefined, 'endpoint.probe');
        return normalizeEndpointHealth(data);
      } catch (err) {
        logEvent({
          level: 'warn',
          service: 'rollout',
          event_type: 'endpoint.health_query_failed',
          endpoint,
          ...(err instanceof BrokerClientError ? { error: err.appError } : { cause: errorMessage(err) }),
        });
        return { brokerStatus: 'Offline', hypervisorStatus: 'Offline' };
      }
    },

    siteOf,

    async listAvailableMachines(endpoint: string, groupFilter: string, maxRecords: number): Promise<Machine[]> {
      const origin = await originOf(endpoint);
      const data = await call(
        endpoint,
        'POST',
        '/v1/machines/query',
        { desktop_group: groupFilter, summary_state: 'Available', max_records: maxRecords },
        'machines.list',
      );
      return normalizeList(data, (raw) => normalizeMachine(raw, origin));
    },

    async listSessions(endpoint: string, groupFilter: string, maxRecords: number): Promise<Session[]> {
      const origin = await originOf(endpoint);
      const data = await call(
        endpoint,
        'POST',
        '/v1/sessions/query',
        { desktop_group: groupFilter, max_records: maxRecords },
        'sessions.list',
      );
      return normalizeList(data, (raw) => normalizeSession(raw, origin));
    },

    async refreshMachine(endpoint: string, machineId: string): Promise<Machine | null> {
      const origin = await originOf(endpoint);
      try {
        const data = await call(endpoint, 'GET', `/v1/machines/${encodeURIComponent(machineId)}`, undefined, 'machine.refresh');
        return normalizeMachine(data, origin);
      } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
      }
    },

    async refreshSession(endpoint: string, sessionId: string): Promise<Session | null> {
      const origin = await originOf(endpoint);
      try {
        const data = await call(endpoint, 'GET', `/v1/sessions/${encodeURIComponent(sessionId)}`, undefined, 'session.refresh');
        return normalizeSession(data, origin);
      } catch (err) {
        if (isNotFound(err)) return null;
        throw err;
      }
    },

    async submitRestart(endpoint: string, machineId: string): Promise<string> {
      const url = `/v1/machines/${encodeURIComponent(machineId)}/power-actions`;
      const data = await call(endpoint, 'POST', url, { action: 'Restart' }, 'machine.restart');
      const taskId = isRecord(data) ? nonEmptyString(data.task_id ?? data.Uid ?? data.uid) : null;
      if (!taskId) {
        throw httpError({
          code: ErrorCode.BROKER_BAD_RESPONSE,
          category: 'parse',
          message: 'broker returned no task id',
          retryable: false,
          stage: 'machine.restart',
          url,
        });
      }
      return taskId;
    },

    async submitNotification(
      endpoint: string,
      sessionId: string,
      title: string,
      text: string,
    ): Promise<NotificationResult> {
      const data = await call(
        endpoint,
        'POST',
        `/v1/sessions/${encodeURIComponent(sessionId)}/messages`,
        { title, text, message_style: 'Information' },
        'session.notify',
      );
      return isRecord(data) && data.delivered === false ? 'fail' : 'ok';
    },

    async pollTask(endpoint: string, taskId: string, signal?: AbortSignal): Promise<TaskStatus> {
      const data = await call(endpoint, 'GET', `/v1/tasks/${encodeURIComponent(taskId)}`, undefined, 'task.poll', signal);
      return normalizeTaskStatus(data);
    },
  };
}
