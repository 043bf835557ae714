import { mapLimit } from '@/lib/concurrency/map-limit';
import { ErrorCode } from '@/lib/errors/error-codes';
import { RolloutFatalError, errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import type { BrokerApi, EndpointHealth } from '@/lib/broker/types';

export type SelectEndpointsOptions = {
  broker: BrokerApi;
  concurrency: number;
};

const OFFLINE: EndpointHealth = { brokerStatus: 'Offline', hypervisorStatus: 'Offline' };

export function isHealthy(health: EndpointHealth): boolean {
  return health.brokerStatus === 'OK' && health.hypervisorStatus === 'OK';
}

function normalizeCandidates(candidates: readonly string[]): string[] {
  const seen = new Set<string>();
  const out: string[] = [];
  for (const raw of candidates) {
    const endpoint = raw.trim();
    if (!endpoint || seen.has(endpoint)) continue;
    seen.add(endpoint);
    out.push(endpoint);
  }
  return out;
}

async function probeSafely(broker: BrokerApi, endpoint: string): Promise<EndpointHealth> {
  try {
    return await broker.probe(endpoint);
  } catch (err) {
    logEvent({
      level: 'warn',
      service: 'rollout',
      event_type: 'endpoint.probe_failed',
      endpoint,
      cause_excerpt: errorMessage(err),
    });
    return OFFLINE;
  }
}

/**
 * Binds one healthy endpoint per site. Probes run concurrently; binding follows candidate
 * order, so the first healthy endpoint listed for a site wins and later ones are dropped.
 */
export async function selectHealthyEndpoints(
  candidates: readonly string[],
  opts: SelectEndpointsOptions,
): Promise<Map<string, string>> {
  const endpoints = normalizeCandidates(candidates);
  const health = await mapLimit(endpoints, opts.concurrency, (endpoint) => probeSafely(opts.broker, endpoint));

  const bound = new Map<string, string>();
  for (const [i, endpoint] of endpoints.entries()) {
    const status = health[i] ?? OFFLINE;
    if (!isHealthy(status)) {
      logEvent({
        level: 'warn',
        service: 'rollout',
        event_type: 'endpoint.unhealthy',
        endpoint,
        broker_status: status.brokerStatus,
        hypervisor_status: status.hypervisorStatus,
      });
      continue;
    }

    let siteId: string | null;
    try {
      siteId = await opts.broker.siteOf(endpoint);
    } catch (err) {
      logEvent({
        level: 'warn',
        service: 'rollout',
        event_type: 'endpoint.site_lookup_failed',
        endpoint,
        cause_excerpt: errorMessage(err),
      });
      continue;
    }

    if (!siteId) {
      logEvent({ level: 'warn', service: 'rollout', event_type: 'endpoint.site_unknown', endpoint });
      continue;
    }

    const existing = bound.get(siteId);
    if (existing !== undefined) {
      logEvent({
        level: 'info',
        service: 'rollout',
        event_type: 'endpoint.duplicate_site',
        endpoint,
        site_id: siteId,
        bound_endpoint: existing,
      });
      continue;
    }

    bound.set(siteId, endpoint);
    logEvent({ level: 'info', service: 'rollout', event_type: 'endpoint.bound', endpoint, site_id: siteId });
  }

  if (bound.size === 0) {
    throw new RolloutFatalError({
      code: ErrorCode.ROLLOUT_NO_HEALTHY_ENDPOINT,
      category: 'network',
      message: 'no healthy management endpoint found',
      retryable: true,
      redacted_context: { candidates: endpoints },
    });
  }

  return bound;
}
