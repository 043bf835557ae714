import { resolveDiskImages } from '@/lib/disk-image/query';
import { BrokerClientError } from '@/lib/broker/client';
import { errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { matchesGlob } from './glob';

import type { BrokerApi, Machine, Session } from '@/lib/broker/types';
import type { DiskImageQuery } from '@/lib/disk-image/query';

type InventoryBase = {
  broker: BrokerApi;
  diskImages: DiskImageQuery;
  endpoint: string;
  siteId: string;
  desktopGroup: string;
  maxRecords: number;
  concurrency: number;
  timeoutMs: number;
};

export type InventoryRequest = InventoryBase & ({ kind: 'machines' } | { kind: 'sessions' });

type Listing<T> = { ok: true; items: T[] } | { ok: false };

async function listSafely<T>(req: InventoryRequest, list: () => Promise<T[]>): Promise<Listing<T>> {
  try {
    return { ok: true, items: await list() };
  } catch (err) {
    logEvent({
      level: 'error',
      service: 'rollout',
      event_type: 'inventory.list_failed',
      kind: req.kind,
      site_id: req.siteId,
      endpoint: req.endpoint,
      ...(err instanceof BrokerClientError ? { error: err.appError } : { cause_excerpt: errorMessage(err) }),
    });
    return { ok: false };
  }
}

async function annotate<T extends Machine | Session>(req: InventoryRequest, listed: readonly T[]): Promise<T[]> {
  // The broker should already filter by group; a broker that ignores the filter must not widen the scope.
  const entities = listed.filter((e) => matchesGlob(req.desktopGroup, e.desktopGroup)).slice(0, Math.max(0, req.maxRecords));

  const resolution = await resolveDiskImages(
    entities.map((e) => e.hostName),
    { query: req.diskImages, concurrency: req.concurrency, timeoutMs: req.timeoutMs },
  );

  const annotated = entities.map((e) => ({ ...e, diskImage: resolution.images.get(e.hostName.trim()) ?? null }));
  const unresolved = annotated.filter((e) => e.diskImage === null).length;

  logEvent({
    level: 'info',
    service: 'rollout',
    event_type: 'inventory.collected',
    kind: req.kind,
    site_id: req.siteId,
    endpoint: req.endpoint,
    listed: listed.length,
    in_scope: entities.length,
    resolved: annotated.length - unresolved,
    unresolved,
    queries_failed: resolution.failed,
    queries_timed_out: resolution.timedOut,
  });

  return annotated;
}

export async function collectMachines(req: InventoryBase): Promise<Machine[]> {
  const full: InventoryRequest = { ...req, kind: 'machines' };
  const listing = await listSafely(full, () =>
    req.broker.listAvailableMachines(req.endpoint, req.desktopGroup, req.maxRecords),
  );
  return listing.ok ? annotate(full, listing.items) : [];
}

export async function collectSessions(req: InventoryBase): Promise<Session[]> {
  const full: InventoryRequest = { ...req, kind: 'sessions' };
  const listing = await listSafely(full, () => req.broker.listSessions(req.endpoint, req.desktopGroup, req.maxRecords));
  return listing.ok ? annotate(full, listing.items) : [];
}

export async function collectInventory(req: InventoryRequest & { kind: 'machines' }): Promise<Machine[]>;
export async function collectInventory(req: InventoryRequest & { kind: 'sessions' }): Promise<Session[]>;
export async function collectInventory(req: InventoryRequest): Promise<Machine[] | Session[]> {
  return req.kind === 'machines' ? collectMachines(req) : collectSessions(req);
}
