import { mapLimitWithDeadline } from '@/lib/concurrency/map-limit';
import { isRecord, nonEmptyString } from '@/lib/broker/normalize';
import { errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';

import { runPowerShellJson } from './powershell';

/**
 * Reads the disk image identifier a desktop is currently running.
 * Resolves null when the host has no identifier to report.
 */
export type DiskImageQuery = (hostName: string, signal: AbortSignal) => Promise<string | null>;

export type DiskImageResolution = {
  images: Map<string, string | null>;
  resolved: number;
  failed: number;
  timedOut: number;
};

const HOST_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.\-_]*$/;

function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function buildDiskImageCommand(input: { hostName: string; registryPath: string; valueName: string }): string {
  return [
    "$ErrorActionPreference = 'Stop'",
    `$value = Invoke-Command -ComputerName ${psQuote(input.hostName)} -ScriptBlock {`,
    '  param($path, $name)',
    '  (Get-ItemProperty -Path $path -Name $name -ErrorAction SilentlyContinue).$name',
    `} -ArgumentList ${psQuote(input.registryPath)}, ${psQuote(input.valueName)}`,
    'ConvertTo-Json -Compress -InputObject @{ disk_image = $value }',
  ].join('\n');
}

export function parseDiskImageOutput(payload: unknown): string | null {
  if (typeof payload === 'string') return nonEmptyString(payload);
  if (!isRecord(payload)) return null;
  return nonEmptyString(payload.disk_image);
}

export function createPowerShellDiskImageQuery(opts: {
  powershellExe: string;
  registryPath: string;
  valueName: string;
  timeoutMs: number;
}): DiskImageQuery {
  return async (hostName, signal) => {
    if (!HOST_NAME_PATTERN.test(hostName)) throw new Error(`invalid host name: ${hostName}`);
    const payload = await runPowerShellJson({
      powershellExe: opts.powershellExe,
      command: buildDiskImageCommand({ hostName, registryPath: opts.registryPath, valueName: opts.valueName }),
      timeoutMs: opts.timeoutMs,
      signal,
    });
    return parseDiskImageOutput(payload);
  };
}

/**
 * One query per distinct host, at most `concurrency` in flight, all sharing one deadline.
 * Hosts that fail or do not answer in time map to null, same as hosts with no identifier.
 */
export async function resolveDiskImages(
  hostNames: readonly string[],
  opts: { query: DiskImageQuery; concurrency: number; timeoutMs: number },
): Promise<DiskImageResolution> {
  const hosts = Array.from(new Set(hostNames.map((h) => h.trim()).filter((h) => h.length > 0)));
  const outcomes = await mapLimitWithDeadline(
    hosts,
    { limit: opts.concurrency, timeoutMs: opts.timeoutMs },
    (host, signal) => opts.query(host, signal),
  );

  const images = new Map<string, string | null>();
  let resolved = 0;
  let failed = 0;
  let timedOut = 0;

  outcomes.forEach((outcome, i) => {
    const host = hosts[i];
    if (host === undefined) return;

    if (outcome.status === 'fulfilled') {
      images.set(host, outcome.value);
      if (outcome.value !== null) resolved += 1;
      return;
    }

    images.set(host, null);
    if (outcome.status === 'timeout') {
      timedOut += 1;
      return;
    }

    failed += 1;
    logEvent({
      level: 'debug',
      service: 'rollout',
      event_type: 'disk_image.query_failed',
      host,
      cause_excerpt: errorMessage(outcome.reason),
    });
  });

  return { images, resolved, failed, timedOut };
}
