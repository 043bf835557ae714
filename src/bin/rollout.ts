import { randomUUID } from 'node:crypto';

import { createHttpBroker } from '@/lib/broker/client';
import { loadRunConfig } from '@/lib/config/run-config';
import { createPowerShellDiskImageQuery } from '@/lib/disk-image/query';
import { serverEnv } from '@/lib/env/server';
import { RolloutFatalError, errorMessage } from '@/lib/errors/error';
import { logEvent } from '@/lib/logging/logger';
import { runRollout } from '@/lib/rollout/orchestrator';
import { formatDuration, formatRunReport } from '@/lib/rollout/report';

function log(message: string, extra?: Record<string, unknown>) {
  const payload = extra ? ` ${JSON.stringify(extra)}` : '';
  console.log(`[rollout] ${message}${payload}`);
}

async function main() {
  const config = loadRunConfig({ argv: process.argv.slice(2), cwd: process.cwd() });
  const requestId = randomUUID();

  log('starting', {
    config: config.configPath,
    mode: config.mode,
    simulate: config.simulate,
    runAsync: config.runAsync,
    requestId,
  });

  const broker = createHttpBroker({
    token: serverEnv.ROLLOUT_BROKER_TOKEN,
    timeoutMs: serverEnv.ROLLOUT_BROKER_TIMEOUT_MS,
    requestId,
  });
  const diskImages = createPowerShellDiskImageQuery({
    powershellExe: serverEnv.ROLLOUT_POWERSHELL_EXE,
    registryPath: serverEnv.ROLLOUT_DISK_IMAGE_REGISTRY_PATH,
    valueName: serverEnv.ROLLOUT_DISK_IMAGE_REGISTRY_VALUE,
    timeoutMs: config.queryTimeoutMs,
  });

  // First Ctrl-C stops waiting on power actions; the run still reports.
  const stop = new AbortController();
  const onSignal = (signal: string) => {
    log('stopping monitor', { signal });
    stop.abort();
  };
  process.once('SIGINT', () => onSignal('SIGINT'));
  process.once('SIGTERM', () => onSignal('SIGTERM'));

  const result = await runRollout(config, {
    broker,
    diskImages,
    signal: stop.signal,
    onMonitorProgress: (elapsedMs, pending) =>
      log(`waiting for power actions: ${pending} pending after ${formatDuration(elapsedMs)}`),
  });

  if (result.mode === 'healthcheck') {
    for (const [siteId, endpoint] of result.sites) log(`site ${siteId} -> ${endpoint}`);
    return;
  }

  if (result.report) {
    for (const line of formatRunReport(result.report)) log(line);
  }
}

main().then(
  () => {
    process.exitCode = 0;
  },
  (err: unknown) => {
    if (err instanceof RolloutFatalError) {
      logEvent({ level: 'error', service: 'rollout', event_type: 'rollout.fatal', error: err.appError });
      log(`fatal: ${err.message}`);
    } else {
      logEvent({
        level: 'error',
        service: 'rollout',
        event_type: 'rollout.crashed',
        cause_excerpt: err instanceof Error ? (err.stack ?? err.message) : errorMessage(err),
      });
      log(`crashed: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  },
);
