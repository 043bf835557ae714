import { readFileSync } from 'node:fs';
import path from 'node:path';

import { z } from 'zod/v4';

import { ErrorCode } from '@/lib/errors/error-codes';
import { RolloutFatalError, errorMessage } from '@/lib/errors/error';

import type { ErrorDetail } from '@/lib/errors/error';

export const RUN_MODES = ['healthcheck', 'analyze', 'remediate'] as const;
export type RunMode = (typeof RUN_MODES)[number];

export const SEARCH_SCOPES = ['AvailableMachines', 'MachinesWithSessions', 'Both'] as const;
export type SearchScope = (typeof SEARCH_SCOPES)[number];

// Node's timers treat any larger delay as 1 ms.
const MAX_TIMER_MS = 2_147_483_647;

export const DEFAULT_CONFIG_FILE = 'image-rollout.config.json';

function isValidRegExp(source: string): boolean {
  try {
    new RegExp(source, 'i');
    return true;
  } catch {
    return false;
  }
}

const pattern = z
  .string()
  .min(1)
  .refine(isValidRegExp, { message: 'must be a valid regular expression' });

const RunConfigFileSchema = z.object({
  endpoints: z.array(z.string().trim().min(1)).min(1),
  search_scope: z.enum(SEARCH_SCOPES).default('Both'),
  desktop_group: z.string().trim().min(1).default('*'),
  notification: z
    .object({
      title: z.string().min(1).default('Desktop update pending'),
      text: z
        .string()
        .min(1)
        .default('Your desktop will be restarted to apply an image update. Please save your work and log off.'),
    })
    .default({
      title: 'Desktop update pending',
      text: 'Your desktop will be restarted to apply an image update. Please save your work and log off.',
    }),
  all_versions_pattern: pattern,
  target_version_pattern: pattern,
  max_records: z.number().int().positive().default(10_000),
  max_restart_actions: z.number().int().nonnegative().default(50),
  query_concurrency: z.number().int().positive().default(25),
  query_timeout_ms: z.number().int().positive().max(MAX_TIMER_MS).default(120_000),
  restart_idle_hours: z.number().nonnegative().default(8),
  run_async: z.boolean().default(false),
  power_action_timeout_ms: z.number().int().positive().max(MAX_TIMER_MS).default(1_800_000),
  poll_interval_ms: z.number().int().positive().max(MAX_TIMER_MS).default(5_000),
  simulate: z.boolean().default(false),
  mode: z.enum(RUN_MODES).default('remediate'),
});

export type RunConfigFile = z.infer<typeof RunConfigFileSchema>;

export type RunConfig = {
  configPath: string;
  endpoints: string[];
  searchScope: SearchScope;
  desktopGroup: string;
  notification: { title: string; text: string };
  allVersionsPattern: string;
  targetVersionPattern: string;
  maxRecords: number;
  maxRestartActions: number;
  queryConcurrency: number;
  queryTimeoutMs: number;
  restartIdleHours: number;
  runAsync: boolean;
  powerActionTimeoutMs: number;
  pollIntervalMs: number;
  simulate: boolean;
  mode: RunMode;
};

export type CliOverrides = {
  configPath?: string;
  simulate?: true;
  runAsync?: true;
  mode?: RunMode;
};

function configError(message: string, context: { config_path?: string; details?: ErrorDetail[]; cause?: string }) {
  return new RolloutFatalError({
    code: ErrorCode.ROLLOUT_CONFIG_INVALID,
    category: 'config',
    message,
    retryable: false,
    redacted_context: {
      ...(context.config_path ? { config_path: context.config_path } : {}),
      ...(context.cause ? { cause: context.cause } : {}),
    },
    ...(context.details ? { details: context.details } : {}),
  });
}

function isRunMode(value: string): value is RunMode {
  return RUN_MODES.some((m) => m === value);
}

function flagValue(argv: readonly string[], flag: string): string | null {
  const idx = argv.lastIndexOf(flag);
  if (idx === -1) return null;
  const value = argv[idx + 1]?.trim();
  if (!value || value.startsWith('--')) throw configError(`${flag} requires a value`, {});
  return value;
}

export function parseCliOverrides(argv: readonly string[]): CliOverrides {
  const overrides: CliOverrides = {};

  const configPath = flagValue(argv, '--config');
  if (configPath) overrides.configPath = configPath;

  const mode = flagValue(argv, '--mode');
  if (mode) {
    if (!isRunMode(mode)) throw configError(`--mode must be one of ${RUN_MODES.join(' | ')}`, {});
    overrides.mode = mode;
  }

  if (argv.includes('--simulate')) overrides.simulate = true;
  if (argv.includes('--async')) overrides.runAsync = true;
  return overrides;
}

export function parseRunConfig(raw: unknown, overrides: CliOverrides, configPath: string): RunConfig {
  const parsed = RunConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const details: ErrorDetail[] = parsed.error.issues.map((issue) => ({
      field: issue.path.map(String).join('.'),
      issue: issue.code,
      message: issue.message,
    }));
    const summary = details.map((d) => `${d.field || '(root)'}: ${d.message}`).join('; ');
    throw configError(`invalid run configuration (${summary})`, { config_path: configPath, details });
  }

  const file = parsed.data;
  return {
    configPath,
    endpoints: file.endpoints,
    searchScope: file.search_scope,
    desktopGroup: file.desktop_group,
    notification: { title: file.notification.title, text: file.notification.text },
    allVersionsPattern: file.all_versions_pattern,
    targetVersionPattern: file.target_version_pattern,
    maxRecords: file.max_records,
    maxRestartActions: file.max_restart_actions,
    queryConcurrency: file.query_concurrency,
    queryTimeoutMs: file.query_timeout_ms,
    restartIdleHours: file.restart_idle_hours,
    runAsync: overrides.runAsync ?? file.run_async,
    powerActionTimeoutMs: file.power_action_timeout_ms,
    pollIntervalMs: file.poll_interval_ms,
    simulate: overrides.simulate ?? file.simulate,
    mode: overrides.mode ?? file.mode,
  };
}

export function loadRunConfig(args: {
  argv: readonly string[];
  cwd: string;
  readFile?: (filePath: string) => string;
}): RunConfig {
  const overrides = parseCliOverrides(args.argv);
  const configArg = overrides.configPath ?? DEFAULT_CONFIG_FILE;
  const configPath = path.isAbsolute(configArg) ? configArg : path.join(args.cwd, configArg);
  const readFile = args.readFile ?? ((p: string) => readFileSync(p, 'utf8'));

  let raw: unknown;
  try {
    raw = JSON.parse(readFile(configPath));
  } catch (err) {
    throw configError('run configuration could not be read', { config_path: configPath, cause: errorMessage(err) });
  }

  return parseRunConfig(raw, overrides, configPath);
}
