import { z } from 'zod/v4';

import { createEnv } from '@t3-oss/env-core';

const booleanFlag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const serverEnv = createEnv({
  server: {
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    ROLLOUT_DEBUG: booleanFlag,

    // Management service auth; optional for brokers that sit behind integrated auth.
    ROLLOUT_BROKER_TOKEN: z.string().min(1).optional(),
    ROLLOUT_BROKER_TIMEOUT_MS: z.coerce.number().int().positive().max(2_147_483_647).default(30_000),

    ROLLOUT_POWERSHELL_EXE: z.string().min(1).default('powershell.exe'),
    ROLLOUT_DISK_IMAGE_REGISTRY_PATH: z
      .string()
      .min(1)
      .default('HKLM:\\SYSTEM\\CurrentControlSet\\Services\\bnistack\\PvsAgent'),
    ROLLOUT_DISK_IMAGE_REGISTRY_VALUE: z.string().min(1).default('DiskName'),
  },
  runtimeEnv: process.env,
  skipValidation: !!process.env.SKIP_ENV_VALIDATION,
  emptyStringAsUndefined: true,
});
