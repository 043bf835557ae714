import { ErrorCode } from '@/lib/errors/error-codes';
import { RolloutFatalError, errorMessage } from '@/lib/errors/error';

import type { UpdateStatus } from './types';

/**
 * Compiles a version pattern once. Matching is case-insensitive, like the image names
 * brokers report in mixed case.
 */
export function compilePattern(source: string, field: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (err) {
    throw new RolloutFatalError({
      code: ErrorCode.ROLLOUT_CONFIG_INVALID,
      category: 'config',
      message: `${field} is not a valid regular expression`,
      retryable: false,
      redacted_context: { field, pattern: source, cause: errorMessage(err) },
    });
  }
}

// `search` ignores lastIndex, so a pattern compiled with /g stays deterministic.
function matches(pattern: RegExp, value: string): boolean {
  return value.search(pattern) !== -1;
}

export function classify(
  diskImage: string | null | undefined,
  allVersionsPattern: RegExp,
  targetVersionPattern: RegExp,
): UpdateStatus {
  if (diskImage === null || diskImage === undefined || diskImage.trim() === '') return 'Unknown';
  if (!matches(allVersionsPattern, diskImage)) return 'Ineligible';
  if (matches(targetVersionPattern, diskImage)) return 'UpdateCompleted';
  return 'RestartRequired';
}
