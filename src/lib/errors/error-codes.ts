export const ErrorCode = {
  ROLLOUT_CONFIG_INVALID: 'ROLLOUT_CONFIG_INVALID',
  ROLLOUT_NO_HEALTHY_ENDPOINT: 'ROLLOUT_NO_HEALTHY_ENDPOINT',

  BROKER_UNREACHABLE: 'BROKER_UNREACHABLE',
  BROKER_AUTH_FAILED: 'BROKER_AUTH_FAILED',
  BROKER_PERMISSION_DENIED: 'BROKER_PERMISSION_DENIED',
  BROKER_NOT_FOUND: 'BROKER_NOT_FOUND',
  BROKER_BAD_RESPONSE: 'BROKER_BAD_RESPONSE',
  BROKER_REQUEST_FAILED: 'BROKER_REQUEST_FAILED',

  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
