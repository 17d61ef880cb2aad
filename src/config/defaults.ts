/**
 * Centralized Configuration Defaults
 */

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  // Leaves room inside a 30s invocation for token signing and formatting
  execution: 25000,
  minExecution: 1000,
  // Hard ceiling of the hosting runtime
  invocationMax: 900000,
} as const;

/**
 * EKS token parameters, matching aws-iam-authenticator
 */
export const DEFAULT_TOKEN = {
  prefix: 'k8s-aws-v1.',
  clusterIdHeader: 'x-k8s-aws-id',
  presignExpirySeconds: 60,
  lifetimeMs: 14 * 60 * 1000,
} as const;

export const DEFAULT_CLUSTER = {
  region: 'us-east-1',
} as const;

export const DEFAULT_FIELD_MANAGER = 'cluster-action-controller';

export const MAX_MANIFEST_BYTES = 1024 * 1024;

export const RESTART_ANNOTATION = 'kubectl.kubernetes.io/restartedAt';
