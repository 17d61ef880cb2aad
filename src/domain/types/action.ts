/**
 * Action Types
 *
 * Shapes that flow through one invocation: the validated request, the
 * per-invocation cluster access context, the raw command result and the
 * envelope handed back to the trigger.
 */

import type { KubeConfig, KubernetesObject, V1ObjectMeta } from '@kubernetes/client-node';

export const ACTIONS = ['get', 'restart', 'apply', 'status', 'describe'] as const;

export type ActionName = (typeof ACTIONS)[number];

/**
 * A single resource document with the fields apply needs to address it
 */
export type ManifestObject = KubernetesObject & {
  apiVersion: string;
  kind: string;
  metadata: V1ObjectMeta & { name: string };
};

export interface GetRequest {
  action: 'get';
  namespace: string;
}

export interface RestartRequest {
  action: 'restart';
  namespace: string;
  deployment: string;
}

export interface ApplyRequest {
  action: 'apply';
  namespace?: string;
  /** Raw document as submitted */
  manifest: string;
  /** Parsed single document, namespace already resolved */
  resource: ManifestObject;
}

export interface StatusRequest {
  action: 'status';
  namespace: string;
  deployment: string;
}

export interface DescribeRequest {
  action: 'describe';
  namespace: string;
  deployment: string;
}

/**
 * Validated request. Only `createActionRequest` produces values of this type.
 */
export type ActionRequest =
  | GetRequest
  | RestartRequest
  | ApplyRequest
  | StatusRequest
  | DescribeRequest;

/**
 * Static connection parameters, loaded once per process
 */
export interface ClusterConnection {
  readonly clusterName: string;
  readonly region: string;
  readonly apiEndpoint: string;
  /** Base64-encoded PEM bundle */
  readonly caData: string;
}

export interface ClusterToken {
  token: string;
  expiresAt: Date;
}

/**
 * Invocation-scoped access context. Never persisted, never reused.
 */
export interface ClusterAccessContext {
  readonly clusterName: string;
  readonly apiEndpoint: string;
  readonly caData: string;
  readonly authToken: string;
  readonly expiresAt: Date;
  readonly kubeConfig: KubeConfig;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /**
   * Always false on a returned result: a run cut off by the timeout
   * surfaces as ExecutionTimeoutError, whose details carry the flag
   */
  durationExceeded: boolean;
}

export type ErrorKind =
  | 'ValidationError'
  | 'ConfigurationError'
  | 'AuthResolutionError'
  | 'ExecutionTimeout'
  | 'ExecutionError';

export type ResponseEnvelope =
  | { status: 'ok'; data: string }
  | { status: 'error'; data: { kind: ErrorKind; message: string } };
