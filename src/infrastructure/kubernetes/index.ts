/**
 * Kubernetes infrastructure - per-invocation access and the cluster API port
 */

export { buildClusterAccessContext } from './context';
export { createClusterApi, ClusterRejection } from './client';
export type {
  ClusterApi,
  DeploymentCondition,
  DeploymentDetail,
  NamespaceListing,
  PodSummary,
  ServiceSummary,
  DeploymentSummary,
  ReplicaSetSummary,
  StatefulSetSummary,
  DaemonSetSummary,
} from './client';
