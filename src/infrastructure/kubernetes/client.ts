/**
 * Kubernetes Client - Direct k8s API Access
 *
 * The narrow set of cluster calls the executor needs, on top of
 * @kubernetes/client-node. Server-side rejections surface as
 * ClusterRejection; anything else (no response at all) is rethrown as is.
 */

import * as k8s from '@kubernetes/client-node';

export interface PodSummary {
  name: string;
  readyContainers: number;
  totalContainers: number;
  status: string;
  restarts: number;
  createdAt?: Date;
}

export interface ServiceSummary {
  name: string;
  type: string;
  clusterIP: string;
  externalIP: string;
  ports: string;
  createdAt?: Date;
}

export interface DeploymentSummary {
  name: string;
  desired: number;
  ready: number;
  upToDate: number;
  available: number;
  createdAt?: Date;
}

export interface ReplicaSetSummary {
  name: string;
  desired: number;
  current: number;
  ready: number;
  createdAt?: Date;
}

export interface StatefulSetSummary {
  name: string;
  desired: number;
  ready: number;
  createdAt?: Date;
}

export interface DaemonSetSummary {
  name: string;
  desired: number;
  current: number;
  ready: number;
  upToDate: number;
  available: number;
  createdAt?: Date;
}

export interface NamespaceListing {
  pods: PodSummary[];
  services: ServiceSummary[];
  deployments: DeploymentSummary[];
  replicaSets: ReplicaSetSummary[];
  statefulSets: StatefulSetSummary[];
  daemonSets: DaemonSetSummary[];
}

export interface DeploymentCondition {
  type: string;
  status: string;
  reason?: string;
  message?: string;
}

export interface DeploymentDetail {
  name: string;
  namespace: string;
  createdAt?: Date;
  labels: Record<string, string>;
  annotations: Record<string, string>;
  selector: Record<string, string>;
  strategy: string;
  generation: number;
  observedGeneration: number;
  /** Desired count from the spec */
  replicas: number;
  /** Pods currently owned, old and new */
  totalReplicas: number;
  updatedReplicas: number;
  readyReplicas: number;
  availableReplicas: number;
  unavailableReplicas: number;
  podTemplateAnnotations: Record<string, string>;
  conditions: DeploymentCondition[];
}

/**
 * The cluster operations an invocation may issue. Test doubles implement
 * this instead of talking to a server.
 */
export interface ClusterApi {
  listNamespace: (namespace: string) => Promise<NamespaceListing>;
  readDeployment: (namespace: string, name: string) => Promise<DeploymentDetail>;
  patchPodTemplateAnnotations: (
    namespace: string,
    name: string,
    annotations: Record<string, string>,
  ) => Promise<void>;
  serverSideApply: (
    resource: k8s.KubernetesObject,
    fieldManager: string,
  ) => Promise<k8s.KubernetesObject>;
}

/**
 * The API server answered and refused the request
 */
export class ClusterRejection extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    /** `Status.reason` from the API server, e.g. NotFound */
    public readonly reason?: string,
  ) {
    super(message);
    this.name = 'ClusterRejection';
  }
}

function statusField(body: unknown, field: 'message' | 'reason'): string | undefined {
  if (typeof body === 'object' && body !== null && field in body) {
    const value: unknown = Reflect.get(body, field);
    return typeof value === 'string' && value.length > 0 ? value : undefined;
  }
  return undefined;
}

function statusMessage(body: unknown): string | undefined {
  if (typeof body === 'string' && body.length > 0) return body;
  return statusField(body, 'message');
}

async function rejectionAware<T>(call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (error) {
    if (error instanceof k8s.HttpError) {
      const statusCode = error.statusCode ?? error.response?.statusCode ?? 500;
      throw new ClusterRejection(
        statusMessage(error.body) ?? `request failed with HTTP ${statusCode}`,
        statusCode,
        statusField(error.body, 'reason'),
      );
    }
    throw error;
  }
}

const count = (value: number | undefined): number => value ?? 0;

function podStatus(pod: k8s.V1Pod): string {
  if (pod.metadata?.deletionTimestamp) return 'Terminating';
  const waiting = pod.status?.containerStatuses?.find((c) => c.state?.waiting?.reason);
  if (waiting?.state?.waiting?.reason) return waiting.state.waiting.reason;
  return pod.status?.reason ?? pod.status?.phase ?? 'Unknown';
}

function servicePorts(service: k8s.V1Service): string {
  const ports = service.spec?.ports ?? [];
  if (ports.length === 0) return '<none>';
  return ports
    .map((p) => `${p.port}${p.nodePort ? `:${p.nodePort}` : ''}/${p.protocol ?? 'TCP'}`)
    .join(',');
}

function externalIP(service: k8s.V1Service): string {
  const ingress = (service.status?.loadBalancer?.ingress ?? [])
    .map((i) => i.ip ?? i.hostname)
    .filter((value): value is string => typeof value === 'string');
  const external = [...(service.spec?.externalIPs ?? []), ...ingress];
  if (external.length > 0) return external.join(',');
  return service.spec?.type === 'LoadBalancer' ? '<pending>' : '<none>';
}

/**
 * Create the client-node backed ClusterApi for one access context
 */
export const createClusterApi = (kubeConfig: k8s.KubeConfig): ClusterApi => {
  const coreApi = kubeConfig.makeApiClient(k8s.CoreV1Api);
  const appsApi = kubeConfig.makeApiClient(k8s.AppsV1Api);
  const objectApi = k8s.KubernetesObjectApi.makeApiClient(kubeConfig);

  return {
    async listNamespace(namespace: string): Promise<NamespaceListing> {
      return rejectionAware(async () => {
        // Sequential on purpose: one request in flight per invocation
        const pods = (await coreApi.listNamespacedPod(namespace)).body.items;
        const services = (await coreApi.listNamespacedService(namespace)).body.items;
        const deployments = (await appsApi.listNamespacedDeployment(namespace)).body.items;
        const replicaSets = (await appsApi.listNamespacedReplicaSet(namespace)).body.items;
        const statefulSets = (await appsApi.listNamespacedStatefulSet(namespace)).body.items;
        const daemonSets = (await appsApi.listNamespacedDaemonSet(namespace)).body.items;

        return {
          pods: pods.map((pod) => ({
            name: pod.metadata?.name ?? '',
            readyContainers: (pod.status?.containerStatuses ?? []).filter((c) => c.ready).length,
            totalContainers: pod.spec?.containers.length ?? 0,
            status: podStatus(pod),
            restarts: (pod.status?.containerStatuses ?? []).reduce(
              (sum, c) => sum + c.restartCount,
              0,
            ),
            createdAt: pod.metadata?.creationTimestamp,
          })),
          services: services.map((service) => ({
            name: service.metadata?.name ?? '',
            type: service.spec?.type ?? 'ClusterIP',
            clusterIP: service.spec?.clusterIP ?? '<none>',
            externalIP: externalIP(service),
            ports: servicePorts(service),
            createdAt: service.metadata?.creationTimestamp,
          })),
          deployments: deployments.map((d) => ({
            name: d.metadata?.name ?? '',
            desired: d.spec?.replicas ?? 0,
            ready: count(d.status?.readyReplicas),
            upToDate: count(d.status?.updatedReplicas),
            available: count(d.status?.availableReplicas),
            createdAt: d.metadata?.creationTimestamp,
          })),
          replicaSets: replicaSets.map((rs) => ({
            name: rs.metadata?.name ?? '',
            desired: rs.spec?.replicas ?? 0,
            current: rs.status?.replicas ?? 0,
            ready: count(rs.status?.readyReplicas),
            createdAt: rs.metadata?.creationTimestamp,
          })),
          statefulSets: statefulSets.map((sts) => ({
            name: sts.metadata?.name ?? '',
            desired: sts.spec?.replicas ?? 0,
            ready: count(sts.status?.readyReplicas),
            createdAt: sts.metadata?.creationTimestamp,
          })),
          daemonSets: daemonSets.map((ds) => ({
            name: ds.metadata?.name ?? '',
            desired: ds.status?.desiredNumberScheduled ?? 0,
            current: ds.status?.currentNumberScheduled ?? 0,
            ready: ds.status?.numberReady ?? 0,
            upToDate: count(ds.status?.updatedNumberScheduled),
            available: count(ds.status?.numberAvailable),
            createdAt: ds.metadata?.creationTimestamp,
          })),
        };
      });
    },

    async readDeployment(namespace: string, name: string): Promise<DeploymentDetail> {
      const { body } = await rejectionAware(() => appsApi.readNamespacedDeployment(name, namespace));

      return {
        name: body.metadata?.name ?? name,
        namespace: body.metadata?.namespace ?? namespace,
        createdAt: body.metadata?.creationTimestamp,
        labels: body.metadata?.labels ?? {},
        annotations: body.metadata?.annotations ?? {},
        selector: body.spec?.selector.matchLabels ?? {},
        strategy: body.spec?.strategy?.type ?? 'RollingUpdate',
        generation: body.metadata?.generation ?? 0,
        observedGeneration: body.status?.observedGeneration ?? 0,
        replicas: body.spec?.replicas ?? 1,
        totalReplicas: count(body.status?.replicas),
        updatedReplicas: count(body.status?.updatedReplicas),
        readyReplicas: count(body.status?.readyReplicas),
        availableReplicas: count(body.status?.availableReplicas),
        unavailableReplicas: count(body.status?.unavailableReplicas),
        podTemplateAnnotations: body.spec?.template.metadata?.annotations ?? {},
        conditions: (body.status?.conditions ?? []).map((c) => ({
          type: c.type,
          status: c.status,
          ...(c.reason !== undefined && { reason: c.reason }),
          ...(c.message !== undefined && { message: c.message }),
        })),
      };
    },

    async patchPodTemplateAnnotations(
      namespace: string,
      name: string,
      annotations: Record<string, string>,
    ): Promise<void> {
      // Strategic merge leaves every other field of the Deployment untouched
      const patch = {
        apiVersion: 'apps/v1',
        kind: 'Deployment',
        metadata: { name, namespace },
        spec: { template: { metadata: { annotations } } },
      };
      await rejectionAware(() =>
        objectApi.patch(patch, undefined, undefined, undefined, undefined, {
          headers: { 'Content-Type': k8s.PatchUtils.PATCH_FORMAT_STRATEGIC_MERGE_PATCH },
        }),
      );
    },

    async serverSideApply(
      resource: k8s.KubernetesObject,
      fieldManager: string,
    ): Promise<k8s.KubernetesObject> {
      // client-node fills in metadata.namespace on the object it is handed
      const { body } = await rejectionAware(() =>
        objectApi.patch(structuredClone(resource), undefined, undefined, fieldManager, true, {
          headers: { 'Content-Type': k8s.PatchUtils.PATCH_FORMAT_APPLY_YAML },
        }),
      );
      return body;
    },
  };
};
