/**
 * Command Executor
 *
 * Runs exactly one cluster operation against an invocation's access
 * context and reports raw text plus an exit status. Interpretation of the
 * result is left to the dispatcher and the response formatter.
 *
 * `restart` is not idempotent at the cluster level: every call stamps a
 * new restart marker and the Deployment rolls over again. `apply` is a
 * server-side apply and converges on the same state when repeated.
 *
 * A timed-out mutation is not rolled back and may still take effect.
 */

import type { Logger } from 'pino';
import { DEFAULT_FIELD_MANAGER, DEFAULT_TIMEOUTS, RESTART_ANNOTATION } from '../config/defaults';
import type { ClusterAccessContext, CommandResult, ManifestObject } from '../domain/types';
import { ExecutionError, ExecutionTimeoutError } from '../lib/errors';
import { createTimer } from '../lib/logger';
import { redactSecrets } from '../lib/redact';
import { TimeoutExceededError, withTimeout } from '../shared/async';
import {
  ClusterRejection,
  createClusterApi,
  type ClusterApi,
  type DeploymentDetail,
} from '../infrastructure/kubernetes/client';
import { renderDeploymentDescription, renderNamespaceListing } from './render';

export interface CommandExecutor {
  read: (context: ClusterAccessContext, namespace: string) => Promise<CommandResult>;
  restart: (
    context: ClusterAccessContext,
    namespace: string,
    deployment: string,
  ) => Promise<CommandResult>;
  apply: (context: ClusterAccessContext, resource: ManifestObject) => Promise<CommandResult>;
  status: (
    context: ClusterAccessContext,
    namespace: string,
    deployment: string,
  ) => Promise<CommandResult>;
  describe: (
    context: ClusterAccessContext,
    namespace: string,
    deployment: string,
  ) => Promise<CommandResult>;
}

export type ClusterApiFactory = (context: ClusterAccessContext) => ClusterApi;

export interface CommandExecutorOptions {
  logger: Logger;
  timeoutMs?: number;
  fieldManager?: string;
  clusterApiFactory?: ClusterApiFactory;
  now?: () => Date;
}

/**
 * Output of a single operation before it becomes a CommandResult
 */
interface Outcome {
  stdout: string;
  exitCode?: number;
  stderr?: string;
}

/**
 * `deployment.apps`, `configmap`, `ingress.networking.k8s.io`
 */
export function resourceRef(resource: ManifestObject): string {
  const slash = resource.apiVersion.indexOf('/');
  const group = slash === -1 ? '' : resource.apiVersion.slice(0, slash);
  const kind = resource.kind.toLowerCase();
  return `${group ? `${kind}.${group}` : kind}/${resource.metadata.name}`;
}

/**
 * One-shot rollout check with the messages `kubectl rollout status` prints
 */
export function rolloutStatus(detail: DeploymentDetail): Outcome {
  const name = detail.name;

  if (detail.generation > detail.observedGeneration) {
    return { stdout: 'Waiting for deployment spec update to be observed...' };
  }

  const progressing = detail.conditions.find((c) => c.type === 'Progressing');
  if (progressing?.reason === 'ProgressDeadlineExceeded') {
    return {
      stdout: '',
      exitCode: 1,
      stderr: `error: deployment "${name}" exceeded its progress deadline`,
    };
  }

  if (detail.updatedReplicas < detail.replicas) {
    return {
      stdout: `Waiting for deployment "${name}" rollout to finish: ${detail.updatedReplicas} out of ${detail.replicas} new replicas have been updated...`,
    };
  }
  if (detail.totalReplicas > detail.updatedReplicas) {
    return {
      stdout: `Waiting for deployment "${name}" rollout to finish: ${detail.totalReplicas - detail.updatedReplicas} old replicas are pending termination...`,
    };
  }
  if (detail.availableReplicas < detail.updatedReplicas) {
    return {
      stdout: `Waiting for deployment "${name}" rollout to finish: ${detail.availableReplicas} of ${detail.updatedReplicas} updated replicas are available...`,
    };
  }
  return { stdout: `deployment "${name}" successfully rolled out` };
}

function rejectionText(rejection: ClusterRejection): string {
  return rejection.reason
    ? `Error from server (${rejection.reason}): ${rejection.message}`
    : `Error from server: ${rejection.message}`;
}

/**
 * Create a CommandExecutor backed by the Kubernetes API
 */
export const createCommandExecutor = (options: CommandExecutorOptions): CommandExecutor => {
  const {
    logger,
    timeoutMs = DEFAULT_TIMEOUTS.execution,
    fieldManager = DEFAULT_FIELD_MANAGER,
    clusterApiFactory = (context: ClusterAccessContext) => createClusterApi(context.kubeConfig),
    now = () => new Date(),
  } = options;

  async function run(
    operation: string,
    context: ClusterAccessContext,
    fields: Record<string, unknown>,
    call: (api: ClusterApi) => Promise<Outcome>,
  ): Promise<CommandResult> {
    const timer = createTimer(logger, operation, fields);
    const api = clusterApiFactory(context);

    try {
      const outcome = await withTimeout(
        () => call(api),
        timeoutMs,
        `${operation} did not finish within ${timeoutMs}ms`,
      );
      const result: CommandResult = {
        exitCode: outcome.exitCode ?? 0,
        stdout: outcome.stdout,
        stderr: outcome.stderr ?? '',
        durationExceeded: false,
      };
      timer.end({ exitCode: result.exitCode });
      return result;
    } catch (error) {
      timer.error(error);

      if (error instanceof TimeoutExceededError) {
        throw new ExecutionTimeoutError(error.message, {
          operation,
          timeoutMs,
          durationExceeded: true,
        });
      }
      if (error instanceof ClusterRejection) {
        return {
          exitCode: 1,
          stdout: '',
          stderr: rejectionText(error),
          durationExceeded: false,
        };
      }

      const message = redactSecrets(
        error instanceof Error ? error.message : String(error),
        [context.authToken],
      );
      throw new ExecutionError(`${operation} failed: ${message}`, { operation });
    }
  }

  return {
    read(context, namespace) {
      return run('read', context, { namespace }, async (api) => ({
        stdout: renderNamespaceListing(namespace, await api.listNamespace(namespace), now()),
      }));
    },

    restart(context, namespace, deployment) {
      return run('restart', context, { namespace, deployment }, async (api) => {
        await api.patchPodTemplateAnnotations(namespace, deployment, {
          [RESTART_ANNOTATION]: now().toISOString(),
        });
        return { stdout: `deployment.apps/${deployment} restarted` };
      });
    },

    apply(context, resource) {
      const ref = resourceRef(resource);
      return run(
        'apply',
        context,
        { resource: ref, namespace: resource.metadata.namespace },
        async (api) => {
          await api.serverSideApply(resource, fieldManager);
          return { stdout: `${ref} serverside-applied` };
        },
      );
    },

    status(context, namespace, deployment) {
      return run('status', context, { namespace, deployment }, async (api) =>
        rolloutStatus(await api.readDeployment(namespace, deployment)),
      );
    },

    describe(context, namespace, deployment) {
      return run('describe', context, { namespace, deployment }, async (api) => ({
        stdout: renderDeploymentDescription(await api.readDeployment(namespace, deployment)),
      }));
    },
  };
};
