/**
 * Action Dispatcher
 *
 * Received → Validated → Authorized → Executing → Completed | Failed
 *
 * Validation runs before any credential or cluster work. Every error is
 * recovered here and becomes a Failed outcome. Nothing is retried: the
 * trigger that invoked the dispatcher owns retry policy.
 */

import type { Logger } from 'pino';
import { MAX_MANIFEST_BYTES } from '../config/defaults';
import type {
  ActionName,
  ActionRequest,
  ClusterAccessContext,
  ClusterConnection,
  ClusterToken,
  CommandResult,
} from '../domain/types';
import {
  AuthResolutionError,
  ExecutionError,
  toActionError,
  type ActionError,
} from '../lib/errors';
import type { CredentialResolver } from '../infrastructure/aws/eks-token';
import { buildClusterAccessContext } from '../infrastructure/kubernetes/context';
import type { CommandExecutor } from './executor';
import { createActionRequest } from './request';

export type DispatchState =
  | 'Received'
  | 'Validated'
  | 'Authorized'
  | 'Executing'
  | 'Completed'
  | 'Failed';

export interface DispatchTrace {
  states: DispatchState[];
}

interface OutcomeBase {
  trace: DispatchTrace;
  /** Literal credential values the formatter must scrub from any message */
  sensitive: readonly string[];
}

export type DispatchOutcome =
  | (OutcomeBase & { state: 'Completed'; action: ActionName; result: CommandResult })
  | (OutcomeBase & { state: 'Failed'; action?: ActionName; error: ActionError });

/**
 * Source of the static connection parameters; resolves once per process
 */
export type ConnectionSource = () => Promise<ClusterConnection>;

export type ContextBuilder = (
  connection: ClusterConnection,
  token: ClusterToken,
  now: () => Date,
) => ClusterAccessContext;

export interface DispatcherOptions {
  connection: ConnectionSource;
  resolver: CredentialResolver;
  executor: CommandExecutor;
  logger: Logger;
  maxManifestBytes?: number;
  buildContext?: ContextBuilder;
  now?: () => Date;
}

export interface Dispatcher {
  dispatch: (input: unknown) => Promise<DispatchOutcome>;
}

function execute(
  executor: CommandExecutor,
  context: ClusterAccessContext,
  request: ActionRequest,
): Promise<CommandResult> {
  switch (request.action) {
    case 'get':
      return executor.read(context, request.namespace);
    case 'restart':
      return executor.restart(context, request.namespace, request.deployment);
    case 'apply':
      return executor.apply(context, request.resource);
    case 'status':
      return executor.status(context, request.namespace, request.deployment);
    case 'describe':
      return executor.describe(context, request.namespace, request.deployment);
  }
}

export const createDispatcher = (options: DispatcherOptions): Dispatcher => {
  const {
    connection,
    resolver,
    executor,
    logger,
    maxManifestBytes = MAX_MANIFEST_BYTES,
    buildContext = buildClusterAccessContext,
    now = () => new Date(),
  } = options;

  return {
    async dispatch(input: unknown): Promise<DispatchOutcome> {
      const trace: DispatchTrace = { states: [] };
      const sensitive: string[] = [];

      const enter = (state: DispatchState, fields: Record<string, unknown> = {}): void => {
        trace.states.push(state);
        logger.debug({ state, ...fields }, `Dispatch state: ${state}`);
      };

      const fail = (error: ActionError, action?: ActionName): DispatchOutcome => {
        enter('Failed', { kind: error.kind });
        return {
          state: 'Failed',
          ...(action !== undefined && { action }),
          error,
          trace,
          sensitive,
        };
      };

      enter('Received');

      const parsed = createActionRequest(input, { maxManifestBytes });
      if (!parsed.ok) {
        return fail(parsed.error);
      }
      const request = parsed.value;
      enter('Validated', { action: request.action });

      let context: ClusterAccessContext;
      try {
        const params = await connection();
        const token = await resolver.resolve(params.clusterName);
        sensitive.push(token.token);
        context = buildContext(params, token, now);
      } catch (error) {
        return fail(toActionError(error, AuthResolutionError), request.action);
      }
      enter('Authorized', { cluster: context.clusterName });

      enter('Executing', { action: request.action });
      let result: CommandResult;
      try {
        result = await execute(executor, context, request);
      } catch (error) {
        return fail(toActionError(error, ExecutionError), request.action);
      }

      enter('Completed', { exitCode: result.exitCode });
      return { state: 'Completed', action: request.action, result, trace, sensitive };
    },
  };
};
