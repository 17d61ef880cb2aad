/**
 * Action pipeline: request validation, dispatch, execution, formatting
 */

export { actionRequestSchema, type ActionRequestInput } from './schema';
export { createActionRequest, parseManifest, isManifestObject } from './request';
export type { ActionRequestOptions } from './request';
export { createCommandExecutor, resourceRef, rolloutStatus } from './executor';
export type { CommandExecutor, CommandExecutorOptions, ClusterApiFactory } from './executor';
export { createDispatcher } from './dispatcher';
export type {
  ConnectionSource,
  ContextBuilder,
  DispatchOutcome,
  DispatchState,
  DispatchTrace,
  Dispatcher,
  DispatcherOptions,
} from './dispatcher';
export { formatResponse, exitCodeFor } from './response-formatter';
export { renderTable, formatAge, renderNamespaceListing, renderDeploymentDescription } from './render';
