/**
 * Public API of the cluster action controller
 */

export { handler, createHandler, parseEvent } from './handler';
export type { Handler } from './handler';
export { bootstrap, createContainer, createController } from './app';
export type { Controller, Deps, ContainerConfigOverrides, DepsOverrides } from './app';

export {
  createActionRequest,
  createCommandExecutor,
  createDispatcher,
  formatResponse,
  exitCodeFor,
} from './actions';
export type { CommandExecutor, Dispatcher, DispatchOutcome, DispatchTrace } from './actions';

export { createEksTokenResolver, loadClusterConnection } from './infrastructure/aws';
export type { CredentialResolver, ClusterDescriber } from './infrastructure/aws';
export { buildClusterAccessContext, createClusterApi, ClusterRejection } from './infrastructure/kubernetes';
export type { ClusterApi } from './infrastructure/kubernetes';

export { loadConfig, createConfiguration, validateConfig } from './config';
export type { ControllerConfig } from './config';

export * from './lib/errors';
export { redactSecrets } from './lib/redact';
export type {
  ActionName,
  ActionRequest,
  ClusterAccessContext,
  ClusterConnection,
  ClusterToken,
  CommandResult,
  ErrorKind,
  ResponseEnvelope,
  Result,
} from './domain/types';
