/**
 * Dependency Injection Container
 *
 * Builds everything one process needs to serve invocations. Only immutable
 * configuration and the static connection parameters outlive a single
 * invocation; tokens and access contexts are created per dispatch.
 */

import type { Logger } from 'pino';
import { createLogger } from '../lib/logger';
import { getConfigurationSummary, loadConfig, type ControllerConfig, type Env } from '../config';
import type { ClusterConnection } from '../domain/types';
import {
  createEksTokenResolver,
  loadClusterConnection,
  type ClusterDescriber,
  type CredentialResolver,
} from '../infrastructure/aws';
import { createCommandExecutor, type ClusterApiFactory, type CommandExecutor } from '../actions/executor';
import { createDispatcher, type ConnectionSource, type Dispatcher } from '../actions/dispatcher';

/**
 * All application dependencies with their types
 */
export interface Deps {
  config: ControllerConfig;
  logger: Logger;
  connection: ConnectionSource;
  resolver: CredentialResolver;
  executor: CommandExecutor;
  dispatcher: Dispatcher;
}

/**
 * Container environment presets
 */
export type ContainerEnvironment = 'default' | 'test';

/**
 * Configuration overrides for dependency creation
 */
export interface ContainerConfigOverrides {
  // Use custom configuration instead of the environment
  config?: ControllerConfig;

  env?: Env;

  environment?: ContainerEnvironment;

  // Replaces the EKS DescribeCluster call
  describe?: ClusterDescriber;

  // Replaces the client-node backed cluster API
  clusterApiFactory?: ClusterApiFactory;

  now?: () => Date;
}

/**
 * Partial dependency overrides for testing
 */
export type DepsOverrides = Partial<Deps>;

/**
 * Memoize a connection load; a failed load is retried by the next caller
 */
export function cachedConnection(load: () => Promise<ClusterConnection>): ConnectionSource {
  let pending: Promise<ClusterConnection> | undefined;

  return () => {
    if (!pending) {
      pending = load().catch((error: unknown) => {
        pending = undefined;
        throw error;
      });
    }
    return pending;
  };
}

/**
 * Create application container with all dependencies
 */
export function createContainer(
  configOverrides: ContainerConfigOverrides = {},
  depsOverrides: DepsOverrides = {},
): Deps {
  const environment = configOverrides.environment ?? 'default';

  let config: ControllerConfig;
  let warnings: string[] = [];
  if (configOverrides.config) {
    config = configOverrides.config;
  } else {
    const loaded = loadConfig(configOverrides.env);
    config = loaded.config;
    warnings = loaded.warnings.map((w) => `${w.path}: ${w.message}`);
  }

  // Create logger first as other services depend on it
  const logger =
    depsOverrides.logger ??
    createLogger({ level: environment === 'test' ? 'silent' : config.logLevel });

  for (const warning of warnings) {
    logger.warn({ warning }, 'Configuration warning');
  }

  const connection =
    depsOverrides.connection ??
    cachedConnection(() => loadClusterConnection(config, logger, configOverrides.describe));

  const resolver =
    depsOverrides.resolver ??
    createEksTokenResolver({
      region: config.cluster.region,
      logger,
      ...(configOverrides.now && { now: configOverrides.now }),
    });

  const executor =
    depsOverrides.executor ??
    createCommandExecutor({
      logger,
      timeoutMs: config.execution.timeoutMs,
      fieldManager: config.execution.fieldManager,
      ...(configOverrides.clusterApiFactory && {
        clusterApiFactory: configOverrides.clusterApiFactory,
      }),
      ...(configOverrides.now && { now: configOverrides.now }),
    });

  const dispatcher =
    depsOverrides.dispatcher ??
    createDispatcher({
      connection,
      resolver,
      executor,
      logger,
      maxManifestBytes: config.execution.maxManifestBytes,
      ...(configOverrides.now && { now: configOverrides.now }),
    });

  logger.debug({ config: getConfigurationSummary(config) }, 'Dependency container created');

  return { config, logger, connection, resolver, executor, dispatcher };
}
