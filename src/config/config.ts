/**
 * Controller configuration with environment overrides
 */

import { LOG_LEVELS, NODE_ENVS, type ControllerConfig, type Env } from './types';
import {
  DEFAULT_CLUSTER,
  DEFAULT_FIELD_MANAGER,
  DEFAULT_TIMEOUTS,
  MAX_MANIFEST_BYTES,
} from './defaults';

/**
 * Create default configuration
 * @returns ControllerConfig with every field that has a sensible default filled in
 */
function createDefaultConfig(): ControllerConfig {
  return {
    nodeEnv: 'production',
    logLevel: 'info',
    cluster: {
      name: '',
      region: DEFAULT_CLUSTER.region,
    },
    execution: {
      timeoutMs: DEFAULT_TIMEOUTS.execution,
      fieldManager: DEFAULT_FIELD_MANAGER,
      maxManifestBytes: MAX_MANIFEST_BYTES,
    },
  };
}

/**
 * Parse an integer, NaN when present but not a number so validation can report it
 */
function parseIntOrDefault(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  return /^\d+$/.test(value.trim()) ? parseInt(value, 10) : NaN;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Narrow to one of `allowed`; unknown values fall back (validateConfig reports them)
 */
function pick<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const trimmed = nonEmpty(value);
  return allowed.find((candidate) => candidate === trimmed) ?? fallback;
}

/**
 * Create configuration with environment overrides
 * @param env - Environment to read, process.env by default
 */
function createConfiguration(env: Env = process.env): ControllerConfig {
  const defaultConfig = createDefaultConfig();
  const endpoint = nonEmpty(env.CLUSTER_ENDPOINT);
  const caData = nonEmpty(env.CLUSTER_CA_DATA);

  return {
    ...defaultConfig,
    nodeEnv: pick(env.NODE_ENV, NODE_ENVS, defaultConfig.nodeEnv),
    logLevel: pick(env.LOG_LEVEL, LOG_LEVELS, defaultConfig.logLevel),
    cluster: {
      name: nonEmpty(env.CLUSTER_NAME) ?? defaultConfig.cluster.name,
      region:
        nonEmpty(env.CLUSTER_REGION) ??
        nonEmpty(env.AWS_REGION) ??
        nonEmpty(env.AWS_DEFAULT_REGION) ??
        defaultConfig.cluster.region,
      ...(endpoint !== undefined && { endpoint }),
      ...(caData !== undefined && { caData }),
    },
    execution: {
      timeoutMs: parseIntOrDefault(env.EXECUTION_TIMEOUT_MS, defaultConfig.execution.timeoutMs),
      fieldManager: nonEmpty(env.FIELD_MANAGER) ?? defaultConfig.execution.fieldManager,
      maxManifestBytes: parseIntOrDefault(
        env.MAX_MANIFEST_BYTES,
        defaultConfig.execution.maxManifestBytes,
      ),
    },
  };
}

/**
 * Get configuration summary with key values, safe to log
 */
function getConfigurationSummary(config: ControllerConfig): {
  clusterName: string;
  region: string;
  staticEndpoint: boolean;
  timeoutMs: number;
  logLevel: string;
} {
  return {
    clusterName: config.cluster.name,
    region: config.cluster.region,
    staticEndpoint: config.cluster.endpoint !== undefined && config.cluster.caData !== undefined,
    timeoutMs: config.execution.timeoutMs,
    logLevel: config.logLevel,
  };
}

export { createDefaultConfig, createConfiguration, getConfigurationSummary };
