/**
 * Configuration Validation
 *
 * Simple, practical checks that run once at process start. Errors make the
 * controller refuse to serve; warnings are logged.
 */

import { LOG_LEVELS, NODE_ENVS } from './types';
import type { ConfigIssue, ConfigValidationResult, ControllerConfig, Env } from './types';
import { DEFAULT_TIMEOUTS } from './defaults';

const CLUSTER_NAME_PATTERN = /^[0-9A-Za-z][A-Za-z0-9_-]{0,99}$/;
const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d+$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Validate controller configuration
 * @param env - When given, raw values the parser had to fall back on are reported too
 */
export function validateConfig(config: ControllerConfig, env?: Env): ConfigValidationResult {
  const errors: ConfigIssue[] = [];
  const warnings: ConfigIssue[] = [];

  if (env) {
    const logLevel = env.LOG_LEVEL?.trim();
    if (logLevel && !LOG_LEVELS.some((level) => level === logLevel)) {
      errors.push({ path: 'logLevel', message: `Must be one of ${LOG_LEVELS.join(', ')}` });
    }
    const nodeEnv = env.NODE_ENV?.trim();
    if (nodeEnv && !NODE_ENVS.some((value) => value === nodeEnv)) {
      errors.push({ path: 'nodeEnv', message: `Must be one of ${NODE_ENVS.join(', ')}` });
    }
  }

  // Cluster validation
  if (!config.cluster.name) {
    errors.push({ path: 'cluster.name', message: 'CLUSTER_NAME is required' });
  } else if (!CLUSTER_NAME_PATTERN.test(config.cluster.name)) {
    errors.push({
      path: 'cluster.name',
      message: 'Must start with a letter or digit and contain only letters, digits, - and _',
    });
  }

  if (!REGION_PATTERN.test(config.cluster.region)) {
    errors.push({ path: 'cluster.region', message: `Not a valid region: ${config.cluster.region}` });
  }

  const { endpoint, caData } = config.cluster;
  if ((endpoint === undefined) !== (caData === undefined)) {
    errors.push({
      path: 'cluster',
      message: 'CLUSTER_ENDPOINT and CLUSTER_CA_DATA must be set together',
    });
  }

  if (endpoint !== undefined) {
    let protocol: string | undefined;
    try {
      protocol = new URL(endpoint).protocol;
    } catch {
      protocol = undefined;
    }
    if (protocol !== 'https:') {
      errors.push({ path: 'cluster.endpoint', message: 'Must be an https:// URL' });
    }
  }

  if (caData !== undefined && !BASE64_PATTERN.test(caData.replace(/\s+/g, ''))) {
    errors.push({ path: 'cluster.caData', message: 'Must be base64-encoded certificate data' });
  }

  // Execution validation
  const { timeoutMs, maxManifestBytes, fieldManager } = config.execution;
  if (!Number.isInteger(timeoutMs) || timeoutMs < DEFAULT_TIMEOUTS.minExecution) {
    errors.push({
      path: 'execution.timeoutMs',
      message: `Must be an integer of at least ${DEFAULT_TIMEOUTS.minExecution}`,
    });
  } else if (timeoutMs >= DEFAULT_TIMEOUTS.invocationMax) {
    errors.push({
      path: 'execution.timeoutMs',
      message: `Must be below the invocation limit of ${DEFAULT_TIMEOUTS.invocationMax}`,
    });
  } else if (timeoutMs > DEFAULT_TIMEOUTS.invocationMax * 0.9) {
    warnings.push({
      path: 'execution.timeoutMs',
      message: 'Leaves little margin for token resolution and response formatting',
    });
  }

  if (!Number.isInteger(maxManifestBytes) || maxManifestBytes < 1) {
    errors.push({ path: 'execution.maxManifestBytes', message: 'Must be a positive integer' });
  }

  if (fieldManager.length > 128) {
    errors.push({ path: 'execution.fieldManager', message: 'Must be at most 128 characters' });
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings,
  };
}
