/**
 * Configuration entry point
 *
 * Loaded once at process start; an invalid setup is a ConfigurationError.
 */

import { ConfigurationError } from '../lib/errors';
import { createConfiguration } from './config';
import { validateConfig } from './validation';
import type { ControllerConfig, ConfigIssue, Env } from './types';

export * from './types';
export * from './defaults';
export { createDefaultConfig, createConfiguration, getConfigurationSummary } from './config';
export { validateConfig } from './validation';

export interface LoadedConfig {
  config: ControllerConfig;
  warnings: ConfigIssue[];
}

export function loadConfig(env: Env = process.env): LoadedConfig {
  const config = createConfiguration(env);
  const { isValid, errors, warnings } = validateConfig(config, env);

  if (!isValid) {
    throw new ConfigurationError(
      `Invalid configuration: ${errors.map((e) => `${e.path}: ${e.message}`).join('; ')}`,
      { errors },
    );
  }

  return { config: Object.freeze(config), warnings };
}
