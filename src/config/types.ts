/**
 * Configuration Types
 */

export const NODE_ENVS = ['development', 'production', 'test'] as const;
export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type NodeEnv = (typeof NODE_ENVS)[number];
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Env = Record<string, string | undefined>;

export interface ControllerConfig {
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  cluster: {
    /** Target cluster; fixed per deployment, never taken from a request */
    name: string;
    region: string;
    /** When both are set, no DescribeCluster call is made at startup */
    endpoint?: string;
    caData?: string;
  };
  execution: {
    timeoutMs: number;
    fieldManager: string;
    maxManifestBytes: number;
  };
}

export interface ConfigIssue {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
}
