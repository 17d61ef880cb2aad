/**
 * Shared test data and doubles for the action pipeline
 */

import { jest } from '@jest/globals';
import type { CommandExecutor } from '../../src/actions/executor';
import type {
  ClusterAccessContext,
  ClusterConnection,
  ClusterToken,
  CommandResult,
} from '../../src/domain/types';
import type { CredentialResolver } from '../../src/infrastructure/aws/eks-token';
import { buildClusterAccessContext } from '../../src/infrastructure/kubernetes/context';
import type { ControllerConfig } from '../../src/config/types';

export const NOW = new Date('2026-03-01T12:00:00.000Z');

export const TEST_TOKEN = 'k8s-aws-v1.test-secret-token';

export const TEST_CA_DATA = Buffer.from(
  '-----BEGIN CERTIFICATE-----\ntest-ca\n-----END CERTIFICATE-----\n',
  'utf-8',
).toString('base64');

export const TEST_CONNECTION: ClusterConnection = Object.freeze({
  clusterName: 'test-cluster',
  region: 'us-east-1',
  apiEndpoint: 'https://cluster.test.invalid',
  caData: TEST_CA_DATA,
});

export const testToken = (now: Date = NOW): ClusterToken => ({
  token: TEST_TOKEN,
  expiresAt: new Date(now.getTime() + 14 * 60 * 1000),
});

export const testContext = (now: Date = NOW): ClusterAccessContext =>
  buildClusterAccessContext(TEST_CONNECTION, testToken(now), () => now);

export const testConfig = (overrides: Partial<ControllerConfig['execution']> = {}): ControllerConfig => ({
  nodeEnv: 'test',
  logLevel: 'error',
  cluster: {
    name: TEST_CONNECTION.clusterName,
    region: TEST_CONNECTION.region,
    endpoint: TEST_CONNECTION.apiEndpoint,
    caData: TEST_CONNECTION.caData,
  },
  execution: {
    timeoutMs: 5000,
    fieldManager: 'test-manager',
    maxManifestBytes: 1024 * 1024,
    ...overrides,
  },
});

export const createFakeResolver = (
  token: ClusterToken = testToken(),
): CredentialResolver & { resolve: jest.Mock<CredentialResolver['resolve']> } => ({
  resolve: jest.fn<CredentialResolver['resolve']>(async () => token),
});

export const okResult = (stdout: string): CommandResult => ({
  exitCode: 0,
  stdout,
  stderr: '',
  durationExceeded: false,
});

export type RecordingExecutor = {
  [K in keyof CommandExecutor]: jest.Mock<CommandExecutor[K]>;
};

/**
 * Executor double that records every call and touches no cluster
 */
export const createRecordingExecutor = (
  result: CommandResult = okResult('done'),
): RecordingExecutor => ({
  read: jest.fn<CommandExecutor['read']>(async () => result),
  restart: jest.fn<CommandExecutor['restart']>(async () => result),
  apply: jest.fn<CommandExecutor['apply']>(async () => result),
  status: jest.fn<CommandExecutor['status']>(async () => result),
  describe: jest.fn<CommandExecutor['describe']>(async () => result),
});

export const executorCallCount = (executor: RecordingExecutor): number =>
  executor.read.mock.calls.length +
  executor.restart.mock.calls.length +
  executor.apply.mock.calls.length +
  executor.status.mock.calls.length +
  executor.describe.mock.calls.length;
