import { describe, it, expect, jest } from '@jest/globals';
import { cachedConnection, createContainer } from '../../../src/app/container';
import type { ClusterConnection } from '../../../src/domain/types';
import type { ClusterDescriber } from '../../../src/infrastructure/aws/cluster-connection';
import { ConfigurationError } from '../../../src/lib/errors';
import { TEST_CA_DATA, TEST_CONNECTION } from '../../__support__/fixtures';

describe('cachedConnection', () => {
  it('loads the connection once per process', async () => {
    const load = jest.fn(async (): Promise<ClusterConnection> => TEST_CONNECTION);
    const connection = cachedConnection(load);

    await connection();
    await connection();

    expect(load).toHaveBeenCalledTimes(1);
  });

  it('tries again after a failed load', async () => {
    const load = jest
      .fn<() => Promise<ClusterConnection>>()
      .mockRejectedValueOnce(new Error('throttled'))
      .mockResolvedValue(TEST_CONNECTION);
    const connection = cachedConnection(load);

    await expect(connection()).rejects.toThrow('throttled');
    await expect(connection()).resolves.toBe(TEST_CONNECTION);
    expect(load).toHaveBeenCalledTimes(2);
  });
});

describe('createContainer', () => {
  it('reads configuration from the given environment', async () => {
    const deps = createContainer({
      env: {
        CLUSTER_NAME: 'prod-cluster',
        AWS_REGION: 'eu-west-1',
        CLUSTER_ENDPOINT: 'https://cluster.test.invalid',
        CLUSTER_CA_DATA: TEST_CA_DATA,
      },
      environment: 'test',
    });

    expect(deps.config.cluster.name).toBe('prod-cluster');
    await expect(deps.connection()).resolves.toEqual({
      clusterName: 'prod-cluster',
      region: 'eu-west-1',
      apiEndpoint: 'https://cluster.test.invalid',
      caData: TEST_CA_DATA,
    });
  });

  it('describes the cluster at most once', async () => {
    const describe = jest.fn<ClusterDescriber>(async () => ({
      endpoint: 'https://described.test.invalid',
      caData: TEST_CA_DATA,
    }));
    const deps = createContainer({
      env: { CLUSTER_NAME: 'prod-cluster' },
      environment: 'test',
      describe,
    });

    await deps.connection();
    await deps.connection();

    expect(describe).toHaveBeenCalledTimes(1);
  });

  it('refuses to start without a cluster name', () => {
    expect(() => createContainer({ env: {}, environment: 'test' })).toThrow(ConfigurationError);
  });
});
