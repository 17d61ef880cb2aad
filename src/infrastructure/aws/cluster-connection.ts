/**
 * Static cluster connection parameters
 *
 * Endpoint and CA bundle come from configuration when both are set;
 * otherwise one DescribeCluster call at process start supplies them.
 */

import { DescribeClusterCommand, EKSClient } from '@aws-sdk/client-eks';
import type { Logger } from 'pino';
import type { ControllerConfig } from '../../config/types';
import type { ClusterConnection } from '../../domain/types';
import { AuthResolutionError, ConfigurationError } from '../../lib/errors';
import { redactSecrets } from '../../lib/redact';

export interface DescribedCluster {
  endpoint?: string;
  caData?: string;
}

export type ClusterDescriber = (clusterName: string) => Promise<DescribedCluster>;

/**
 * DescribeCluster through the EKS API, using the ambient identity
 */
export const createEksDescriber = (region: string): ClusterDescriber => {
  const client = new EKSClient({ region });

  return async (clusterName: string): Promise<DescribedCluster> => {
    const response = await client.send(new DescribeClusterCommand({ name: clusterName }));
    return {
      ...(response.cluster?.endpoint !== undefined && { endpoint: response.cluster.endpoint }),
      ...(response.cluster?.certificateAuthority?.data !== undefined && {
        caData: response.cluster.certificateAuthority.data,
      }),
    };
  };
};

export async function loadClusterConnection(
  config: ControllerConfig,
  logger: Logger,
  describe: ClusterDescriber = createEksDescriber(config.cluster.region),
): Promise<ClusterConnection> {
  const { name, region, endpoint, caData } = config.cluster;

  if (endpoint !== undefined && caData !== undefined) {
    logger.info({ clusterName: name }, 'Using configured cluster endpoint');
    return Object.freeze({ clusterName: name, region, apiEndpoint: endpoint, caData });
  }

  logger.info({ clusterName: name, region }, 'Describing cluster');

  let described: DescribedCluster;
  try {
    described = await describe(name);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new AuthResolutionError(`DescribeCluster failed for ${name}: ${redactSecrets(message)}`, {
      clusterName: name,
      region,
    });
  }

  if (!described.endpoint || !described.caData) {
    throw new ConfigurationError(`Cluster ${name} did not report an endpoint and CA bundle`, {
      clusterName: name,
      region,
    });
  }

  return Object.freeze({
    clusterName: name,
    region,
    apiEndpoint: described.endpoint,
    caData: described.caData,
  });
}
