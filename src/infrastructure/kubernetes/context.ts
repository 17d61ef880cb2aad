/**
 * Context Builder
 *
 * Combines the static connection with one invocation's token into an
 * in-memory KubeConfig. No kubeconfig file, exec plugin or CA file is ever
 * written; the object is dropped when the invocation ends.
 */

import * as k8s from '@kubernetes/client-node';
import type { ClusterAccessContext, ClusterConnection, ClusterToken } from '../../domain/types';
import { AuthResolutionError, ConfigurationError } from '../../lib/errors';

const CONTEXT_NAME = 'invocation';
const PEM_HEADER = '-----BEGIN CERTIFICATE-----';

function assertEndpoint(endpoint: string): void {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    throw new ConfigurationError(`Cluster endpoint is not a URL: ${endpoint}`);
  }
  if (url.protocol !== 'https:') {
    throw new ConfigurationError(`Cluster endpoint must use https: ${endpoint}`);
  }
}

function assertCertificateAuthority(caData: string): void {
  const compact = caData.replace(/\s+/g, '');
  const decoded = /^[A-Za-z0-9+/]+={0,2}$/.test(compact)
    ? Buffer.from(compact, 'base64').toString('utf-8')
    : '';
  if (!decoded.includes(PEM_HEADER)) {
    throw new ConfigurationError('Cluster CA data is not a base64-encoded PEM certificate');
  }
}

export function buildClusterAccessContext(
  connection: ClusterConnection,
  token: ClusterToken,
  now: () => Date = () => new Date(),
): ClusterAccessContext {
  assertEndpoint(connection.apiEndpoint);
  assertCertificateAuthority(connection.caData);

  if (!token.token) {
    throw new AuthResolutionError('Resolved cluster token is empty');
  }
  if (token.expiresAt.getTime() <= now().getTime()) {
    throw new AuthResolutionError('Resolved cluster token has already expired', {
      expiresAt: token.expiresAt.toISOString(),
    });
  }

  const kubeConfig = new k8s.KubeConfig();
  kubeConfig.loadFromOptions({
    clusters: [
      {
        name: connection.clusterName,
        server: connection.apiEndpoint,
        caData: connection.caData.replace(/\s+/g, ''),
        skipTLSVerify: false,
      },
    ],
    users: [{ name: CONTEXT_NAME, token: token.token }],
    contexts: [{ name: CONTEXT_NAME, cluster: connection.clusterName, user: CONTEXT_NAME }],
    currentContext: CONTEXT_NAME,
  });

  return {
    clusterName: connection.clusterName,
    apiEndpoint: connection.apiEndpoint,
    caData: connection.caData,
    authToken: token.token,
    expiresAt: token.expiresAt,
    kubeConfig,
  };
}
