/**
 * EKS Credential Resolver
 *
 * Turns the ambient AWS identity into a short-lived bearer token for one
 * cluster: a presigned STS GetCallerIdentity URL, the same scheme
 * aws-iam-authenticator and `aws eks get-token` use. Signing is local; the
 * only network traffic is whatever the credential chain needs.
 */

import { Sha256 } from '@aws-crypto/sha256-js';
import { defaultProvider } from '@aws-sdk/credential-provider-node';
import type { AwsCredentialIdentity, Provider } from '@aws-sdk/types';
import { formatUrl } from '@aws-sdk/util-format-url';
import { HttpRequest } from '@smithy/protocol-http';
import { SignatureV4 } from '@smithy/signature-v4';
import type { Logger } from 'pino';
import { DEFAULT_TOKEN } from '../../config/defaults';
import type { ClusterToken } from '../../domain/types';
import { AuthResolutionError } from '../../lib/errors';
import { redactSecrets } from '../../lib/redact';

export interface CredentialResolver {
  resolve: (clusterName: string) => Promise<ClusterToken>;
}

export interface EksTokenResolverOptions {
  region: string;
  logger: Logger;
  /** Defaults to the standard Node credential chain (env, web identity, container, IMDS) */
  credentials?: Provider<AwsCredentialIdentity>;
  now?: () => Date;
}

function toBase64Url(value: string): string {
  return Buffer.from(value, 'utf-8')
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/, '');
}

/**
 * Create a resolver bound to one region. A fresh credential lookup and
 * signature are made on every call.
 */
export const createEksTokenResolver = (options: EksTokenResolverOptions): CredentialResolver => {
  const { region, logger } = options;
  const credentials = options.credentials ?? defaultProvider();
  const now = options.now ?? (() => new Date());
  const hostname = `sts.${region}.amazonaws.com`;

  return {
    async resolve(clusterName: string): Promise<ClusterToken> {
      if (!clusterName) {
        throw new AuthResolutionError('No target cluster configured for token resolution');
      }

      let identity: AwsCredentialIdentity;
      try {
        identity = await credentials();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn({ clusterName }, 'Ambient AWS credentials unavailable');
        throw new AuthResolutionError(
          `Could not load AWS credentials: ${redactSecrets(message)}`,
          { clusterName },
        );
      }

      const signingDate = now();
      const signer = new SignatureV4({
        credentials: identity,
        region,
        service: 'sts',
        sha256: Sha256,
      });

      const request = new HttpRequest({
        method: 'GET',
        protocol: 'https:',
        hostname,
        path: '/',
        headers: {
          host: hostname,
          [DEFAULT_TOKEN.clusterIdHeader]: clusterName,
        },
        query: {
          Action: 'GetCallerIdentity',
          Version: '2011-06-15',
        },
      });

      let presignedUrl: string;
      try {
        const signed = await signer.presign(request, {
          expiresIn: DEFAULT_TOKEN.presignExpirySeconds,
          signingDate,
        });
        presignedUrl = formatUrl(signed);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new AuthResolutionError(
          `Failed to sign cluster token request: ${redactSecrets(message, [identity.secretAccessKey])}`,
          { clusterName },
        );
      }

      let expiresAt = new Date(signingDate.getTime() + DEFAULT_TOKEN.lifetimeMs);
      if (identity.expiration && identity.expiration < expiresAt) {
        expiresAt = identity.expiration;
      }

      logger.debug({ clusterName, expiresAt: expiresAt.toISOString() }, 'Cluster token resolved');

      return {
        token: `${DEFAULT_TOKEN.prefix}${toBase64Url(presignedUrl)}`,
        expiresAt,
      };
    },
  };
};
