import { describe, it, expect } from '@jest/globals';
import { buildClusterAccessContext } from '../../../../src/infrastructure/kubernetes/context';
import { AuthResolutionError, ConfigurationError } from '../../../../src/lib/errors';
import {
  NOW,
  TEST_CA_DATA,
  TEST_CONNECTION,
  TEST_TOKEN,
  testToken,
} from '../../../__support__/fixtures';

const at = (): Date => NOW;

describe('buildClusterAccessContext', () => {
  it('builds an in-memory kubeconfig with token auth', () => {
    const context = buildClusterAccessContext(TEST_CONNECTION, testToken(), at);

    expect(context.authToken).toBe(TEST_TOKEN);
    expect(context.expiresAt.toISOString()).toBe('2026-03-01T12:14:00.000Z');
    expect(context.kubeConfig.getCurrentContext()).toBe('invocation');
    expect(context.kubeConfig.getCurrentCluster()).toMatchObject({
      name: 'test-cluster',
      server: 'https://cluster.test.invalid',
      caData: TEST_CA_DATA,
      skipTLSVerify: false,
    });
    expect(context.kubeConfig.getCurrentUser()).toMatchObject({ name: 'invocation', token: TEST_TOKEN });
    expect(context.kubeConfig.getCurrentUser()?.exec).toBeUndefined();
  });

  it('accepts CA data wrapped over several lines', () => {
    const wrapped = TEST_CA_DATA.replace(/(.{20})/g, '$1\n');

    const context = buildClusterAccessContext({ ...TEST_CONNECTION, caData: wrapped }, testToken(), at);

    expect(context.kubeConfig.getCurrentCluster()?.caData).toBe(TEST_CA_DATA);
  });

  it('requires an https endpoint', () => {
    expect(() =>
      buildClusterAccessContext(
        { ...TEST_CONNECTION, apiEndpoint: 'http://cluster.test.invalid' },
        testToken(),
        at,
      ),
    ).toThrow(new ConfigurationError('Cluster endpoint must use https: http://cluster.test.invalid'));

    expect(() =>
      buildClusterAccessContext({ ...TEST_CONNECTION, apiEndpoint: 'nope' }, testToken(), at),
    ).toThrow('Cluster endpoint is not a URL: nope');
  });

  it('requires a PEM certificate authority', () => {
    const notPem = Buffer.from('test', 'utf-8').toString('base64');

    expect(() =>
      buildClusterAccessContext({ ...TEST_CONNECTION, caData: notPem }, testToken(), at),
    ).toThrow(ConfigurationError);
    expect(() =>
      buildClusterAccessContext({ ...TEST_CONNECTION, caData: '%%%' }, testToken(), at),
    ).toThrow('Cluster CA data is not a base64-encoded PEM certificate');
  });

  it('refuses an empty token', () => {
    expect(() =>
      buildClusterAccessContext(TEST_CONNECTION, { token: '', expiresAt: testToken().expiresAt }, at),
    ).toThrow(new AuthResolutionError('Resolved cluster token is empty'));
  });

  it('refuses an expired token', () => {
    expect(() =>
      buildClusterAccessContext(TEST_CONNECTION, { token: TEST_TOKEN, expiresAt: NOW }, at),
    ).toThrow(AuthResolutionError);
  });
});
