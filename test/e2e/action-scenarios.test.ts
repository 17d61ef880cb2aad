/**
 * Full pipeline against an in-process cluster: handler, container,
 * dispatcher, executor and formatter wired the way production wires them,
 * with only the credential exchange and the API server replaced.
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { createContainer } from '../../src/app/container';
import { createController } from '../../src/app/controller';
import { createHandler, type Handler } from '../../src/handler';
import { RESTART_ANNOTATION } from '../../src/config/defaults';
import type { ResponseEnvelope } from '../../src/domain/types';
import { FakeCluster } from '../__support__/fake-cluster';
import {
  NOW,
  TEST_TOKEN,
  createFakeResolver,
  testConfig,
  testToken,
} from '../__support__/fixtures';

const CONFIG_MAP = 'apiVersion: v1\nkind: ConfigMap\nmetadata:\n  name: settings\ndata:\n  mode: fast\n';

describe('action scenarios', () => {
  let cluster: FakeCluster;
  let resolver: ReturnType<typeof createFakeResolver>;
  let handler: Handler;
  let tick: number;

  const wire = (timeoutMs = 5000): Handler => {
    const deps = createContainer(
      {
        config: testConfig({ timeoutMs }),
        environment: 'test',
        clusterApiFactory: () => cluster,
        now: () => new Date(NOW.getTime() + 1000 * tick++),
      },
      { resolver },
    );
    return createHandler(() => createController(deps));
  };

  beforeEach(() => {
    cluster = new FakeCluster().addDeployment('prod', 'django-app');
    resolver = createFakeResolver(testToken());
    tick = 0;
    handler = wire();
  });

  it('lists the namespace for a get request', async () => {
    const envelope = await handler({ action: 'get', namespace: 'prod' });

    expect(envelope).toEqual({
      status: 'ok',
      data: [
        'NAME                         READY   UP-TO-DATE   AVAILABLE   AGE',
        'deployment.apps/django-app   2/2     2            2           60m',
      ].join('\n'),
    });
  });

  it('updates the rollover marker for a restart request', async () => {
    const envelope = await handler({ action: 'restart', namespace: 'prod', deployment: 'django-app' });

    expect(envelope).toEqual({ status: 'ok', data: 'deployment.apps/django-app restarted' });
    const marker = cluster.deployment('prod', 'django-app')?.podTemplateAnnotations[RESTART_ANNOTATION];
    expect(marker).toBe(cluster.restartMarkers[0]);
    expect(Number.isNaN(Date.parse(marker ?? ''))).toBe(false);
  });

  it('rolls over twice when a restart is delivered twice', async () => {
    const request = { action: 'restart', namespace: 'prod', deployment: 'django-app' };

    await handler(request);
    await handler(request);

    expect(cluster.restartMarkers).toHaveLength(2);
    expect(cluster.restartMarkers[0]).not.toBe(cluster.restartMarkers[1]);
  });

  it('rejects an apply that uses the wrong field name before touching anything', async () => {
    const envelope = await handler({ action: 'apply', yaml: '<malformed>' });

    expect(envelope.status).toBe('error');
    expect(envelope.status === 'error' && envelope.data.kind).toBe('ValidationError');
    expect(resolver.resolve).not.toHaveBeenCalled();
    expect(cluster.calls).toEqual([]);
  });

  it('rejects an apply with an invalid document', async () => {
    const envelope = await handler({ action: 'apply', manifest: '<malformed>' });

    expect(envelope).toEqual({
      status: 'error',
      data: {
        kind: 'ValidationError',
        message: 'manifest must be a resource with apiVersion, kind and metadata.name',
      },
    });
  });

  it('converges when the same manifest is applied twice', async () => {
    const request = { action: 'apply', namespace: 'prod', manifest: CONFIG_MAP };

    const first = await handler(request);
    const stored = cluster.objects.get('v1/ConfigMap/prod/settings');
    const second = await handler(request);

    expect(first).toEqual({ status: 'ok', data: 'configmap/settings serverside-applied' });
    expect(second).toEqual(first);
    expect(cluster.objects.get('v1/ConfigMap/prod/settings')).toEqual(stored);
    expect(stored?.resourceVersion).toBe(1);
  });

  it('reports a missing deployment as an ExecutionError', async () => {
    const envelope = await handler({ action: 'status', namespace: 'prod', deployment: 'ghost' });

    expect(envelope).toEqual({
      status: 'error',
      data: {
        kind: 'ExecutionError',
        message: 'Error from server (NotFound): deployments.apps "ghost" not found',
      },
    });
  });

  it('reports a slow cluster as ExecutionTimeout', async () => {
    cluster.delayMs = 300;
    handler = wire(50);

    const envelope = await handler({ action: 'get', namespace: 'prod' });

    expect(envelope).toEqual({
      status: 'error',
      data: { kind: 'ExecutionTimeout', message: 'read did not finish within 50ms' },
    });
  });

  it('never returns the token, whatever fails', async () => {
    const envelopes: ResponseEnvelope[] = [];

    cluster.transportFailure = new Error(`dial failed for token ${TEST_TOKEN}`);
    envelopes.push(await handler({ action: 'get', namespace: 'prod' }));

    resolver.resolve.mockRejectedValueOnce(new Error(`exchange refused ${TEST_TOKEN}`));
    envelopes.push(await handler({ action: 'get', namespace: 'prod' }));

    expect(envelopes.map((e) => e.status)).toEqual(['error', 'error']);
    expect(JSON.stringify(envelopes)).not.toContain(TEST_TOKEN);
  });
});
