import { describe, it, expect } from '@jest/globals';
import { createActionRequest, parseManifest } from '../../../src/actions/request';
import type { ActionRequest } from '../../../src/domain/types';
import { ValidationError } from '../../../src/lib/errors';

const CONFIG_MAP = [
  'apiVersion: v1',
  'kind: ConfigMap',
  'metadata:',
  '  name: settings',
  'data:',
  '  mode: fast',
  '',
].join('\n');

function expectValid(input: unknown): ActionRequest {
  const result = createActionRequest(input);
  if (!result.ok) {
    throw new Error(`expected a valid request, got: ${result.error.message}`);
  }
  return result.value;
}

function expectInvalid(input: unknown, maxManifestBytes?: number): ValidationError {
  const result = createActionRequest(input, { maxManifestBytes });
  if (result.ok) {
    throw new Error(`expected a validation failure for ${JSON.stringify(input)}`);
  }
  expect(result.error).toBeInstanceOf(ValidationError);
  return result.error;
}

describe('createActionRequest', () => {
  describe('get / restart / status / describe', () => {
    it('accepts a get request', () => {
      expect(expectValid({ action: 'get', namespace: 'prod' })).toEqual({
        action: 'get',
        namespace: 'prod',
      });
    });

    it('accepts deployment-scoped actions', () => {
      for (const action of ['restart', 'status', 'describe'] as const) {
        expect(expectValid({ action, namespace: 'prod', deployment: 'django-app' })).toEqual({
          action,
          namespace: 'prod',
          deployment: 'django-app',
        });
      }
    });

    it('trims surrounding whitespace from names', () => {
      expect(expectValid({ action: 'get', namespace: ' prod ' })).toEqual({
        action: 'get',
        namespace: 'prod',
      });
    });

    it('rejects a get without namespace', () => {
      expect(expectInvalid({ action: 'get' }).message).toBe('Invalid request: namespace is required');
    });

    it('rejects a restart without deployment', () => {
      expect(expectInvalid({ action: 'restart', namespace: 'prod' }).message).toBe(
        'Invalid request: deployment is required',
      );
    });

    it('rejects fields the action does not take', () => {
      expect(expectInvalid({ action: 'get', namespace: 'prod', deployment: 'web' }).message).toBe(
        "Invalid request: Unrecognized key(s) in object: 'deployment'",
      );
    });

    it('rejects names that are not RFC 1123', () => {
      expect(expectInvalid({ action: 'get', namespace: 'Prod' }).message).toBe(
        'Invalid request: namespace must be a lowercase RFC 1123 label',
      );
      expect(
        expectInvalid({ action: 'restart', namespace: 'prod', deployment: 'web_app' }).message,
      ).toBe('Invalid request: deployment must be a lowercase RFC 1123 subdomain');
    });

    it('rejects unknown actions', () => {
      expect(expectInvalid({ action: 'delete', namespace: 'prod' }).message).toMatch(
        /^Invalid request: action Invalid discriminator value/,
      );
    });

    it('rejects payloads that are not objects', () => {
      expect(expectInvalid('get prod').message).toBe(
        'Invalid request: Expected object, received string',
      );
      expect(expectInvalid(null).message).toBe('Invalid request: Expected object, received null');
    });

    it('lists the issues in the error details', () => {
      const error = expectInvalid({ action: 'restart' });
      expect(error.details).toEqual({
        issues: ['namespace is required', 'deployment is required'],
      });
    });
  });

  describe('apply', () => {
    it('injects the request namespace into the document', () => {
      const request = expectValid({ action: 'apply', namespace: 'prod', manifest: CONFIG_MAP });

      expect(request).toEqual({
        action: 'apply',
        namespace: 'prod',
        manifest: CONFIG_MAP,
        resource: {
          apiVersion: 'v1',
          kind: 'ConfigMap',
          metadata: { name: 'settings', namespace: 'prod' },
          data: { mode: 'fast' },
        },
      });
    });

    it('keeps the namespace declared in the document', () => {
      const manifest = CONFIG_MAP.replace('  name: settings', '  name: settings\n  namespace: staging');
      const request = expectValid({ action: 'apply', manifest });

      expect(request.action === 'apply' && request.resource.metadata.namespace).toBe('staging');
      expect(request).not.toHaveProperty('namespace');
    });

    it('accepts JSON documents', () => {
      const request = expectValid({
        action: 'apply',
        manifest: '{"apiVersion":"v1","kind":"Namespace","metadata":{"name":"team-a"}}',
      });

      expect(request.action === 'apply' && request.resource).toEqual({
        apiVersion: 'v1',
        kind: 'Namespace',
        metadata: { name: 'team-a' },
      });
    });

    it('rejects a payload that uses the wrong field name', () => {
      const error = expectInvalid({ action: 'apply', yaml: CONFIG_MAP });

      expect(error.message).toBe(
        "Invalid request: manifest is required; Unrecognized key(s) in object: 'yaml'",
      );
    });

    it('rejects a blank manifest', () => {
      expect(expectInvalid({ action: 'apply', manifest: '   ' }).message).toBe(
        'Invalid request: manifest must not be empty',
      );
    });

    it('rejects malformed YAML', () => {
      expect(expectInvalid({ action: 'apply', manifest: 'kind: [unclosed' }).message).toMatch(
        /^manifest is not valid YAML: /,
      );
    });

    it('rejects more than one document', () => {
      expect(
        expectInvalid({ action: 'apply', manifest: `${CONFIG_MAP}---\n${CONFIG_MAP}` }).message,
      ).toBe('manifest must contain exactly one document, found 2');
    });

    it('rejects documents that cannot be addressed', () => {
      expect(
        expectInvalid({ action: 'apply', manifest: 'apiVersion: v1\nkind: ConfigMap\n' }).message,
      ).toBe('manifest must be a resource with apiVersion, kind and metadata.name');
    });

    it('rejects a namespace conflict between request and document', () => {
      const manifest = CONFIG_MAP.replace('  name: settings', '  name: settings\n  namespace: staging');

      expect(expectInvalid({ action: 'apply', namespace: 'prod', manifest }).message).toBe(
        'manifest namespace "staging" does not match request namespace "prod"',
      );
    });

    it('enforces the manifest size limit', () => {
      expect(expectInvalid({ action: 'apply', manifest: 'x'.repeat(20) }, 10).message).toBe(
        'manifest is 20 bytes, the limit is 10',
      );
    });
  });
});

describe('parseManifest', () => {
  it('ignores empty documents around the resource', () => {
    const result = parseManifest(`---\n${CONFIG_MAP}---\n`, undefined);

    expect(result.ok && result.value.metadata.name).toBe('settings');
  });

  it('leaves a cluster-scoped document without a namespace when none is requested', () => {
    const clusterRole = [
      'apiVersion: rbac.authorization.k8s.io/v1',
      'kind: ClusterRole',
      'metadata:',
      '  name: reader',
      'rules: []',
      '',
    ].join('\n');

    expect(parseManifest(clusterRole, undefined)).toEqual({
      ok: true,
      value: {
        apiVersion: 'rbac.authorization.k8s.io/v1',
        kind: 'ClusterRole',
        metadata: { name: 'reader' },
        rules: [],
      },
    });
  });
});
