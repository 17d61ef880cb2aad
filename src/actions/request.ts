/**
 * Validated factory for ActionRequest
 *
 * The only way into the dispatcher's typed world. Everything the request
 * carries is checked here, before any credential or cluster work.
 */

import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { MAX_MANIFEST_BYTES } from '../config/defaults';
import {
  Failure,
  Success,
  type ActionRequest,
  type ManifestObject,
  type Result,
} from '../domain/types';
import { ValidationError } from '../lib/errors';
import { actionRequestSchema } from './schema';

export interface ActionRequestOptions {
  maxManifestBytes?: number;
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.join('.');
  const message = issue.code === 'invalid_type' && issue.received === 'undefined' ? 'is required' : issue.message;
  return path ? `${path} ${message}` : message;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isManifestObject(value: unknown): value is ManifestObject {
  if (!isRecord(value)) return false;
  const { apiVersion, kind, metadata } = value;
  return (
    typeof apiVersion === 'string' &&
    apiVersion.length > 0 &&
    typeof kind === 'string' &&
    kind.length > 0 &&
    isRecord(metadata) &&
    typeof metadata.name === 'string' &&
    metadata.name.length > 0 &&
    (metadata.namespace === undefined || typeof metadata.namespace === 'string')
  );
}

/**
 * Parse exactly one resource document and settle its namespace
 *
 * The request namespace is written into a document that declares none, so
 * a caller applying a cluster-scoped kind (ClusterRole, Namespace) leaves
 * `namespace` out of the request.
 */
export function parseManifest(
  manifest: string,
  namespace: string | undefined,
  maxBytes: number = MAX_MANIFEST_BYTES,
): Result<ManifestObject, ValidationError> {
  const size = Buffer.byteLength(manifest, 'utf-8');
  if (size > maxBytes) {
    return Failure(
      new ValidationError(`manifest is ${size} bytes, the limit is ${maxBytes}`, { size, maxBytes }),
    );
  }

  let documents: unknown[];
  try {
    documents = yaml.loadAll(manifest).filter((doc) => doc !== null && doc !== undefined);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    return Failure(new ValidationError(`manifest is not valid YAML: ${reason}`));
  }

  if (documents.length !== 1) {
    return Failure(
      new ValidationError(`manifest must contain exactly one document, found ${documents.length}`, {
        documents: documents.length,
      }),
    );
  }

  const [document] = documents;
  if (!isManifestObject(document)) {
    return Failure(
      new ValidationError('manifest must be a resource with apiVersion, kind and metadata.name'),
    );
  }

  const declared = document.metadata.namespace;
  if (namespace !== undefined && declared !== undefined && declared !== namespace) {
    return Failure(
      new ValidationError(
        `manifest namespace "${declared}" does not match request namespace "${namespace}"`,
        { declared, namespace },
      ),
    );
  }

  if (namespace !== undefined && declared === undefined) {
    return Success({ ...document, metadata: { ...document.metadata, namespace } });
  }
  return Success(document);
}

/**
 * Smart constructor for ActionRequest
 */
export function createActionRequest(
  input: unknown,
  options: ActionRequestOptions = {},
): Result<ActionRequest, ValidationError> {
  const parsed = actionRequestSchema.safeParse(input);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(formatIssue);
    return Failure(new ValidationError(`Invalid request: ${issues.join('; ')}`, { issues }));
  }

  const request = parsed.data;
  switch (request.action) {
    case 'get':
      return Success<ActionRequest>({ action: 'get', namespace: request.namespace });
    case 'restart':
    case 'status':
    case 'describe':
      return Success<ActionRequest>({
        action: request.action,
        namespace: request.namespace,
        deployment: request.deployment,
      });
    case 'apply': {
      const resource = parseManifest(request.manifest, request.namespace, options.maxManifestBytes);
      if (!resource.ok) {
        return resource;
      }
      return Success<ActionRequest>({
        action: 'apply',
        ...(request.namespace !== undefined && { namespace: request.namespace }),
        manifest: request.manifest,
        resource: resource.value,
      });
    }
  }
}
