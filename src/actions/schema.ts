/**
 * Schema definition for action requests
 *
 * One strict object per action: a field the action does not take is as
 * much an error as a field it needs and lacks.
 */

import { z } from 'zod';

// RFC 1123 label / subdomain, as the API server enforces them
const DNS_LABEL = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?$/;
const DNS_SUBDOMAIN = /^[a-z0-9]([-a-z0-9]*[a-z0-9])?(\.[a-z0-9]([-a-z0-9]*[a-z0-9])?)*$/;

const namespaceSchema = z
  .string({ invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be empty')
  .max(63, 'must be at most 63 characters')
  .regex(DNS_LABEL, 'must be a lowercase RFC 1123 label')
  .describe('Target namespace');

const deploymentSchema = z
  .string({ invalid_type_error: 'must be a string' })
  .trim()
  .min(1, 'must not be empty')
  .max(253, 'must be at most 253 characters')
  .regex(DNS_SUBDOMAIN, 'must be a lowercase RFC 1123 subdomain')
  .describe('Deployment name');

const manifestSchema = z
  .string({ invalid_type_error: 'must be a string' })
  .refine((value) => value.trim().length > 0, 'must not be empty')
  .describe('Single YAML or JSON resource document');

export const actionRequestSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('get'), namespace: namespaceSchema }).strict(),
  z
    .object({ action: z.literal('restart'), namespace: namespaceSchema, deployment: deploymentSchema })
    .strict(),
  z
    .object({
      action: z.literal('apply'),
      namespace: namespaceSchema.optional(),
      manifest: manifestSchema,
    })
    .strict(),
  z
    .object({ action: z.literal('status'), namespace: namespaceSchema, deployment: deploymentSchema })
    .strict(),
  z
    .object({
      action: z.literal('describe'),
      namespace: namespaceSchema,
      deployment: deploymentSchema,
    })
    .strict(),
]);

export type ActionRequestInput = z.infer<typeof actionRequestSchema>;
