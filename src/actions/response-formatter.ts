/**
 * Response Formatter
 *
 * Maps every terminal dispatch outcome onto exactly one envelope. All text
 * that leaves here has been through redactSecrets.
 */

import type { ResponseEnvelope } from '../domain/types';
import { ErrorKinds } from '../lib/errors';
import { redactSecrets } from '../lib/redact';
import type { DispatchOutcome } from './dispatcher';

export function formatResponse(outcome: DispatchOutcome): ResponseEnvelope {
  const scrub = (text: string): string => redactSecrets(text, outcome.sensitive);

  if (outcome.state === 'Failed') {
    return {
      status: 'error',
      data: { kind: outcome.error.kind, message: scrub(outcome.error.message) },
    };
  }

  const { exitCode, stdout, stderr } = outcome.result;
  if (exitCode === 0) {
    return { status: 'ok', data: scrub(stdout) };
  }

  return {
    status: 'error',
    data: {
      kind: ErrorKinds.EXECUTION,
      message: scrub(stderr.trim() || stdout.trim() || `command exited with code ${exitCode}`),
    },
  };
}

/**
 * Process exit status the trigger sees for an envelope
 */
export const exitCodeFor = (envelope: ResponseEnvelope): number =>
  envelope.status === 'ok' ? 0 : 1;
