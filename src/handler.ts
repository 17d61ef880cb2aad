/**
 * Invocation handler for an event-triggered runtime
 *
 * The controller is built on first use and kept for the life of the
 * process; a failed bootstrap is retried on the next invocation.
 */

import { bootstrap } from './app';
import type { Controller } from './app/controller';
import { Failure, Success, type ResponseEnvelope, type Result } from './domain/types';
import { ConfigurationError, ValidationError, toActionError } from './lib/errors';
import { redactSecrets } from './lib/redact';

function parseJson(text: string, source: string): Result<unknown, ValidationError> {
  try {
    return Success(JSON.parse(text));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Failure(new ValidationError(`${source} is not valid JSON: ${reason}`));
  }
}

/**
 * Accepts the payload itself, its JSON text, or an HTTP-style event whose
 * `body` carries the payload
 */
export function parseEvent(event: unknown): Result<unknown, ValidationError> {
  if (typeof event === 'string') {
    return parseJson(event, 'payload');
  }
  if (typeof event === 'object' && event !== null && !('action' in event) && 'body' in event) {
    const body: unknown = Reflect.get(event, 'body');
    return typeof body === 'string' ? parseJson(body, 'body') : Success(body);
  }
  return Success(event);
}

export type Handler = (event: unknown) => Promise<ResponseEnvelope>;

export function createHandler(factory: () => Controller | Promise<Controller>): Handler {
  let pending: Promise<Controller> | undefined;

  const controller = (): Promise<Controller> => {
    if (!pending) {
      pending = Promise.resolve()
        .then(factory)
        .catch((error: unknown) => {
          pending = undefined;
          throw error;
        });
    }
    return pending;
  };

  return async (event: unknown): Promise<ResponseEnvelope> => {
    const payload = parseEvent(event);
    if (!payload.ok) {
      return { status: 'error', data: { kind: payload.error.kind, message: payload.error.message } };
    }

    let instance: Controller;
    try {
      instance = await controller();
    } catch (error) {
      const actionError = toActionError(error, ConfigurationError);
      return {
        status: 'error',
        data: { kind: actionError.kind, message: redactSecrets(actionError.message) },
      };
    }

    return instance.handle(payload.value);
  };
}

export const handler: Handler = createHandler(() => bootstrap());
