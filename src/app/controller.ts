/**
 * Controller - one invocation in, one envelope out
 */

import type { Logger } from 'pino';
import type { ResponseEnvelope } from '../domain/types';
import { toActionError } from '../lib/errors';
import { createTimer } from '../lib/logger';
import { redactSecrets } from '../lib/redact';
import type { Dispatcher } from '../actions/dispatcher';
import { formatResponse } from '../actions/response-formatter';

export interface Controller {
  handle: (input: unknown) => Promise<ResponseEnvelope>;
}

export interface ControllerDeps {
  dispatcher: Dispatcher;
  logger: Logger;
}

export const createController = ({ dispatcher, logger }: ControllerDeps): Controller => ({
  async handle(input: unknown): Promise<ResponseEnvelope> {
    const timer = createTimer(logger, 'invocation');

    try {
      const outcome = await dispatcher.dispatch(input);
      const envelope = formatResponse(outcome);

      const fields = {
        action: outcome.action,
        states: outcome.trace.states.join(' -> '),
        status: envelope.status,
      };
      if (envelope.status === 'error') {
        logger.warn({ ...fields, kind: envelope.data.kind }, envelope.data.message);
      }
      timer.end(fields);

      return envelope;
    } catch (error) {
      // The dispatcher recovers its own failures; this only guards the boundary
      const actionError = toActionError(error);
      timer.error(actionError);
      return {
        status: 'error',
        data: { kind: actionError.kind, message: redactSecrets(actionError.message) },
      };
    }
  },
});
