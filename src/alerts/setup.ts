import type pino from 'pino';
import { logStreams, localLogger } from '../utils/logger.js';
import { AlertHandler, DEFAULT_OBSCURED_FIELDS, type AlertHandlerOptions } from './alertHandler.js';

export interface ErrorEmailOptions extends AlertHandlerOptions {
  sendErrors: boolean;
  sendWarnings: boolean;
  /** Streams of the logger to watch. Defaults to the root logger's. */
  target?: pino.MultiStreamRes;
}

/**
 * Attaches an AlertHandler to a logger's streams. With `sendWarnings` every
 * record at `warn` and above is emailed, otherwise only `error` and above.
 */
export function initErrorEmails(options: ErrorEmailOptions): AlertHandler | undefined {
  const { sendErrors, sendWarnings, target = logStreams, ...handlerOptions } = options;
  const log = (handlerOptions.localLogger ?? localLogger).child({ module: 'alerts' });

  if (!sendErrors && !sendWarnings) {
    return undefined;
  }

  log.info('Setting up error / warning emails');
  const handler = new AlertHandler({
    ...handlerOptions,
    obscuredFields: handlerOptions.obscuredFields ?? DEFAULT_OBSCURED_FIELDS
  });

  if (sendWarnings) {
    log.info('Sending WARNING emails as well as ERRORs');
  } else {
    log.info('Only sending ERROR emails');
  }
  target.add({ level: sendWarnings ? 'warn' : 'error', stream: handler });

  return handler;
}
