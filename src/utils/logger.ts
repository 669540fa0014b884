import pino from 'pino';
import { logLevel } from '../config/logging.js';

const redact = {
  paths: ['smtp_pass', 'credentials.password', 'password', 'config.password'],
  censor: '******'
};

// Alert handlers are attached here at runtime (see alerts/setup.ts)
export const logStreams = pino.multistream([
  // multistream has no silent level; the logger's own level already drops everything
  { level: logLevel === 'silent' ? 'fatal' : logLevel, stream: pino.destination(1) }
]);

export const logger = pino({ level: logLevel, redact }, logStreams);

// Never routed through logStreams, so nothing logged here can turn into an alert email
export const localLogger = pino({ level: logLevel, redact }, pino.destination(1));

export const internalLogger = pino({ name: 'alert-handler', redact }, pino.destination(2));
