export * from './alerts/index.js';
export { formatAddress, isEmailAddress, parseAddress, type ParsedAddress } from './lib/address.js';
export { AppError, ConfigurationError, DeliveryError, InvalidAddressFormat, isInterrupt, type DeliveryErrorType } from './lib/errors.js';
export {
  Mailer,
  getMailer,
  initMailer,
  mailerConfigSchema,
  processMailer,
  sendHtmlMail,
  sendHtmlMailSingle,
  sendMail,
  sendTextMail,
  sendTextMailSingle,
  type MailSender,
  type MailTransport,
  type MailerConfig,
  type MailerConfigInput,
  type OutgoingMail,
  type SentMail
} from './services/mailer.js';
export { logger, localLogger, logStreams } from './utils/logger.js';
