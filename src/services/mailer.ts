import nodemailer, { type SendMailOptions } from 'nodemailer';
import type { Logger } from 'pino';
import { z } from 'zod';
import { localLogger } from '../utils/logger.js';
import { formatAddress, parseAddress } from '../lib/address.js';
import { ConfigurationError, DeliveryError, type DeliveryErrorType } from '../lib/errors.js';

const log = localLogger.child({ module: 'mailer' });

export const mailerConfigSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive(),
  username: z.string().optional(),
  password: z.string().optional(),
  useTls: z.boolean().default(false),
  defaultFrom: z.string().optional(),
  // When set, every email goes here instead and the real recipients are put in the subject
  toOverride: z.string().optional(),
  dumpBody: z.boolean().default(false)
});

export type MailerConfigInput = z.input<typeof mailerConfigSchema>;
export type MailerConfig = z.infer<typeof mailerConfigSchema>;

export interface OutgoingMail {
  recipients: string[];
  subject: string;
  body: string;
  html?: boolean;
  from?: string;
}

export interface SentMail {
  messageId: string;
  recipients: string[];
  subject: string;
}

export interface MailSender {
  send(mail: OutgoingMail): Promise<SentMail>;
}

/** The part of a nodemailer transporter the mailer uses. */
export interface MailTransport {
  sendMail(options: SendMailOptions): Promise<{ messageId: string }>;
}

export class Mailer implements MailSender {
  readonly config: MailerConfig;
  private readonly transport: MailTransport;
  private readonly log: Logger;

  constructor(config: MailerConfigInput, transport?: MailTransport, logger: Logger = log) {
    const parsed = mailerConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid mailer config: ${parsed.error.message}`);
    }
    this.config = parsed.data;
    this.transport = transport ?? createSmtpTransport(this.config);
    this.log = logger;
  }

  async send(mail: OutgoingMail): Promise<SentMail> {
    const from = mail.from ?? this.config.defaultFrom;
    if (!from) {
      throw new ConfigurationError('No from address given and no default from address configured');
    }
    parseAddress(from);
    mail.recipients.forEach(r => parseAddress(r));

    const mimeType = mail.html ? 'html' : 'plain';
    this.log.debug({ mimeType, to: mail.recipients, subject: mail.subject }, 'Sending mail');
    if (this.config.dumpBody) {
      this.log.info(mail.body);
    }

    let recipients = mail.recipients;
    let subject = mail.subject;
    if (this.config.toOverride) {
      subject = `[to ${recipients.join(', ')}] ${subject}`;
      recipients = [this.config.toOverride];
      this.log.info({ to: recipients }, 'Using email override');
    }

    try {
      const info = await this.transport.sendMail({
        from,
        to: recipients.join(', '),
        subject,
        ...(mail.html ? { html: mail.body } : { text: mail.body }),
        date: new Date()
      });
      this.log.info({ action: 'email_sent', messageId: info.messageId, to: recipients }, 'Email sent');
      return { messageId: info.messageId, recipients, subject };
    } catch (err) {
      this.log.warn({ err, action: 'email_send_error' }, 'Send email failed');
      throw mapSmtpError(err);
    }
  }
}

function createSmtpTransport(config: MailerConfig): MailTransport {
  return nodemailer.createTransport({
    host: config.host,
    port: config.port,
    secure: config.port === 465,
    requireTLS: config.useTls,
    auth: config.username ? { user: config.username, pass: config.password } : undefined,
    tls: { rejectUnauthorized: true }
  });
}

export function mapSmtpError(err: unknown): DeliveryError {
  const raw = err instanceof Error ? err.message : String(err);
  const code = err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  let type: DeliveryErrorType = 'SMTP_ERROR';

  if (raw.includes('Daily user sending limit exceeded')) type = 'DAILY_LIMIT';
  else if (raw.includes('The recipient address')) type = 'INVALID_RECIPIENT';
  else if (raw.includes('Please log in with your web browser and then try again')) type = 'AUTH_BROWSER_INTERACTION_REQUIRED';
  else if (raw.includes('Syntax error, cannot decode response')) type = 'SMTP_SYNTAX';
  else if (code === 'EAUTH') type = 'AUTH_FAILED';
  else if (code === 'ECONNECTION' || code === 'ETIMEDOUT' || code === 'ESOCKET') type = 'CONNECTION';

  return new DeliveryError(raw, type, { cause: err });
}

let configured: Mailer | undefined;

export function initMailer(config: MailerConfigInput, transport?: MailTransport): Mailer {
  if (configured) {
    throw new ConfigurationError('Multiple calls to initMailer()');
  }
  const mailer = new Mailer(config, transport);
  const { username, host, port, useTls } = mailer.config;
  log.info(`Mailer using ${username ?? ''}@${host}:${port}${useTls ? ' (TLS)' : ''}`);
  configured = mailer;
  return mailer;
}

export function getMailer(): Mailer {
  if (!configured) {
    throw new ConfigurationError("Mailer hasn't been configured");
  }
  return configured;
}

export function sendMail(recipients: string[], subject: string, body: string, html = false, from?: string) {
  return getMailer().send({ recipients, subject, body, html, from });
}

export function sendTextMail(recipients: string[], subject: string, body: string, from?: string) {
  return sendMail(recipients, subject, body, false, from);
}

export function sendHtmlMail(recipients: string[], subject: string, body: string, from?: string) {
  return sendMail(recipients, subject, body, true, from);
}

export function sendTextMailSingle(toAddress: string, toName: string | undefined, subject: string, body: string, from?: string) {
  return sendTextMail([formatAddress(toAddress, toName)], subject, body, from);
}

export function sendHtmlMailSingle(toAddress: string, toName: string | undefined, subject: string, body: string, from?: string) {
  return sendHtmlMail([formatAddress(toAddress, toName)], subject, body, from);
}

/** Sends through whichever mailer initMailer() configured, looked up at send time. */
export const processMailer: MailSender = {
  send: async mail => getMailer().send(mail)
};
