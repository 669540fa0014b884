import { createApp } from './app.js';
import { env } from './config/env.js';
import { logger } from './utils/logger.js';
import { initMailer } from './services/mailer.js';
import { initErrorEmails } from './alerts/setup.js';

if (env.SMTP_HOST) {
  initMailer({
    host: env.SMTP_HOST,
    port: env.SMTP_PORT,
    username: env.SMTP_USER,
    password: env.SMTP_PASS,
    useTls: env.SMTP_USE_TLS,
    defaultFrom: env.MAIL_DEFAULT_FROM,
    toOverride: env.MAIL_TO_OVERRIDE,
    dumpBody: env.MAIL_DUMP_BODY
  });
} else {
  logger.info('SMTP_HOST not set, mail sending disabled');
}

if (env.ALERT_SEND_ERRORS || env.ALERT_SEND_WARNINGS) {
  const from = env.ALERT_FROM ?? env.MAIL_DEFAULT_FROM;
  if (!from || !env.ALERT_TO.length) {
    logger.fatal('ALERT_FROM (or MAIL_DEFAULT_FROM) and ALERT_TO are required for error emails');
    process.exit(1);
  }
  initErrorEmails({
    sendErrors: env.ALERT_SEND_ERRORS,
    sendWarnings: env.ALERT_SEND_WARNINGS,
    from,
    to: env.ALERT_TO,
    subject: env.ALERT_SUBJECT,
    maxSendsPerMinute: env.ALERT_MAX_PER_MINUTE
  });
}

if (!env.API_KEY) {
  logger.info('API_KEY not set, every authenticated route will answer 401');
}

const app = createApp();

app.listen(env.PORT, () => {
  logger.info({ port: env.PORT }, 'Server started');
});
