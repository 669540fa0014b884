import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env.js';

describe('loadEnv', () => {
  it('fills in defaults', () => {
    const parsed = loadEnv({});
    expect(parsed.success).toBe(true);
    expect(parsed.data).toMatchObject({
      PORT: 3000,
      LOG_LEVEL: 'info',
      SMTP_PORT: 587,
      SMTP_USE_TLS: false,
      ALERT_SEND_ERRORS: false,
      ALERT_TO: [],
      ALERT_SUBJECT: 'Application error',
      ALERT_MAX_PER_MINUTE: 15
    });
    expect(parsed.data?.SMTP_HOST).toBeUndefined();
  });

  it('parses flags and recipient lists', () => {
    const parsed = loadEnv({
      SMTP_HOST: 'smtp.test',
      SMTP_USE_TLS: '1',
      ALERT_SEND_WARNINGS: 'true',
      ALERT_TO: 'ops@example.com, Dev <dev@example.com>,',
      ALERT_MAX_PER_MINUTE: '5',
      MAIL_TO_OVERRIDE: ''
    });
    expect(parsed.data).toMatchObject({
      SMTP_HOST: 'smtp.test',
      SMTP_USE_TLS: true,
      ALERT_SEND_WARNINGS: true,
      ALERT_TO: ['ops@example.com', 'Dev <dev@example.com>'],
      ALERT_MAX_PER_MINUTE: 5
    });
    expect(parsed.data?.MAIL_TO_OVERRIDE).toBeUndefined();
  });

  it('accepts silent as a log level', () => {
    expect(loadEnv({ LOG_LEVEL: 'silent' }).data?.LOG_LEVEL).toBe('silent');
  });

  it('rejects bad values', () => {
    expect(loadEnv({ LOG_LEVEL: 'loud' }).success).toBe(false);
    expect(loadEnv({ ALERT_MAX_PER_MINUTE: '0' }).success).toBe(false);
    expect(loadEnv({ API_KEY: 'short' }).success).toBe(false);
    expect(loadEnv({ SMTP_USE_TLS: 'yes' }).success).toBe(false);
  });
});
