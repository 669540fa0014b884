import dotenv from 'dotenv';
import { z } from 'zod';
import { logLevelSchema } from './logging.js';

dotenv.config();

const flag = z.enum(['true', 'false', '1', '0']).default('false').transform(v => v === 'true' || v === '1');
const optionalText = z.string().trim().optional().transform(v => (v ? v : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().transform(Number).default('3000'),
  API_KEY: optionalText.refine(v => v === undefined || v.length >= 10, 'API_KEY must be at least 10 characters'),
  LOG_LEVEL: logLevelSchema,
  SEND_EMAIL_RATE_LIMIT: z.string().transform(Number).pipe(z.number().int().positive()).default('50'),

  SMTP_HOST: optionalText,
  SMTP_PORT: z.string().transform(Number).default('587'),
  SMTP_USER: optionalText,
  SMTP_PASS: optionalText,
  SMTP_USE_TLS: flag,
  MAIL_DEFAULT_FROM: optionalText,
  MAIL_TO_OVERRIDE: optionalText,
  MAIL_DUMP_BODY: flag,

  ALERT_SEND_ERRORS: flag,
  ALERT_SEND_WARNINGS: flag,
  ALERT_FROM: optionalText,
  ALERT_TO: z.string().default('').transform(v => v.split(',').map(s => s.trim()).filter(Boolean)),
  ALERT_SUBJECT: z.string().default('Application error'),
  ALERT_MAX_PER_MINUTE: z.string().transform(Number).pipe(z.number().int().positive()).default('15')
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv) {
  return envSchema.safeParse(source);
}

const parsed = loadEnv(process.env);
if (!parsed.success) {
  console.error('Invalid environment variables', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
