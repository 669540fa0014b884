import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { sendMail } from '../services/mailer.js';
import { logger } from '../utils/logger.js';
import { AppError } from '../lib/errors.js';
import { mapStatus } from '../middleware/errorHandler.js';
import type { ApiSuccess } from '../types/email.js';
import type { SentMail } from '../services/mailer.js';

const log = logger.child({ module: 'emailController' });

const emailSchema = z.object({
  to_email: z.string().min(1),
  subject: z.string().max(255),
  body: z.string().max(200_000),
  html: z.union([z.boolean(), z.enum(['true', 'false']).transform(v => v === 'true')]).optional(),
  from: z.string().min(1).optional()
});

function splitRecipients(value: string): string[] {
  return value.split(',').map(e => e.trim()).filter(Boolean);
}

export async function sendEmailHandler(req: Request, res: Response, next: NextFunction) {
  const parsed = emailSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({ success: false, error: { message: parsed.error.message, type: 'VALIDATION' } });
  }
  const data = parsed.data;

  const recipients = splitRecipients(data.to_email);
  if (!recipients.length) {
    return res.status(400).json({ success: false, error: { message: 'The recipient address is empty', type: 'INVALID_RECIPIENT' } });
  }

  try {
    const info = await sendMail(recipients, data.subject, data.body, data.html ?? false, data.from);
    log.info({ action: 'email_sent', messageId: info.messageId, fn: 'sendEmailHandler' }, 'Email sent');
    const response: ApiSuccess<SentMail> = { success: true, message: 'Email sent', info };
    return res.json(response);
  } catch (err) {
    if (err instanceof AppError && err.type !== 'CONFIGURATION') {
      return res.status(mapStatus(err.type)).json(err.toJSON());
    }
    next(err);
  }
}
