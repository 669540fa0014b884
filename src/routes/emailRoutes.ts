import { Router } from 'express';
import { sendEmailHandler } from '../controllers/emailController.js';
import { createSendRateLimiter } from '../middleware/rateLimit.js';
import { env } from '../config/env.js';

const router = Router();

router.post('/send-email', createSendRateLimiter(env.SEND_EMAIL_RATE_LIMIT), sendEmailHandler);

export default router;
