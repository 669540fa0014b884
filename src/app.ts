import express, { Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import emailRoutes from './routes/emailRoutes.js';
import { errorHandler } from './middleware/errorHandler.js';
import { apiKeyAuth } from './middleware/auth.js';
import { requestContext } from './middleware/requestContext.js';

export function createApp(apiKey?: string) {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: '*' }));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));
  app.use(requestContext);

  app.get('/healthz', (_req: Request, res: Response) => res.json({ status: 'ok' }));
  app.use(apiKeyAuth(apiKey));
  app.use(emailRoutes);
  app.use(errorHandler);

  return app;
}
