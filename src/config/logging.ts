import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

export const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info');

export type LogLevel = z.infer<typeof logLevelSchema>;

// Read on its own so that importing the loggers never validates the rest of the environment
export const logLevel: LogLevel = logLevelSchema.catch('info').parse(process.env.LOG_LEVEL);
