import pino from 'pino';
import { z } from 'zod';
import type { LogRecord } from './types.js';

const pinoLineSchema = z
  .object({
    // A string when the logger uses a formatters.level hook
    level: z.union([z.number(), z.string()]),
    time: z.union([z.number(), z.string()]).optional(),
    msg: z.string().optional(),
    module: z.string().optional(),
    fn: z.string().optional(),
    location: z.string().optional(),
    err: z
      .object({
        type: z.string().optional(),
        message: z.string().optional(),
        stack: z.string().optional()
      })
      .optional()
  })
  .passthrough();

export function levelLabel(level: number): string {
  const label: string | undefined = pino.levels.labels[level];
  return (label ?? `level ${level}`).toUpperCase();
}

function recordTime(time: number | string | undefined): Date {
  const date = time === undefined ? new Date() : new Date(time);
  return Number.isNaN(date.getTime()) ? new Date() : date;
}

function firstStackFrame(stack: string | undefined): string | undefined {
  const frame = stack?.split('\n').find(line => line.trimStart().startsWith('at '));
  return frame?.trim().replace(/^at /, '');
}

/**
 * Turns one line of pino JSON output into a LogRecord.
 * `module`, `fn` and `location` come from child logger bindings when present.
 * A missing or unreadable `time` becomes the time of parsing.
 */
export function parseLogLine(line: string): LogRecord {
  const data = pinoLineSchema.parse(JSON.parse(line));
  const message = data.msg ?? data.err?.message ?? '';
  return {
    level: typeof data.level === 'number' ? levelLabel(data.level) : data.level.toUpperCase(),
    rawMessage: message,
    message,
    time: recordTime(data.time),
    module: data.module,
    functionName: data.fn,
    location: data.location ?? firstStackFrame(data.err?.stack),
    error: data.err
  };
}
