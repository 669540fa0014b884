export { AlertHandler, DEFAULT_OBSCURED_FIELDS, type AlertHandlerOptions } from './alertHandler.js';
export { AlertRateLimiter, RATE_LIMIT_WINDOW_SECONDS } from './rateLimiter.js';
export { MASK, buildBody, buildSubject, extractTag, formatRecord, renderRequest, renderSession } from './formatter.js';
export { getCurrentRequest, requestDetailsProvider, runWithRequest, sessionProvider, type RequestLike } from './context.js';
export { parseLogLine } from './logRecord.js';
export { initErrorEmails, type ErrorEmailOptions } from './setup.js';
export type * from './types.js';
