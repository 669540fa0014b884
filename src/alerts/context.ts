import { AsyncLocalStorage } from 'node:async_hooks';
import type { IncomingHttpHeaders } from 'node:http';
import type { ContextProvider, RequestDetails, SessionData } from './types.js';

/** The parts of an express Request the alert providers read. */
export interface RequestLike {
  protocol: string;
  method: string;
  baseUrl: string;
  originalUrl: string;
  headers: IncomingHttpHeaders;
  body?: unknown;
  route?: unknown;
  session?: unknown;
}

const requestStorage = new AsyncLocalStorage<RequestLike>();

export function runWithRequest<T>(req: RequestLike, fn: () => T): T {
  return requestStorage.run(req, fn);
}

export function getCurrentRequest(): RequestLike | undefined {
  return requestStorage.getStore();
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function routePath(req: RequestLike): string {
  if (isRecord(req.route) && typeof req.route.path === 'string') {
    return `${req.baseUrl}${req.route.path}`;
  }
  return '-';
}

export const requestDetailsProvider: ContextProvider<RequestDetails> = {
  tryGet() {
    const req = getCurrentRequest();
    if (!req) return undefined;
    return {
      url: `${req.protocol}://${req.headers.host ?? ''}${req.originalUrl}`,
      method: req.method,
      endpoint: routePath(req),
      form: isRecord(req.body) ? req.body : {}
    };
  }
};

/** Whatever session middleware (express-session or similar) left on the request. */
export const sessionProvider: ContextProvider<SessionData> = {
  tryGet() {
    const req = getCurrentRequest();
    if (!req || !isRecord(req.session)) return undefined;
    return { ...req.session };
  }
};
