import { NextFunction, Request, Response } from 'express';
import { runWithRequest } from '../alerts/context.js';

// Lets alert emails raised while handling this request include its details
export function requestContext(req: Request, _res: Response, next: NextFunction) {
  runWithRequest(req, next);
}
