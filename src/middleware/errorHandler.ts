import { NextFunction, Request, Response } from 'express';
import { AppError } from '../errors';
import { createLogger } from '../logger';

const log = createLogger('http');

export function notFound(req: Request, res: Response) {
  res.status(404).json({ message: `Cannot ${req.method} ${req.path}`, code: 'NOT_FOUND' });
}

// express recognises error middleware by its four parameters
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    if (err.status >= 500) log.error(`${req.method} ${req.originalUrl}`, err);
    return res.status(err.status).json({ message: err.message, code: err.code, details: err.details });
  }
  // body-parser failures carry their own 4xx status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return res.status(400).json({ message: 'Malformed JSON body', code: 'VALIDATION_ERROR' });
  }
  if (err instanceof Error && 'type' in err && err.type === 'entity.too.large') {
    return res.status(413).json({ message: 'Request body too large', code: 'VALIDATION_ERROR' });
  }
  log.error(`${req.method} ${req.originalUrl} failed`, err);
  return res.status(500).json({ message: 'Internal server error', code: 'INTERNAL' });
}
