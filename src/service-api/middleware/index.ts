import type { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';

export const requestLogger = morgan('dev');

function statusOf(err: Error): number {
  // body-parser attaches a 4xx status to malformed payloads
  if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
    return err.status;
  }
  return 500;
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction) {
  const status = statusOf(err);
  if (status === 500) {
    console.error('[ERROR]', err.message);
  }
  res.status(status).json({ success: false, error: err.message });
}
