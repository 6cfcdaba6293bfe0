import type { Request, RequestHandler, Response } from 'express';
import type { ApiResponse, RegistryErrorKind } from '@shared/types';
import type { Outcome } from '@core/outcome';
import { tokenIdSchema } from '@core/requests';

export const ERROR_STATUS: Record<RegistryErrorKind, number> = {
  NotFound: 404,
  InvalidArgument: 400,
  InvalidTransition: 409,
  InvalidRating: 422,
  PreconditionFailed: 409,
  TransferFailed: 502,
};

/** Wraps an async handler so rejections reach the error middleware. */
export function handle(fn: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    fn(req, res).catch(next);
  };
}

export function badRequest(res: Response, error: string): void {
  const body: ApiResponse = { success: false, error };
  res.status(400).json(body);
}

export function sendOutcome<T>(res: Response, outcome: Outcome<T>, status = 200): void {
  if (!outcome.ok) {
    const body: ApiResponse = {
      success: false,
      error: outcome.error.message,
      kind: outcome.error.kind,
    };
    res.status(ERROR_STATUS[outcome.error.kind]).json(body);
    return;
  }
  const body: ApiResponse<T> = { success: true, data: outcome.value };
  res.status(status).json(body);
}

/** Logs a rejected mutation; returns the outcome unchanged. */
export function reported<T>(operation: string, outcome: Outcome<T>): Outcome<T> {
  if (!outcome.ok) {
    console.warn(
      `[REGISTRY] ${operation} rejected (${outcome.error.kind}): ${outcome.error.message}`,
    );
  }
  return outcome;
}

export function parseTokenId(res: Response, raw: string): number | null {
  const parsed = tokenIdSchema.safeParse(raw);
  if (!parsed.success) {
    badRequest(res, `Invalid token id '${raw}'`);
    return null;
  }
  return parsed.data;
}
