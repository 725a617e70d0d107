import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { AuthError, AuthErrorCode } from '../auth/errors';
import type { Logger } from './requestLogger';

/**
 * Last stop for every error. AuthErrors map to their own status and code;
 * anything else is a 500 without internals.
 */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err);

    if (err instanceof ZodError) {
      const invalid = new AuthError(AuthErrorCode.ValidationFailed, { details: err.flatten() });
      return res.status(invalid.status).json({
        error: { code: invalid.code, message: invalid.message, details: invalid.details },
      });
    }

    if (err instanceof AuthError) {
      if (err.code === AuthErrorCode.StoreUnavailable) {
        logger.error({ err: err.cause ?? err, path: req.path }, '[http] store unavailable');
      }
      return res.status(err.status).json({
        error: {
          code: err.code,
          message: err.message,
          ...(err.code === AuthErrorCode.ValidationFailed ? { details: err.details } : {}),
        },
      });
    }

    // express.json() rejects malformed bodies with a 4xx http-errors instance
    if (isClientHttpError(err)) {
      return res.status(err.status).json({ error: { code: AuthErrorCode.ValidationFailed, message: 'Malformed request body' } });
    }

    logger.error({ err, path: req.path }, '[http] unhandled error');
    return res.status(500).json({ error: { code: 'Internal', message: 'Internal server error' } });
  };
}

function isClientHttpError(err: unknown): err is { status: number } {
  return (
    typeof err === 'object' &&
    err !== null &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}
