import { Request, Response, NextFunction } from 'express';
import crypto from 'crypto';
import { AppError, ErrorDetails } from '../utils/errors';

interface ErrorBody {
  success: false;
  error: {
    code: string;
    message: string;
    errorId?: string;
    details?: ErrorDetails;
  };
}

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      console.error('[ERROR]', { code: err.code, message: err.message, details: err.details, path: req.path });
    }

    const body: ErrorBody = {
      success: false,
      error: {
        code: err.code,
        message: err.message,
      },
    };
    if (err.details) {
      body.error.details = err.details;
    }
    return res.status(err.statusCode).json(body);
  }

  if (isMalformedJson(err)) {
    const body: ErrorBody = {
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' },
    };
    return res.status(400).json(body);
  }

  const errorId = crypto.randomUUID();
  const production = req.app.get('env') === 'production';

  console.error('Error:', {
    errorId,
    message: err.message,
    stack: production ? undefined : err.stack,
    path: req.path,
    method: req.method,
  });

  const body: ErrorBody = {
    success: false,
    error: {
      code: 'INTERNAL_ERROR',
      errorId,
      message: production ? 'Internal server error' : err.message,
    },
  };
  return res.status(500).json(body);
};
