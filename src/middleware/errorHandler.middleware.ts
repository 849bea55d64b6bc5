import type { ErrorRequestHandler } from 'express';

import { HttpError, badRequestError } from '../utils/errors';
import { logger } from '../utils/logger';
import { requestIdOf } from '../utils/requestId';

/** `express.json()` raises a SyntaxError tagged with this type when the body is not JSON. */
const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

const toHttpError = (error: unknown): HttpError | null => {
  if (error instanceof HttpError) {
    return error;
  }

  return isBodyParseError(error) ? badRequestError('Request body is not valid JSON') : null;
};

export const errorHandler: ErrorRequestHandler = (error: unknown, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const requestId = requestIdOf(req);

  const httpError = toHttpError(error);
  if (httpError) {
    res.status(httpError.status).json({
      error: {
        code: httpError.code,
        message: httpError.message,
        details: httpError.details,
        requestId,
      },
    });
    return;
  }

  logger.error({ err: error, requestId }, 'unhandled error');
  res.status(500).json({
    error: {
      code: 'INTERNAL_SERVER_ERROR',
      message: 'Something went wrong. Try again later.',
      requestId,
    },
  });
};
