import { Request, Response, NextFunction } from 'express';

export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Malformed or out-of-range input; `details` holds per-field messages. */
export class ValidationError extends HttpError {
  constructor(
    message: string,
    public readonly details?: unknown
  ) {
    super(400, message);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends HttpError {
  constructor(message = 'Could not validate credentials') {
    super(401, message);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends HttpError {
  constructor(message = 'Forbidden') {
    super(403, message);
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends HttpError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ConflictError';
  }
}

// Errors raised by express.json() carry a `type` such as 'entity.parse.failed'.
function bodyParserStatus(err: unknown): number | undefined {
  if (!(err instanceof Error) || !('type' in err) || !('status' in err)) return undefined;
  if (typeof err.type !== 'string' || typeof err.status !== 'number') return undefined;
  return err.status < 500 ? err.status : undefined;
}

/**
 * Central error handler — catches anything thrown/passed via next(err).
 */
export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const parserStatus = bodyParserStatus(err);
  if (parserStatus !== undefined) {
    const message = err instanceof SyntaxError ? 'Malformed JSON body' : 'Unreadable request body';
    res.status(parserStatus).json({ error: message });
    return;
  }

  if (!(err instanceof HttpError)) {
    console.error('[error]', err);
    res.status(500).json({ error: 'Internal server error' });
    return;
  }

  if (err instanceof ValidationError && err.details !== undefined) {
    res.status(err.statusCode).json({ error: err.message, details: err.details });
    return;
  }

  res.status(err.statusCode).json({ error: err.message });
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError('Route not found'));
}
