import type { ErrorRequestHandler } from 'express';
import {
  ConfigurationError,
  ConflictError,
  InvalidCredentialsError,
  NotFoundError,
  StorageError,
  ValidationError,
} from '../../../application/errors.js';
import type { Logger } from '../../logger.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

interface MappedError {
  status: number;
  body: ErrorResponse;
}

const INTERNAL_ERROR: ErrorResponse = {
  code: 'INTERNAL_ERROR',
  message: 'Internal server error',
};

/**
 * Shape of the errors express.json() raises for a bad request body
 * (http-errors with body-parser's `type`).
 */
interface BodyParserError extends Error {
  status: number;
  expose: true;
  type?: string;
}

function isClientBodyError(err: Error): err is BodyParserError {
  return (
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500 &&
    'expose' in err &&
    err.expose === true &&
    (!('type' in err) || typeof err.type === 'string')
  );
}

const BODY_ERRORS: Partial<Record<string, ErrorResponse>> = {
  'entity.parse.failed': { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
  'entity.too.large': { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' },
  'charset.unsupported': {
    code: 'UNSUPPORTED_MEDIA_TYPE',
    message: 'Unsupported request body charset',
  },
  'encoding.unsupported': {
    code: 'UNSUPPORTED_MEDIA_TYPE',
    message: 'Unsupported request body encoding',
  },
};

function mapBodyError(err: BodyParserError): MappedError {
  const known = err.type === undefined ? undefined : BODY_ERRORS[err.type];
  return {
    status: err.status,
    body: known ?? { code: 'BAD_REQUEST', message: 'Malformed request body' },
  };
}

export function mapError(err: Error): MappedError {
  if (err instanceof ValidationError) {
    return {
      status: 400,
      body: {
        code: 'VALIDATION_ERROR',
        message: err.message,
        details: { issues: err.issues },
      },
    };
  }

  if (isClientBodyError(err)) {
    return mapBodyError(err);
  }

  if (err instanceof InvalidCredentialsError) {
    return {
      status: 401,
      body: { code: 'INVALID_CREDENTIALS', message: err.message },
    };
  }

  if (err instanceof NotFoundError) {
    return {
      status: 404,
      body: { code: 'NOT_FOUND', message: err.message },
    };
  }

  if (err instanceof ConflictError) {
    return {
      status: 409,
      body: { code: 'CONFLICT', message: err.message },
    };
  }

  // StorageError, ConfigurationError and anything unexpected: no detail leaves
  // the process.
  return { status: 500, body: INTERNAL_ERROR };
}

/**
 * Last middleware in the chain. Request bodies are never logged, so
 * plaintext passwords cannot reach the log through here.
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err: Error, req, res, _next) => {
    const { status, body } = mapError(err);

    if (status >= 500) {
      logger.error(err, {
        method: req.method,
        path: req.path,
        kind:
          err instanceof StorageError
            ? 'storage'
            : err instanceof ConfigurationError
              ? 'configuration'
              : 'unexpected',
      });
    } else {
      logger.debug('Request rejected', {
        method: req.method,
        path: req.path,
        status,
        code: body.code,
      });
    }

    res.status(status).json(body);
  };
}
