import type { ErrorRequestHandler } from 'express';
import { createLogger, isTokenRelayError } from '@token-relay/core';
import { generateErrorCode } from '../utils/error-code.js';

const logger = createLogger('http');

function clientErrorStatus(err: unknown): number | undefined {
  // body-parser and friends attach a 4xx `status`
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 500 ? err.status : undefined;
  }
  return undefined;
}

export function createErrorHandler(options: { isProduction: boolean }): ErrorRequestHandler {
  return (err: unknown, req, res, _next) => {
    const timestamp = new Date().toISOString();

    if (isTokenRelayError(err)) {
      const log = err.statusCode >= 500 ? logger.error : logger.warn;
      log('Request failed', { code: err.code, statusCode: err.statusCode, path: req.path, method: req.method });
      res.status(err.statusCode).json({
        success: false,
        error: err.message,
        errorCode: err.code,
        context: err.context,
        timestamp,
      });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== undefined) {
      res.status(clientStatus).json({
        success: false,
        error: err instanceof Error ? err.message : 'Bad request',
        errorCode: 'BAD_REQUEST',
        timestamp,
      });
      return;
    }

    const errorCode = generateErrorCode();
    logger.error('Request error', {
      errorCode,
      error: err instanceof Error ? err.message : String(err),
      path: req.path,
      method: req.method,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    });

    res.status(500).json({
      success: false,
      error: !options.isProduction && err instanceof Error ? err.message : 'Internal server error',
      errorCode,
      timestamp,
    });
  };
}
