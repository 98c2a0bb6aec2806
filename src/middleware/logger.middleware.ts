import { Request, Response, NextFunction } from 'express';
import { Logger } from '../utils/logger';

const REDACTED_FIELDS = new Set([
  'password',
  'current_password',
  'new_password',
  'refresh_token',
  'access_token',
]);

/**
 * Copy of a request/response body safe to log: secrets and tokens are masked
 */
export function redactBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(redactBody);
  }
  if (body && typeof body === 'object') {
    const copy: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(body)) {
      copy[key] = REDACTED_FIELDS.has(key) ? '[REDACTED]' : redactBody(value);
    }
    return copy;
  }
  return body;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();
  const { method, originalUrl } = req;
  const ip = req.ip || req.socket.remoteAddress;

  const requestData: Record<string, unknown> = {};
  if (Object.keys(req.query).length > 0) {
    requestData.query = req.query;
  }
  if (req.body && typeof req.body === 'object' && Object.keys(req.body).length > 0) {
    const redacted = redactBody(req.body);
    requestData.body = JSON.stringify(redacted).length > 1000 ? '[Body too large to log]' : redacted;
  }

  Logger.info('📥 Incoming Request', { method, url: originalUrl, ip, ...requestData });

  res.on('finish', () => {
    const { statusCode } = res;
    const responseData = {
      method,
      url: originalUrl,
      statusCode,
      duration: `${Date.now() - startTime}ms`,
      ip,
    };

    if (statusCode >= 500) {
      Logger.error(`❌ ${statusCode} Server Error`, undefined, responseData);
    } else if (statusCode >= 400) {
      Logger.warn(`⚠️  ${statusCode} Client Error`, responseData);
    } else {
      Logger.info(`✅ ${statusCode} Success`, responseData);
    }
  });

  next();
}

export function errorLogger(error: Error, req: Request, res: Response, next: NextFunction): void {
  Logger.error('💥 Unhandled Error in Request', error, {
    method: req.method,
    url: req.originalUrl,
    ip: req.ip || req.socket.remoteAddress,
    body: req.body && typeof req.body === 'object' ? redactBody(req.body) : undefined,
  });

  next(error);
}
