/**
 * Production Safety Middleware
 * Rate limiting, timeouts, request logging
 */

import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../../observability/logger';

/**
 * Rate limiter for lookup requests
 * - 300 requests per 15 minutes per IP
 * - every uncached lookup costs a registry round trip
 */
export const apiRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  limit: 300,
  standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
  legacyHeaders: false, // Disable the `X-RateLimit-*` headers
  message: {
    error: 'rate_limit_exceeded',
    reason: 'Too many requests from this IP. Please try again later.',
    details: {
      limit: 300,
      window_minutes: 15
    }
  }
});

/**
 * Request timeout middleware
 * - answers 504 if the handler hasn't responded in time
 */
export function requestTimeout(timeoutMs: number = 30000) {
  return (_req: Request, res: Response, next: NextFunction) => {
    const timeout = setTimeout(() => {
      if (!res.headersSent) {
        res.status(504).json({
          error: 'request_timeout',
          reason: `Request exceeded ${timeoutMs}ms timeout`,
          details: { timeout_ms: timeoutMs }
        });
      }
    }, timeoutMs);

    // Clear timeout when response finishes
    res.on('finish', () => {
      clearTimeout(timeout);
    });
    res.on('close', () => {
      clearTimeout(timeout);
    });

    next();
  };
}

/**
 * Request logger
 * - one line per completed request with timing
 * - X-Request-ID on every response
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const requestId = uuidv4();

  res.setHeader('X-Request-ID', requestId);

  res.on('finish', () => {
    logger.info('http_request', {
      request_id: requestId,
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      client_ip: req.ip || req.socket.remoteAddress,
      duration_ms: Date.now() - start
    });
  });

  next();
}
