import helmet from 'helmet';
import cookieParser = require('cookie-parser');
import compression = require('compression');
import * as express from 'express';
import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { ApiResponseInterceptor } from './common/interceptors/api-response.interceptor';
import { ApiExceptionFilter, type RequestWithId } from './common/filters/api-exception.filter';
import { AppConfigService } from './modules/app/app-config.service';

function isUnsafeMethod(method: string | undefined) {
  const m = (method ?? '').toUpperCase();
  return m === 'POST' || m === 'PUT' || m === 'PATCH' || m === 'DELETE';
}

function csrfBlocked(res: Response, requestId: string | undefined, reason: string) {
  return res.status(403).json({
    meta: {
      status: 403,
      ...(requestId ? { requestId } : {}),
      errors: [{ code: 403, message: 'CSRF blocked', reason }],
    },
  });
}

/** HTTP middleware, filters and interceptors shared by the server and the e2e suite. */
export function configureApp(app: NestExpressApplication, appConfig: AppConfigService) {
  const logger = new Logger('HTTP');

  // Listings depend on the viewer and the clock; conditional caching would serve stale visibility.
  app.getHttpAdapter().getInstance().disable('etag');

  if (appConfig.trustProxy()) {
    // Only enable with a trusted proxy in front.
    app.set('trust proxy', 1);
  }

  // Security headers (API-safe defaults).
  app.use(
    helmet({
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );

  app.use(compression());

  // Body limits (protect memory).
  app.use(express.json({ limit: appConfig.bodyJsonLimit() }));

  // Cookies (auth).
  app.use(cookieParser());

  // Request id (for tracing + debugging). Returned as `x-request-id`.
  app.use((req: RequestWithId, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
    req.requestId = id;
    next();
  });

  // Dev-only: lightweight request logging (opt-in via LOG_REQUESTS=true).
  if (!appConfig.isProd() && appConfig.logRequests()) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      const start = Date.now();
      const method = String(req.method || '');
      const path = String(req.originalUrl || req.url || '');
      res.on('finish', () => {
        const ms = Date.now() - start;
        const rid = String(res.getHeader('x-request-id') ?? '');
        logger.log(`${method} ${path} -> ${res.statusCode} (${ms}ms)${rid ? ` rid=${rid}` : ''}`);
      });
      next();
    });
  }

  // CSRF mitigation for cookie-auth:
  // for unsafe methods, if a browser sends an Origin/Referer, it must be allowed.
  app.use((req: RequestWithId, res: Response, next: NextFunction) => {
    if (!isUnsafeMethod(req.method)) return next();

    const origin = String(req.headers.origin ?? '').trim();
    const referer = String(req.headers.referer ?? '').trim();

    // Production requires Origin/Referer; development allows curl/Postman without one.
    if (!origin && !referer) {
      if (appConfig.isProd() && appConfig.requireCsrfOriginInProd()) {
        return csrfBlocked(res, req.requestId, 'csrf_missing_origin');
      }
      return next();
    }

    const host = String(req.headers.host ?? '').trim();
    const selfOrigin = host ? `${req.protocol || 'http'}://${host}` : '';

    const originAllowed =
      (origin && (appConfig.isOriginAllowed(origin) || (selfOrigin && origin === selfOrigin))) ||
      (!origin && referer && (referer.startsWith(selfOrigin) || appConfig.allowedOrigins().some((o) => referer.startsWith(o))));

    if (!originAllowed) return csrfBlocked(res, req.requestId, 'csrf');
    return next();
  });

  app.enableCors({
    credentials: true,
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow non-browser clients (no Origin header)
      if (!origin) return callback(null, true);
      if (appConfig.isOriginAllowed(origin)) return callback(null, true);
      appConfig.logCorsBlocked(origin);
      return callback(null, false);
    },
  });

  app.useGlobalInterceptors(new ApiResponseInterceptor());
  app.useGlobalFilters(new ApiExceptionFilter());
}
