import helmet from 'helmet';
import compression = require('compression');
import * as express from 'express';
import { randomUUID } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { Logger } from '@nestjs/common';
import { ApiExceptionFilter } from '../filters/api-exception.filter';
import { AppConfigService } from '../../modules/app/app-config.service';
import { UploadsService } from '../../modules/uploads/uploads.service';

export const UPLOADS_PREFIX = '/uploads/';

/**
 * HTTP middleware, CORS, static uploads and the global error filter.
 * Shared by `main.ts` and the e2e tests so both run the same stack.
 */
export function configureApp(app: NestExpressApplication) {
  const logger = new Logger('HTTP');
  const appConfig = app.get(AppConfigService);
  const uploads = app.get(UploadsService);

  // API responses should not be conditional-cached via ETag/If-None-Match.
  const http: express.Express = app.getHttpAdapter().getInstance();
  http.disable('etag');

  if (appConfig.trustProxy()) {
    // Required for correct req.ip / req.protocol behind reverse proxies.
    // IMPORTANT: only enable when you actually have a trusted proxy in front.
    app.set('trust proxy', 1);
  }

  // Security headers (API-safe defaults).
  app.use(
    helmet({
      // Images under /uploads are embedded by other origins.
      crossOriginResourcePolicy: false,
      contentSecurityPolicy: false,
    }),
  );

  app.use(compression());

  // Body limits (protect memory). Multipart uploads are parsed by multer, not here.
  app.use(express.json({ limit: appConfig.bodyJsonLimit() }));
  app.use(express.urlencoded({ extended: true, limit: appConfig.bodyUrlEncodedLimit() }));

  // Request id (for tracing + debugging). Returned as `x-request-id`.
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = String(req.headers['x-request-id'] ?? '').trim();
    const id = incoming || randomUUID();
    res.setHeader('x-request-id', id);
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

  app.useStaticAssets(uploads.dir(), { prefix: UPLOADS_PREFIX });

  app.enableCors({
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow non-browser clients (no Origin header)
      if (!origin) return callback(null, true);
      if (appConfig.isOriginAllowed(origin)) return callback(null, true);
      // Avoid surfacing this as a 500; simply do not set CORS headers.
      appConfig.logCorsBlocked(origin);
      return callback(null, false);
    },
  });

  app.useGlobalFilters(new ApiExceptionFilter());
}
