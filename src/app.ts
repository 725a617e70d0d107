import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import cookieParser from 'cookie-parser';

import type { AuthService } from './auth/authService';
import type { RateLimiter } from './auth/rateLimiter';
import { errorHandler } from './middleware/error';
import { notFound } from './middleware/notFound';
import { createRequestLogger, type Logger } from './middleware/requestLogger';
import healthRoutes from './routes/health';
import { createAuthRouter } from './routes/auth';

export interface AppDeps {
  auth: AuthService;
  limiter: RateLimiter;
  logger: Logger;
  refreshCookieName: string;
  refreshCookieMaxAgeMs: number;
  secureCookies: boolean;
  /** Express "trust proxy" so req.ip is the client behind a load balancer. */
  trustProxy?: boolean;
  requestLogging?: boolean;
}

/** Build the plain Express application (no http.Server). */
export function buildExpressApp(deps: AppDeps) {
  const app = express();

  if (deps.trustProxy) app.set('trust proxy', 1);
  if (deps.requestLogging ?? true) app.use(createRequestLogger(deps.logger));

  app.use(helmet());
  app.use(cookieParser());
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '16kb' }));

  app.use('/api', healthRoutes);
  app.use(
    '/api/auth',
    createAuthRouter({
      auth: deps.auth,
      limiter: deps.limiter,
      refreshCookieName: deps.refreshCookieName,
      refreshCookieMaxAgeMs: deps.refreshCookieMaxAgeMs,
      secureCookies: deps.secureCookies,
    })
  );

  app.use(notFound);
  app.use(errorHandler(deps.logger));

  return app;
}
