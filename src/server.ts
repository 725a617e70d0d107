import http from 'http';
import { loadEnv, durationMs } from './config/env';
import { connectDB, disconnectDB } from './config/db';
import { buildExpressApp } from './app';
import { createAuthCore } from './auth';
import { MongoCredentialStore } from './auth/credentialStore';
import { LogMailer } from './mailer/logMailer';
import { ResendMailer, type Mailer } from './mailer/resend';
import { createLogger } from './middleware/requestLogger';
import { closeRedis, getRedis } from './redis/client';
import { RedisKeyValueStore } from './redis/kvStore';

/**
 * Local / VPS entrypoint.
 * Creates the HTTP server and handles graceful shutdown.
 */
async function bootstrap() {
  const env = loadEnv();
  const logger = createLogger(env.LOG_LEVEL);

  await connectDB(env.MONGO_URI, env.DB_NAME);
  logger.info('🟢 Mongo connected');

  const kv = new RedisKeyValueStore(getRedis(env.REDIS_URL, logger));
  const mailer: Mailer = env.RESEND_API_KEY
    ? new ResendMailer(env.RESEND_API_KEY, env.MAIL_FROM)
    : new LogMailer(logger);

  const { auth, limiter } = createAuthCore(env, {
    store: new MongoCredentialStore(),
    counters: kv,
    cache: kv,
    mailer,
    logger,
  });

  const app = buildExpressApp({
    auth,
    limiter,
    logger,
    refreshCookieName: env.REFRESH_COOKIE_NAME,
    refreshCookieMaxAgeMs: durationMs(env.JWT_REFRESH_EXPIRES),
    secureCookies: env.NODE_ENV === 'production',
    trustProxy: env.NODE_ENV === 'production',
  });
  const server = http.createServer(app);

  server.listen(env.PORT, () => {
    logger.info(`✅ HTTP server running at http://localhost:${env.PORT}`);
  });

  const closeStores = async () => {
    await closeRedis(logger);
    await disconnectDB();
  };

  const shutdown = (signal: string) => {
    logger.info(`${signal} received: closing server, Redis and DB...`);
    server.close(() => {
      closeStores()
        .then(() => {
          logger.info('Clean shutdown complete. 👋');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.warn('Forcing shutdown...');
      process.exit(1);
    }, 10_000).unref();
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((err) => {
  console.error('Fatal startup error:', err);
  process.exit(1);
});
