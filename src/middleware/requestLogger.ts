import pino, { type Logger } from 'pino';
import pinoHttp from 'pino-http';
import type { RequestHandler } from 'express';

export type { Logger };

export function createLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return pino({
    level,
    // tokens and passwords never reach the log lines
    redact: ['req.headers.authorization', 'req.headers.cookie', 'password', 'refreshToken', 'accessToken'],
  });
}

export function createRequestLogger(logger: Logger): RequestHandler {
  return pinoHttp({
    logger,
    serializers: { err: pino.stdSerializers.err },
  });
}
