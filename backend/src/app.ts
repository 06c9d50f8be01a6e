import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { registerRoutes } from './api/routes.js';
import { AppError, NotFoundError } from './common/errors.js';
import type { Logger } from './common/logger.js';
import type { Engine } from './engine.js';

export interface AppOptions {
  /** false silences fastify's logger (tests) */
  logLevel?: string | false;
  corsOrigins?: string;
  production?: boolean;
}

export interface BuiltApp {
  app: FastifyInstance;
  engine: Engine;
}

/**
 * Build Fastify Application
 *
 * The engine is created from the app's own logger so that services log
 * through pino alongside request logs.
 */
export function buildApp(makeEngine: (log: Logger) => Engine, opts: AppOptions = {}): BuiltApp {
  const app = Fastify({
    logger: opts.logLevel === false ? false : { level: opts.logLevel ?? 'info' },
    trustProxy: true,
  });

  const origins = opts.corsOrigins ?? '*';
  app.register(cors, {
    origin: origins === '*' ? true : origins.split(',').map((o) => o.trim()),
    credentials: true,
  });

  // Global error handler
  app.setErrorHandler((err, req, reply) => {
    if (err instanceof AppError) {
      if (err.statusCode >= 500) {
        req.log.error({ err }, err.message);
      }
      return reply.status(err.statusCode).send({
        ok: false,
        error: err.code,
        message: err.message,
      });
    }

    // Fastify validation errors
    if (err.validation) {
      return reply.status(400).send({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: err.message,
      });
    }

    // Fastify's own 4xx (malformed JSON, payload too large, ...)
    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      return reply.status(statusCode).send({
        ok: false,
        error: err.code ?? 'BAD_REQUEST',
        message: err.message,
      });
    }

    req.log.error({ err }, 'Unhandled error');
    return reply.status(500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: opts.production ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    const err = new NotFoundError('Route not found');
    reply.status(err.statusCode).send({
      ok: false,
      error: err.code,
      message: err.message,
    });
  });

  const engine = makeEngine(app.log);
  app.register(async (fastify) => {
    await registerRoutes(fastify, engine);
  });

  return { app, engine };
}
