import { FastifyError, FastifyInstance, FastifyReply } from 'fastify';
import pino from 'pino';
import { isAppError } from './app-error';
import { logger } from '../observability/logger';

export interface FallbackResponse {
  error: string;
  message?: string;
}

/**
 * Convert anything a handler caught into a response. Known errors keep their
 * status and public fields; the rest become the route's generic 500.
 */
export function replyWithError(
  reply: FastifyReply,
  err: unknown,
  log: pino.Logger,
  fallback: FallbackResponse,
): FastifyReply {
  if (isAppError(err)) {
    const context = { kind: err.kind, statusCode: err.statusCode, details: err.details, reason: err.message };
    if (err.statusCode >= 500) {
      log.error({ ...context, err: err.cause ?? err }, 'Request failed');
    } else {
      log.warn(context, 'Request rejected');
    }
    return reply.status(err.statusCode).send(err.toResponse());
  }

  log.error({ err }, 'Unexpected error');
  return reply.status(500).send(fallback);
}

/**
 * 404/405 JSON responses and the framework-level error handler.
 * Must be registered before any route so `onRoute` sees them all.
 */
export function registerErrorHandlers(app: FastifyInstance): void {
  const methodsByPath = new Map<string, Set<string>>();

  app.addHook('onRoute', (route) => {
    const methods = Array.isArray(route.method) ? route.method : [route.method];
    const known = methodsByPath.get(route.url) ?? new Set<string>();
    for (const method of methods) known.add(method);
    methodsByPath.set(route.url, known);
  });

  app.setNotFoundHandler((req, reply) => {
    const path = req.url.split('?')[0];
    const allowed = methodsByPath.get(path);
    if (allowed) {
      return reply
        .status(405)
        .header('Allow', [...allowed].join(', '))
        .send({
          error: 'Method not allowed',
          message: 'The HTTP method is not allowed for this endpoint',
        });
    }
    return reply.status(404).send({
      error: 'Endpoint not found',
      message: 'The requested endpoint does not exist',
    });
  });

  app.setErrorHandler((error: FastifyError, req, reply) => {
    const status = error.statusCode ?? 500;

    if (status === 415) {
      return reply.status(400).send({ error: 'Content-Type must be application/json' });
    }
    if (status >= 400 && status < 500) {
      logger.warn({ code: error.code, url: req.url, reason: error.message }, 'Malformed request');
      return reply.status(status).send({ error: 'Bad request', message: error.message });
    }

    logger.error({ err: error, method: req.method, url: req.url }, 'Unhandled error');
    return reply.status(500).send({
      error: 'Internal server error',
      message: 'An unexpected error occurred',
    });
  });
}
