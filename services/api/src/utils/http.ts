import type { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { HttpError } from '../errors/HttpError.js';
import { LockTimeoutError } from '../errors/domain.js';

export function sendValidationError(reply: FastifyReply, error: unknown): FastifyReply {
  return reply.status(400).send({
    error: 'Validation failed',
    details: error instanceof z.ZodError ? error.errors : 'Invalid input',
  });
}

/**
 * Maps domain faults to their status; anything else is logged and becomes a 500.
 */
export function sendRouteError(
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  context: string
): FastifyReply {
  if (error instanceof HttpError) {
    if (error.statusCode >= 500) {
      request.log.error(error, context);
    }
    const response = error instanceof LockTimeoutError ? reply.header('Retry-After', '1') : reply;
    return response.status(error.statusCode).send({ error: error.message, code: error.code });
  }

  request.log.error(error, context);
  return reply.status(500).send({ error: 'Internal server error' });
}

/**
 * Aborts when the client disconnects before the response is written.
 */
export function clientDisconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

/**
 * Socket peer address. Forwarding headers are not trusted for rate limiting.
 */
export function originOf(request: FastifyRequest): string {
  return request.socket.remoteAddress ?? 'unknown';
}
