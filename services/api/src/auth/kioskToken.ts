import type { FastifyReply, FastifyRequest } from 'fastify';
import crypto from 'node:crypto';

export function timingSafeEquals(a: string, b: string): boolean {
  const aa = Buffer.from(a);
  const bb = Buffer.from(b);
  if (aa.length !== bb.length) return false;
  return crypto.timingSafeEqual(aa, bb);
}

/**
 * Builds a preHandler that requires an `x-kiosk-token` header matching the
 * configured token. With no token configured every request is refused, so a
 * missing setting never opens the API.
 */
export function requireKioskToken(expected: string | null) {
  return async function kioskTokenGuard(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply | undefined> {
    if (!expected) {
      request.log.error('KIOSK_TOKEN is not configured; refusing request');
      return reply.status(500).send({
        error: 'Server misconfigured',
        message: 'Kiosk token not configured',
      });
    }

    const header = request.headers['x-kiosk-token'];
    const provided = typeof header === 'string' ? header : undefined;
    if (!provided || !timingSafeEquals(provided, expected)) {
      return reply.status(401).send({
        error: 'Unauthorized',
        message: 'Valid kiosk token required',
      });
    }
    return undefined;
  };
}
