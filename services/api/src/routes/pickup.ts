import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  PickupHistoryQuerySchema,
  RecordPickupRequestSchema,
  VerifyPickupRequestSchema,
  type PickupHistoryQuery,
  type RecordPickupRequestInput,
  type VerifyPickupRequestInput,
} from '@roomsafe/shared';
import {
  clientDisconnectSignal,
  originOf,
  sendRouteError,
  sendValidationError,
} from '../utils/http.js';

const ChildParamsSchema = z.object({ childId: z.string() });

const ResetAttemptsSchema = z.object({
  attendanceId: z.string().min(1),
  originId: z.string().min(1),
});

/**
 * Pickup verification and release routes.
 */
export async function pickupRoutes(fastify: FastifyInstance): Promise<void> {
  const { pickups, pickupVerification, pickupAttempts } = fastify.services;

  /**
   * POST /v1/pickup/verify
   *
   * Rate limited per (attendance, client address). A limited caller gets 429
   * with Retry-After and verification does not run.
   */
  fastify.post('/v1/pickup/verify', { preHandler: [fastify.kioskGuard] }, async (request, reply) => {
    let body: VerifyPickupRequestInput;
    try {
      body = VerifyPickupRequestSchema.parse(request.body);
    } catch (error) {
      return sendValidationError(reply, error);
    }

    const origin = originOf(request);
    try {
      const gated = await pickupVerification.verify(body, origin, {
        signal: clientDisconnectSignal(reply),
      });

      if (gated.kind === 'RATE_LIMITED') {
        const retryAfterSeconds = Math.max(1, Math.ceil(gated.retryAfterMs / 1000));
        const minutes = Math.ceil(retryAfterSeconds / 60);
        request.log.warn(
          { attendanceId: body.attendanceId, origin, retryAfterSeconds },
          'Pickup verification rate limited'
        );
        return reply
          .status(429)
          .header('Retry-After', String(retryAfterSeconds))
          .send({
            error: 'Too Many Requests',
            message: `Too many failed pickup verification attempts. Try again in ${minutes} minute(s).`,
            retryAfterSeconds,
          });
      }

      return reply.send(gated.result);
    } catch (error) {
      return sendRouteError(request, reply, error, 'Failed to verify pickup');
    }
  });

  /**
   * POST /v1/pickup/record
   *
   * Durable release. Closes the attendance and appends the pickup log.
   */
  fastify.post('/v1/pickup/record', { preHandler: [fastify.kioskGuard] }, async (request, reply) => {
    let body: RecordPickupRequestInput;
    try {
      body = RecordPickupRequestSchema.parse(request.body);
    } catch (error) {
      return sendValidationError(reply, error);
    }

    try {
      const entry = await pickups.recordPickup(body);
      return reply.status(201).send(entry);
    } catch (error) {
      return sendRouteError(request, reply, error, 'Failed to record pickup');
    }
  });

  /**
   * POST /v1/pickup/attempts/reset
   *
   * Staff override that clears the failed-attempt counter for a pair.
   */
  fastify.post('/v1/pickup/attempts/reset', { preHandler: [fastify.kioskGuard] }, async (request, reply) => {
    let body: z.infer<typeof ResetAttemptsSchema>;
    try {
      body = ResetAttemptsSchema.parse(request.body);
    } catch (error) {
      return sendValidationError(reply, error);
    }

    pickupAttempts.resetAttempts(body.attendanceId, body.originId);
    request.log.info(body, 'Pickup verification attempts reset');
    return reply.send({ reset: true });
  });

  /**
   * GET /v1/people/:childId/pickup-history?from=YYYY-MM-DD&to=YYYY-MM-DD
   */
  fastify.get<{ Params: z.infer<typeof ChildParamsSchema> }>(
    '/v1/people/:childId/pickup-history',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let query: PickupHistoryQuery;
      try {
        query = PickupHistoryQuerySchema.parse(request.query);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        const history = await pickups.getPickupHistory(request.params.childId, query);
        return reply.send({ history });
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to load pickup history');
      }
    }
  );
}
