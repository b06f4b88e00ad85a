import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  AttendanceHistoryQuerySchema,
  BatchCheckinRequestSchema,
  CheckinRequestSchema,
  ValidateCheckinRequestSchema,
  type BatchCheckinRequestInput,
  type CheckinRequestInput,
  type ValidateCheckinRequestInput,
} from '@roomsafe/shared';
import { clientDisconnectSignal, sendRouteError, sendValidationError } from '../utils/http.js';

const LocationParamsSchema = z.object({ locationId: z.string() });
const PersonParamsSchema = z.object({ personId: z.string() });
const AttendanceParamsSchema = z.object({ attendanceId: z.string() });

/**
 * Check-in / check-out routes.
 *
 * Business refusals (at capacity, already checked in, ...) are 200 responses
 * with `success: false`; only contract and infrastructure faults are errors.
 */
export async function checkinRoutes(fastify: FastifyInstance): Promise<void> {
  const { checkin } = fastify.services;

  /**
   * POST /v1/checkin
   */
  fastify.post('/v1/checkin', { preHandler: [fastify.kioskGuard] }, async (request, reply) => {
    let body: CheckinRequestInput;
    try {
      body = CheckinRequestSchema.parse(request.body);
    } catch (error) {
      return sendValidationError(reply, error);
    }

    try {
      const result = await checkin.checkIn(body, { signal: clientDisconnectSignal(reply) });
      return reply.send(result);
    } catch (error) {
      return sendRouteError(request, reply, error, 'Failed to check in');
    }
  });

  /**
   * POST /v1/checkin/batch
   *
   * Each item succeeds or fails on its own.
   */
  fastify.post('/v1/checkin/batch', { preHandler: [fastify.kioskGuard] }, async (request, reply) => {
    let body: BatchCheckinRequestInput;
    try {
      body = BatchCheckinRequestSchema.parse(request.body);
    } catch (error) {
      return sendValidationError(reply, error);
    }

    try {
      const result = await checkin.batchCheckIn(body.items, {
        signal: clientDisconnectSignal(reply),
      });
      return reply.send(result);
    } catch (error) {
      return sendRouteError(request, reply, error, 'Failed to process batch check-in');
    }
  });

  /**
   * POST /v1/checkin/validate
   *
   * Advisory pre-check; takes no lock and writes nothing.
   */
  fastify.post('/v1/checkin/validate', { preHandler: [fastify.kioskGuard] }, async (request, reply) => {
    let body: ValidateCheckinRequestInput;
    try {
      body = ValidateCheckinRequestSchema.parse(request.body);
    } catch (error) {
      return sendValidationError(reply, error);
    }

    try {
      return reply.send(await checkin.validateCheckIn(body));
    } catch (error) {
      return sendRouteError(request, reply, error, 'Failed to validate check-in');
    }
  });

  /**
   * POST /v1/attendance/:attendanceId/checkout
   */
  fastify.post<{ Params: z.infer<typeof AttendanceParamsSchema> }>(
    '/v1/attendance/:attendanceId/checkout',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      try {
        const checkedOut = await checkin.checkOut(request.params.attendanceId);
        return reply.send({ checkedOut });
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to check out');
      }
    }
  );

  /**
   * GET /v1/locations/:locationId/occupants
   */
  fastify.get<{ Params: z.infer<typeof LocationParamsSchema> }>(
    '/v1/locations/:locationId/occupants',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      try {
        const occupants = await checkin.getCurrentOccupants(request.params.locationId);
        return reply.send({ occupants });
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to list occupants');
      }
    }
  );

  /**
   * GET /v1/people/:personId/attendance?days=30
   */
  fastify.get<{ Params: z.infer<typeof PersonParamsSchema> }>(
    '/v1/people/:personId/attendance',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let query: z.infer<typeof AttendanceHistoryQuerySchema>;
      try {
        query = AttendanceHistoryQuerySchema.parse(request.query);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        const attendance = await checkin.getPersonHistory(request.params.personId, query.days);
        return reply.send({ attendance });
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to load attendance history');
      }
    }
  );
}
