import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  LocationCapacityQuerySchema,
  MultiLocationCapacityRequestSchema,
  UpdateCapacitySettingsSchema,
  type MultiLocationCapacityRequest,
  type UpdateCapacitySettingsInput,
} from '@roomsafe/shared';
import { sendRouteError, sendValidationError } from '../utils/http.js';

const LocationParamsSchema = z.object({ locationId: z.string() });

type LocationCapacityQuery = z.infer<typeof LocationCapacityQuerySchema>;

/**
 * Location capacity, overflow and staff-ratio routes.
 */
export async function capacityRoutes(fastify: FastifyInstance): Promise<void> {
  const { capacity } = fastify.services;

  /**
   * GET /v1/locations/:locationId/capacity?date=YYYY-MM-DD
   */
  fastify.get<{ Params: z.infer<typeof LocationParamsSchema> }>(
    '/v1/locations/:locationId/capacity',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let query: LocationCapacityQuery;
      try {
        query = LocationCapacityQuerySchema.parse(request.query);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        return reply.send(await capacity.getLocationCapacity(request.params.locationId, query.date));
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to load location capacity');
      }
    }
  );

  /**
   * POST /v1/locations/capacity
   *
   * Capacity for several locations at once. Unknown ids are left out.
   */
  fastify.post('/v1/locations/capacity', { preHandler: [fastify.kioskGuard] }, async (request, reply) => {
    let body: MultiLocationCapacityRequest;
    try {
      body = MultiLocationCapacityRequestSchema.parse(request.body);
    } catch (error) {
      return sendValidationError(reply, error);
    }

    try {
      const capacities = await capacity.getMultipleLocationCapacities(body.locationIds, body.date);
      return reply.send({ capacities });
    } catch (error) {
      return sendRouteError(request, reply, error, 'Failed to load location capacities');
    }
  });

  /**
   * GET /v1/locations/:locationId/overflow?date=YYYY-MM-DD
   */
  fastify.get<{ Params: z.infer<typeof LocationParamsSchema> }>(
    '/v1/locations/:locationId/overflow',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let query: LocationCapacityQuery;
      try {
        query = LocationCapacityQuerySchema.parse(request.query);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        const overflow = await capacity.getOverflowLocationCapacity(request.params.locationId, query.date);
        return reply.send({ overflow });
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to load overflow location');
      }
    }
  );

  /**
   * GET /v1/locations/:locationId/staff-ratio?date=YYYY-MM-DD
   */
  fastify.get<{ Params: z.infer<typeof LocationParamsSchema> }>(
    '/v1/locations/:locationId/staff-ratio',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let query: LocationCapacityQuery;
      try {
        query = LocationCapacityQuerySchema.parse(request.query);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        const meetsStaffRatio = await capacity.validateStaffRatio(request.params.locationId, query.date);
        return reply.send({ meetsStaffRatio });
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to check staff ratio');
      }
    }
  );

  /**
   * PUT /v1/locations/:locationId/capacity-settings
   */
  fastify.put<{ Params: z.infer<typeof LocationParamsSchema> }>(
    '/v1/locations/:locationId/capacity-settings',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let body: UpdateCapacitySettingsInput;
      try {
        body = UpdateCapacitySettingsSchema.parse(request.body);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        return reply.send(await capacity.updateCapacitySettings(request.params.locationId, body));
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to update capacity settings');
      }
    }
  );
}
