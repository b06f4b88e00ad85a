import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  CreateAuthorizedPickupSchema,
  UpdateAuthorizedPickupSchema,
  type CreateAuthorizedPickupInput,
  type UpdateAuthorizedPickupInput,
} from '@roomsafe/shared';
import { sendRouteError, sendValidationError } from '../utils/http.js';

const ChildParamsSchema = z.object({ childId: z.string() });
const AuthorizationParamsSchema = z.object({ id: z.string() });
const ListQuerySchema = z.object({
  includeInactive: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

/**
 * Standing pickup authorizations for a child. Entries are deactivated, never deleted.
 */
export async function authorizedPickupRoutes(fastify: FastifyInstance): Promise<void> {
  const { pickups } = fastify.services;

  fastify.get<{ Params: z.infer<typeof ChildParamsSchema> }>(
    '/v1/people/:childId/authorized-pickups',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let query: z.infer<typeof ListQuerySchema>;
      try {
        query = ListQuerySchema.parse(request.query);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        const authorizedPickups = await pickups.listAuthorizedPickups(request.params.childId, query);
        return reply.send({ authorizedPickups });
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to list authorized pickups');
      }
    }
  );

  fastify.post<{ Params: z.infer<typeof ChildParamsSchema> }>(
    '/v1/people/:childId/authorized-pickups',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let body: CreateAuthorizedPickupInput;
      try {
        body = CreateAuthorizedPickupSchema.parse(request.body);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        const created = await pickups.addAuthorizedPickup(request.params.childId, body);
        return reply.status(201).send(created);
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to add authorized pickup');
      }
    }
  );

  /**
   * POST /v1/people/:childId/authorized-pickups/auto-populate
   *
   * Adds ALWAYS/PARENT entries for adult family members. Idempotent.
   */
  fastify.post<{ Params: z.infer<typeof ChildParamsSchema> }>(
    '/v1/people/:childId/authorized-pickups/auto-populate',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      try {
        return reply.send(await pickups.autoPopulateStandingAuthorizations(request.params.childId));
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to auto-populate authorized pickups');
      }
    }
  );

  fastify.patch<{ Params: z.infer<typeof AuthorizationParamsSchema> }>(
    '/v1/authorized-pickups/:id',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      let body: UpdateAuthorizedPickupInput;
      try {
        body = UpdateAuthorizedPickupSchema.parse(request.body);
      } catch (error) {
        return sendValidationError(reply, error);
      }

      try {
        return reply.send(await pickups.updateAuthorizedPickup(request.params.id, body));
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to update authorized pickup');
      }
    }
  );

  /**
   * DELETE /v1/authorized-pickups/:id
   *
   * Soft delete: the entry stays on file as inactive.
   */
  fastify.delete<{ Params: z.infer<typeof AuthorizationParamsSchema> }>(
    '/v1/authorized-pickups/:id',
    { preHandler: [fastify.kioskGuard] },
    async (request, reply) => {
      try {
        return reply.send(await pickups.deactivateAuthorizedPickup(request.params.id));
      } catch (error) {
        return sendRouteError(request, reply, error, 'Failed to deactivate authorized pickup');
      }
    }
  );
}
