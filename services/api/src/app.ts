import Fastify, { type FastifyBaseLogger, type FastifyInstance, type preHandlerAsyncHookHandler } from 'fastify';
import cors from '@fastify/cors';
import { requireKioskToken } from './auth/kioskToken.js';
import {
  authorizedPickupRoutes,
  capacityRoutes,
  checkinRoutes,
  healthRoutes,
  pickupRoutes,
} from './routes/index.js';
import type { AppServices } from './services.js';

declare module 'fastify' {
  interface FastifyInstance {
    services: AppServices;
    kioskGuard: preHandlerAsyncHookHandler;
    checkHealth: () => Promise<boolean>;
  }
}

export interface BuildAppOptions {
  services: AppServices;
  kioskToken: string | null;
  logger?: FastifyBaseLogger | boolean;
  checkHealth?: () => Promise<boolean>;
}

/**
 * Assembles the HTTP surface. Does not listen; the caller owns the lifecycle.
 */
export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: opts.logger ?? false });

  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  fastify.decorate('services', opts.services);
  fastify.decorate('kioskGuard', requireKioskToken(opts.kioskToken));
  fastify.decorate('checkHealth', opts.checkHealth ?? (async () => true));

  await fastify.register(healthRoutes);
  await fastify.register(checkinRoutes);
  await fastify.register(capacityRoutes);
  await fastify.register(pickupRoutes);
  await fastify.register(authorizedPickupRoutes);

  return fastify;
}

export type { AppServices } from './services.js';
export { createServices, createPgBackends, type ServiceBackends } from './services.js';
