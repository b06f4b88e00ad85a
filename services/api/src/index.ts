import { pino } from 'pino';
import { buildApp } from './app.js';
import { loadConfig } from './config/index.js';
import { closeDatabase, getPool, initializeDatabase } from './db/index.js';
import { loadEnvFromDotEnvIfPresent } from './env/loadEnv.js';
import { createPgBackends, createServices } from './services.js';
import { createSystemClock } from './time/clock.js';

async function main() {
  loadEnvFromDotEnvIfPresent();
  const config = loadConfig();

  const logger = pino({
    level: config.logLevel,
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
      },
    },
  });

  if (!config.kioskToken) {
    logger.warn('KIOSK_TOKEN is not set; all /v1 routes will refuse requests');
  }

  try {
    await initializeDatabase(logger);
  } catch (err) {
    logger.error(err, 'Failed to initialize database');
    process.exit(1);
  }

  const pool = getPool();
  const settings = {
    capacity: config.capacity,
    securityCodes: config.securityCodes,
    pickupRateLimit: config.pickupRateLimit,
  };
  const services = createServices(
    createPgBackends(pool, settings, logger),
    settings,
    createSystemClock(config.timeZone),
    logger
  );

  const fastify = await buildApp({
    services,
    kioskToken: config.kioskToken,
    logger,
    checkHealth: async () => {
      try {
        await pool.query('SELECT 1');
        return true;
      } catch (error) {
        logger.error(error, 'Health check query failed');
        return false;
      }
    },
  });

  // Failed-attempt windows expire on access; this only bounds memory.
  const pruneInterval = setInterval(() => {
    const removed = services.pickupAttempts.prune();
    if (removed > 0) {
      fastify.log.debug({ removed }, 'Pruned expired pickup attempt windows');
    }
  }, config.pickupRateLimit.pruneIntervalMs);
  pruneInterval.unref();

  const shutdown = async () => {
    fastify.log.info('Shutting down...');
    clearInterval(pruneInterval);
    await fastify.close();
    await closeDatabase();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      fastify.log.error(err, 'Shutdown failed');
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Server listening on http://${config.host}:${config.port}`);
    fastify.log.info({ timeZone: config.timeZone, lockMode: config.capacity.lockMode }, 'Check-in engine ready');
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
