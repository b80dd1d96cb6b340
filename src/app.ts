import Fastify, { type FastifyError } from 'fastify';
import type { Logger } from 'pino';
import type { AppConfig } from './config';
import { Database } from './store/db';
import { MetricsStore } from './store/metrics';
import { LockManager } from './store/locks';
import { IdempotencyStore } from './store/idempotency';
import { createAvailabilityManager } from './services/availability';
import type { TransitionResult } from './services/availability';
import { createBookingService } from './services/bookings';
import { createInventoryService } from './services/inventory';
import { bookingRoutes } from './routes/bookings';
import { availabilityRoutes } from './routes/availability';
import { slotRoutes } from './routes/slots';
import { metricsRoutes } from './routes/metrics';
import type { Booking } from './domain/types';
import type { Seed } from './schemas';

interface AppDeps {
  config: AppConfig;
  logger: Logger;
  seed?: Seed;
}

export function buildApp(deps: AppDeps) {
  const { config, logger, seed } = deps;

  const app = Fastify({ loggerInstance: logger });

  const metrics = new MetricsStore();
  const db = new Database({ locks: new LockManager(metrics), seed });

  const availabilityManager = createAvailabilityManager({ db, metrics, logger });
  const bookingService = createBookingService({
    db,
    idempotencyStore: new IdempotencyStore<Booking>(config.idempotencyTtlSeconds),
    metrics,
    logger,
    config,
  });
  const inventoryService = createInventoryService({ db, logger, config });
  const transitionReplays = new IdempotencyStore<TransitionResult>(config.idempotencyTtlSeconds);

  app.setErrorHandler<FastifyError>((error, req, reply) => {
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: 'invalid_input', detail: error.message });
    }

    req.log.error({ err: error }, 'request failed');
    return reply.status(500).send({
      error: 'internal_error',
      detail: 'An unexpected error occurred',
    });
  });

  app.get('/health', async () => {
    return { status: 'ok', bookings: db.getAllBookings().length, slots: db.getAllSlots().length };
  });

  const defaultResourceId = config.defaultResourceId;

  app.register(bookingRoutes, { bookingService, availabilityManager, transitionReplays, defaultResourceId });
  app.register(availabilityRoutes, { availabilityManager, inventoryService, defaultResourceId });
  app.register(slotRoutes, { inventoryService, defaultResourceId });
  app.register(metricsRoutes, { metrics, db });

  return app;
}
