import type { FastifyInstance } from 'fastify';
import type { MetricsStore } from '../store/metrics';
import type { Database } from '../store/db';

interface MetricsRoutesOpts {
  metrics: MetricsStore;
  db: Database;
}

export async function metricsRoutes(app: FastifyInstance, opts: MetricsRoutesOpts) {
  const { metrics, db } = opts;

  app.get('/metrics', async () => {
    return {
      ...metrics.getSnapshot(),
      store: {
        slots: db.getAllSlots().length,
        bookings: db.getAllBookings().length,
      },
    };
  });
}
