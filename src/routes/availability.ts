import type { FastifyInstance } from 'fastify';
import { rangeQuery, searchBody, slotQuery, timesQuery } from '../schemas';
import type { AvailabilityManager } from '../services/availability';
import type { InventoryService } from '../services/inventory';
import type { ResourceId } from '../domain/types';
import { invalidInput } from './replies';

interface AvailabilityRoutesOpts {
  availabilityManager: AvailabilityManager;
  inventoryService: InventoryService;
  defaultResourceId: ResourceId;
}

export async function availabilityRoutes(app: FastifyInstance, opts: AvailabilityRoutesOpts) {
  const { availabilityManager, inventoryService, defaultResourceId } = opts;

  app.get('/availability', async (req, reply) => {
    const parsed = slotQuery.safeParse(req.query);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const { resourceId = defaultResourceId, date, time, players } = parsed.data;
    const check = availabilityManager.checkSlot(resourceId, date, time, players);
    return reply.status(200).send({ resourceId, date, time, ...check });
  });

  app.get('/availability/times', async (req, reply) => {
    const parsed = timesQuery.safeParse(req.query);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const { resourceId = defaultResourceId, date, players } = parsed.data;
    const items = availabilityManager.listAvailableTimes(resourceId, date, players);
    return reply.status(200).send({ resourceId, date, items });
  });

  app.get('/availability/report', async (req, reply) => {
    const parsed = rangeQuery.safeParse(req.query);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const { resourceId = defaultResourceId, from, to } = parsed.data;
    if (to < from) {
      return reply.status(400).send({ error: 'invalid_input', detail: 'to: must not precede from' });
    }
    const days = availabilityManager.getAvailabilityReport(resourceId, { from, to });
    return reply.status(200).send({ resourceId, from, to, days });
  });

  app.post('/availability/search', async (req, reply) => {
    const parsed = searchBody.safeParse(req.body);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const { resourceId = defaultResourceId, dates, players } = parsed.data;
    const items = inventoryService.searchAvailability(resourceId, dates, players);
    return reply.status(200).send({ resourceId, players, items, count: items.length });
  });
}
