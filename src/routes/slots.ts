import type { FastifyInstance } from 'fastify';
import {
  blockDateBody,
  blockedDateParams,
  bulkSlotsBody,
  rangeQuery,
  resourceQuery,
  slotBody,
  slotParams,
} from '../schemas';
import type { InventoryService } from '../services/inventory';
import type { ResourceId } from '../domain/types';
import { invalidInput, sendFailure } from './replies';

interface SlotRoutesOpts {
  inventoryService: InventoryService;
  defaultResourceId: ResourceId;
}

export async function slotRoutes(app: FastifyInstance, opts: SlotRoutesOpts) {
  const { inventoryService, defaultResourceId } = opts;

  app.get('/slots', async (req, reply) => {
    const parsed = rangeQuery.safeParse(req.query);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const { resourceId = defaultResourceId, from, to } = parsed.data;
    const items = inventoryService.listSlots({ resourceId, from, to });
    return reply.status(200).send({ items, count: items.length });
  });

  app.post('/slots', async (req, reply) => {
    const parsed = slotBody.safeParse(req.body);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const slot = await inventoryService.addSlot({
      ...parsed.data,
      resourceId: parsed.data.resourceId ?? defaultResourceId,
    });
    return reply.status(201).send(slot);
  });

  app.post('/slots/bulk', async (req, reply) => {
    const parsed = bulkSlotsBody.safeParse(req.body);
    if (!parsed.success) return invalidInput(reply, parsed.error);
    if (parsed.data.endDate < parsed.data.startDate) {
      return reply.status(400).send({ error: 'invalid_input', detail: 'endDate: must not precede startDate' });
    }

    const result = await inventoryService.bulkAddSlots({
      ...parsed.data,
      resourceId: parsed.data.resourceId ?? defaultResourceId,
    });
    return reply.status(201).send(result);
  });

  app.delete('/slots/:resourceId/:date/:time', async (req, reply) => {
    const parsed = slotParams.safeParse(req.params);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const result = await inventoryService.removeSlot(parsed.data);
    if (!result.success) return sendFailure(reply, result.errorCode, result.message);
    return reply.status(204).send();
  });

  app.get('/blocked-dates', async (req, reply) => {
    const parsed = resourceQuery.safeParse(req.query);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const items = inventoryService.listBlockedDates(parsed.data.resourceId ?? defaultResourceId);
    return reply.status(200).send({ items });
  });

  app.post('/blocked-dates', async (req, reply) => {
    const parsed = blockDateBody.safeParse(req.body);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const { resourceId = defaultResourceId, date, reason } = parsed.data;
    return reply.status(201).send(inventoryService.blockDate(resourceId, date, reason));
  });

  app.delete('/blocked-dates/:resourceId/:date', async (req, reply) => {
    const parsed = blockedDateParams.safeParse(req.params);
    if (!parsed.success) return invalidInput(reply, parsed.error);

    const removed = inventoryService.unblockDate(parsed.data.resourceId, parsed.data.date);
    if (!removed) return sendFailure(reply, 'NotFound', 'Date is not blocked');
    return reply.status(204).send();
  });
}
